/**
 * Metadata Filter Compilation
 *
 * Compiles a recursive {@link MetadataFilterGroup} into a single Milvus boolean
 * expression. Parentheses carry all grouping, so an OR of ANDs keeps the
 * precedence the caller wrote.
 *
 * @module vector_storage/filters
 */

import type { FilterNode, FilterValue, MetadataFilterGroup } from './backend/types.js';

export function isFilterGroup(node: FilterNode): node is MetadataFilterGroup {
	return 'filters' in node;
}

function escapeString(value: string): string {
	return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Render a filter value as an expression literal.
 *
 * Strings and dates are quoted, arrays bracketed, numbers and booleans bare.
 *
 * @example
 * ```typescript
 * serializeFilterValue(['a', 1]); // '["a", 1]'
 * ```
 */
export function serializeFilterValue(value: FilterValue): string {
	if (Array.isArray(value)) {
		return `[${value.map(serializeFilterValue).join(', ')}]`;
	}
	if (value instanceof Date) {
		return `"${value.toISOString()}"`;
	}
	switch (typeof value) {
		case 'string':
			return `"${escapeString(value)}"`;
		case 'number':
		case 'boolean':
			return String(value);
		default: {
			const unreachable: never = value;
			return String(unreachable);
		}
	}
}

/**
 * Compile a filter tree into expression syntax.
 *
 * Returns `''` for a group with no non-empty children, which callers treat as
 * "no filter". Operators are emitted as given.
 */
export function compileFilter(node: FilterNode): string {
	if (!isFilterGroup(node)) {
		return ` ${node.key} ${node.operator} ${serializeFilterValue(node.value)} `;
	}

	const parts = node.filters.map(compileFilter).filter(part => part !== '');
	if (parts.length === 0) return '';
	if (parts.length === 1) return parts[0] ?? '';
	return `(${parts.join(` ${node.condition.toUpperCase()} `)})`;
}
