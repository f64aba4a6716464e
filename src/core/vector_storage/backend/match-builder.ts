/**
 * Match Builder
 *
 * Converts Milvus result rows back into {@link VectorMatch} records. Which
 * fields a row carries depends on the collection and index configuration, so
 * every field is looked up against an explicit schema and a missing or
 * mistyped value falls back to its kind's default instead of failing.
 *
 * @module vector_storage/backend/match-builder
 */

import type { FieldKind, StoreConfiguration } from '../config.js';
import type { VectorMatch } from './types.js';

/**
 * Output field name → expected kind
 */
export type OutputSchema = ReadonlyMap<string, FieldKind>;

type FieldValue<K extends FieldKind> = {
	string: string;
	number: number;
	boolean: boolean;
	float_vector: number[];
	json: unknown;
}[K];

const FIELD_DEFAULTS: { [K in FieldKind]: () => FieldValue<K> } = {
	string: () => '',
	number: () => 0,
	boolean: () => false,
	float_vector: () => [],
	json: () => null,
};

const coerceString = (value: unknown): string | undefined => {
	if (typeof value === 'string') return value;
	if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
		return String(value);
	}
	return undefined;
};

const coerceNumber = (value: unknown): number | undefined => {
	if (typeof value === 'number' && Number.isFinite(value)) return value;
	if (typeof value === 'bigint') return Number(value);
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
};

const coerceBoolean = (value: unknown): boolean | undefined => {
	if (typeof value === 'boolean') return value;
	if (value === 'true') return true;
	if (value === 'false') return false;
	return undefined;
};

const coerceFloatVector = (value: unknown): number[] | undefined => {
	if (!Array.isArray(value)) return undefined;
	const vector: number[] = [];
	for (const item of value) {
		const num = coerceNumber(item);
		if (num === undefined) return undefined;
		vector.push(num);
	}
	return vector;
};

function coerceField<K extends FieldKind>(kind: K, value: unknown): FieldValue<K> | undefined;
function coerceField(kind: FieldKind, value: unknown): unknown {
	switch (kind) {
		case 'string':
			return coerceString(value);
		case 'number':
			return coerceNumber(value);
		case 'boolean':
			return coerceBoolean(value);
		case 'float_vector':
			return coerceFloatVector(value);
		case 'json':
			return value;
	}
}

/**
 * Read one field: coerced value when present, the kind's default otherwise.
 */
export function readField<K extends FieldKind>(
	fields: Readonly<Record<string, unknown>>,
	name: string,
	kind: K
): FieldValue<K> {
	if (
		Object.prototype.hasOwnProperty.call(fields, name) &&
		fields[name] !== undefined &&
		fields[name] !== null
	) {
		const coerced = coerceField(kind, fields[name]);
		if (coerced !== undefined) return coerced;
	}
	return FIELD_DEFAULTS[kind]();
}

/**
 * Build the output schema for a store.
 *
 * The vector field is only requested when `includeVector` is set.
 */
export function buildOutputSchema(
	config: StoreConfiguration,
	options: { includeVector?: boolean } = {}
): OutputSchema {
	const schema = new Map<string, FieldKind>();
	schema.set(config.typeFieldName, 'string');
	schema.set(config.chunkFieldName, 'string');
	if (options.includeVector) schema.set(config.vectorField, 'float_vector');

	for (const field of config.additionalFields) {
		if (typeof field === 'string') {
			schema.set(field, 'string');
		} else {
			schema.set(field.name, field.kind);
		}
	}
	return schema;
}

/**
 * Render a backend id as a string regardless of its native type.
 */
export function stringifyId(id: unknown): string {
	return coerceString(id) ?? '';
}

/**
 * Convert one backend row into a match.
 *
 * @param id - Native primary key value of the row
 * @param fields - Fields returned for the row
 * @param score - Backend score, passed through verbatim; 0 when absent
 * @param schema - Fields requested from the backend and their kinds
 * @param config - Names of the chunk, type and vector fields
 */
export function fromBackendRow(
	id: unknown,
	fields: Readonly<Record<string, unknown>>,
	score: number | undefined,
	schema: OutputSchema,
	config: StoreConfiguration
): VectorMatch {
	const reserved = new Set([config.typeFieldName, config.chunkFieldName, config.vectorField]);
	const metadata: Record<string, unknown> = {};

	for (const [name, kind] of schema) {
		if (reserved.has(name)) continue;
		metadata[name] = readField(fields, name, kind);
	}

	return {
		id: stringifyId(id),
		embedding: schema.has(config.vectorField)
			? readField(fields, config.vectorField, 'float_vector')
			: [],
		chunk: {
			type: readField(fields, config.typeFieldName, 'string'),
			content: readField(fields, config.chunkFieldName, 'string'),
		},
		similarityScore: score ?? 0,
		metadata,
	};
}
