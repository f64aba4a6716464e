/**
 * Vector Storage Backend Types and Error Classes
 *
 * This module defines the record model, the metadata filter tree and the
 * error classes shared by the vector storage adapter.
 *
 * @module vector_storage/backend/types
 */

import type { ZodIssue } from 'zod';
import type { VectorStore } from './vector-store.js';

export type { VectorStore };

export type {
	StoreConfiguration,
	StoreConfigInput,
	StoreCredentials,
	TransportOptions,
	FieldKind,
	AdditionalField,
} from '../config.js';

/**
 * Typed content unit attached to a vector entry
 */
export interface Chunk {
	/** Type tag, e.g. 'text' or 'table' */
	type: string;
	content: string;
}

export type MetadataScalar = string | number | boolean | Date;

/**
 * Metadata value. Dates are stored as ISO-8601 strings since the backend has
 * no timestamp column type.
 */
export type MetadataValue = MetadataScalar | null | MetadataScalar[];

/**
 * Record submitted to {@link VectorStore.add}
 *
 * @example
 * ```typescript
 * const entry: VectorEntry = {
 *   id: '42',
 *   embedding: [0.1, 0.2, 0.3],
 *   chunk: { type: 'text', content: 'Hello world' },
 *   metadata: { fileName: 'test.txt', createdAt: new Date() }
 * };
 * ```
 */
export interface VectorEntry {
	/**
	 * Must be convertible to the collection's primary key type. int64 ids are
	 * decimal strings within ±2^53 - 1 on write; delete accepts the full int64 range.
	 */
	id: string;
	embedding: number[];
	chunk: Chunk;
	metadata?: Record<string, MetadataValue>;
}

/**
 * Comparison operators, keyed by name and valued by their expression symbol
 */
export const FilterOperator = {
	EQUAL: '==',
	NOT_EQUAL: '!=',
	GREATER_THAN: '>',
	GREATER_THAN_OR_EQUAL: '>=',
	LESS_THAN: '<',
	LESS_THAN_OR_EQUAL: '<=',
	IN: 'in',
	NOT_IN: 'not in',
	LIKE: 'like',
} as const;

export type FilterOperator = (typeof FilterOperator)[keyof typeof FilterOperator];

export const FilterCondition = {
	AND: 'and',
	OR: 'or',
} as const;

export type FilterCondition = (typeof FilterCondition)[keyof typeof FilterCondition];

/**
 * Literal kinds a filter can compare against
 */
export type FilterValue = string | number | boolean | Date | FilterValue[];

/**
 * Leaf comparison of one metadata field
 */
export interface MetadataFilter {
	key: string;
	operator: FilterOperator;
	value: FilterValue;
}

/**
 * AND/OR group of filters. Groups nest to any depth; a group with no
 * (non-empty) children means "no filter".
 *
 * @example
 * ```typescript
 * const filters: MetadataFilterGroup = {
 *   condition: FilterCondition.OR,
 *   filters: [
 *     { key: 'fileName', operator: FilterOperator.EQUAL, value: 'a.txt' },
 *     {
 *       condition: FilterCondition.AND,
 *       filters: [
 *         { key: 'pages', operator: FilterOperator.GREATER_THAN, value: 10 },
 *         { key: 'lang', operator: FilterOperator.IN, value: ['en', 'de'] },
 *       ],
 *     },
 *   ],
 * };
 * ```
 */
export interface MetadataFilterGroup {
	condition: FilterCondition;
	filters: FilterNode[];
}

export type FilterNode = MetadataFilter | MetadataFilterGroup;

export interface VectorStoreQuery {
	/** Omit for a filter-only lookup */
	embedding?: number[];
	/** Defaults to the store's configured topK */
	topK?: number;
	filters?: MetadataFilterGroup;
}

export interface VectorMatch {
	id: string;
	/** Empty when the backend did not return vectors */
	embedding: number[];
	chunk: Chunk;
	/** Backend-defined scale; 0 for filter-only lookups */
	similarityScore: number;
	/** Projected additional fields */
	metadata: Record<string, unknown>;
}

/**
 * Base Vector Storage Error Class
 *
 * All vector storage errors extend from this class, carrying the failed
 * operation and the underlying cause.
 */
export class VectorStoreError extends Error {
	constructor(
		override message: string,
		/** The operation that failed (e.g., 'add', 'delete', 'query', 'init') */
		public readonly operation: string,
		/** The underlying error that caused this error, if any */
		public override readonly cause?: Error
	) {
		super(message);
		this.name = 'VectorStoreError';
	}
}

/**
 * Backend client construction failed
 */
export class InitializationError extends VectorStoreError {
	constructor(message: string, cause?: Error) {
		super(message, 'init', cause);
		this.name = 'InitializationError';
	}
}

/**
 * Store configuration failed schema validation
 */
export class ConfigValidationError extends InitializationError {
	constructor(
		message: string,
		public readonly issues: ZodIssue[]
	) {
		super(message);
		this.name = 'ConfigValidationError';
	}
}

/**
 * An id or value could not be coerced to the backend's type
 *
 * @example
 * ```typescript
 * throw new ConversionError('id is not a valid int64 primary key', 'delete', 'abc');
 * ```
 */
export class ConversionError extends VectorStoreError {
	constructor(
		message: string,
		operation: string,
		/** The value that failed conversion */
		public readonly value: unknown
	) {
		super(message, operation);
		this.name = 'ConversionError';
	}
}

/**
 * A query violated a precondition; raised before the backend is contacted
 */
export class ValidationError extends VectorStoreError {
	constructor(message: string, operation: string) {
		super(message, operation);
		this.name = 'ValidationError';
	}
}

/**
 * The downstream backend call failed
 */
export class BackendError extends VectorStoreError {
	constructor(message: string, operation: string, cause?: Error) {
		super(message, operation, cause);
		this.name = 'BackendError';
	}
}
