/**
 * Vector Storage Configuration Module
 *
 * Defines the store and transport configuration schemas using Zod for runtime
 * validation and type safety. A parsed configuration is frozen and shared
 * read-only by every operation of one store instance.
 *
 * @module vector_storage/config
 */

import { z } from 'zod';
import { DEFAULTS, ERROR_MESSAGES } from './constants.js';
import { ConfigValidationError } from './backend/types.js';

/**
 * Kinds a projected output field can be coerced into when results are read back.
 */
export const FIELD_KINDS = ['string', 'number', 'boolean', 'float_vector', 'json'] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

const AdditionalFieldSchema = z.union([
	z.string().min(1),
	z
		.object({
			name: z.string().min(1).describe('Field name'),
			kind: z.enum(FIELD_KINDS).default('string').describe('Expected field kind'),
		})
		.strict(),
]);

export type AdditionalField = z.input<typeof AdditionalFieldSchema>;

/**
 * Store Configuration Schema
 *
 * @example
 * ```typescript
 * const config = StoreConfigSchema.parse({
 *   collectionName: 'documents',
 *   additionalFields: ['fileName', { name: 'pageCount', kind: 'number' }],
 * });
 * ```
 */
export const StoreConfigSchema = z
	.object({
		/** Name of the collection to operate on */
		collectionName: z.string().min(1).describe('Collection name'),

		/** Primary key field of the collection */
		primaryKeyField: z
			.string()
			.min(1)
			.default(DEFAULTS.PRIMARY_KEY_FIELD)
			.describe('Primary key field name'),

		/** Native type of the primary key; int64 keys require decimal string ids */
		primaryKeyType: z
			.enum(['int64', 'varchar'])
			.default(DEFAULTS.PRIMARY_KEY_TYPE)
			.describe('Primary key type'),

		/** Float vector field holding the embedding */
		vectorField: z.string().min(1).default(DEFAULTS.VECTOR_FIELD).describe('Vector field name'),

		/** Field holding the chunk content */
		chunkFieldName: z.string().min(1).default(DEFAULTS.CHUNK_FIELD).describe('Chunk field name'),

		/** Field holding the chunk type tag */
		typeFieldName: z.string().min(1).default(DEFAULTS.TYPE_FIELD).describe('Type field name'),

		/** Metadata fields to project on read */
		additionalFields: z.array(AdditionalFieldSchema).default([]).describe('Projected fields'),

		/** Default number of results when a query does not set topK */
		topK: z.number().int().positive().default(DEFAULTS.TOP_K).describe('Default top-K'),

		/** Copy entry metadata into the written record */
		storeMetadata: z.boolean().default(true).describe('Write entry metadata'),
	})
	.strict();

type ParsedStoreConfig = z.output<typeof StoreConfigSchema>;

export type StoreConfigInput = z.input<typeof StoreConfigSchema>;
export type StoreConfiguration = Readonly<Omit<ParsedStoreConfig, 'additionalFields'>> & {
	readonly additionalFields: ReadonlyArray<ParsedStoreConfig['additionalFields'][number]>;
};

export const formatIssues = (issues: { path: (string | number)[]; message: string }[]): string =>
	issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Parse and freeze a store configuration.
 *
 * @throws {ConfigValidationError} If the configuration is invalid
 */
export function parseStoreConfig(input: StoreConfigInput): StoreConfiguration {
	const result = StoreConfigSchema.safeParse(input);
	if (!result.success) {
		throw new ConfigValidationError(
			`${ERROR_MESSAGES.INVALID_CONFIG}: ${formatIssues(result.error.issues)}`,
			result.error.issues
		);
	}
	return Object.freeze({
		...result.data,
		additionalFields: Object.freeze([...result.data.additionalFields]),
	});
}

/**
 * Transport options passed through to the Milvus client.
 * Timeouts are enforced by the client, never by the store.
 */
export const TransportOptionsSchema = z
	.object({
		/** Use TLS */
		ssl: z.boolean().optional().describe('Use TLS'),

		/** Per-call timeout in milliseconds */
		timeout: z.number().int().positive().optional().describe('Request timeout'),

		/** Milvus database name */
		database: z.string().min(1).optional().describe('Database name'),
	})
	.strict();

export type TransportOptions = z.infer<typeof TransportOptionsSchema>;

/**
 * Credentials are either an API token or a username/password pair.
 */
export type StoreCredentials = string | { username: string; password: string };
