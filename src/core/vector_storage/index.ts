/**
 * Vector Storage Module
 *
 * Adapts the generic add / delete / query vector store contract to a Milvus
 * collection: filter trees are compiled to Milvus expressions and records are
 * mapped to and from the collection's columns.
 *
 * @module vector_storage
 *
 * @example
 * ```typescript
 * import { createMilvusVectorStore, FilterCondition, FilterOperator } from './vector_storage';
 *
 * const store = createMilvusVectorStore('http://localhost:19530', 'test-token', {
 *   collectionName: 'documents',
 *   additionalFields: ['fileName'],
 * });
 *
 * await store.add([
 *   { id: '1', embedding, chunk: { type: 'text', content: 'hello' }, metadata: { fileName: 'a.txt' } },
 * ]);
 *
 * const matches = await store.query({
 *   embedding,
 *   topK: 5,
 *   filters: {
 *     condition: FilterCondition.AND,
 *     filters: [{ key: 'fileName', operator: FilterOperator.EQUAL, value: 'a.txt' }],
 *   },
 * });
 * ```
 */

// Export types
export type {
	VectorStore,
	VectorEntry,
	VectorMatch,
	VectorStoreQuery,
	Chunk,
	MetadataValue,
	MetadataFilter,
	MetadataFilterGroup,
	FilterNode,
	FilterValue,
	StoreConfiguration,
	StoreConfigInput,
	StoreCredentials,
	TransportOptions,
	FieldKind,
	AdditionalField,
} from './types.js';

// Export filter and error values
export {
	FilterOperator,
	FilterCondition,
	VectorStoreError,
	InitializationError,
	ConfigValidationError,
	ConversionError,
	ValidationError,
	BackendError,
} from './backend/types.js';

// Export filter compilation
export { compileFilter, serializeFilterValue, isFilterGroup } from './filters.js';

// Export record mapping
export {
	toBackendRecord,
	toPrimaryKey,
	toPrimaryKeyLiteral,
	type BackendRecord,
} from './backend/entry-mapper.js';
export { fromBackendRow, buildOutputSchema, type OutputSchema } from './backend/match-builder.js';

// Export store and factory functions
export { MilvusVectorStore } from './backend/milvus.js';
export { createMilvusVectorStore, createMilvusVectorStoreFromEnv } from './factory.js';
export {
	StoreConfigSchema,
	TransportOptionsSchema,
	FIELD_KINDS,
	parseStoreConfig,
} from './config.js';

// Export constants for external use
export { DEFAULTS, ERROR_MESSAGES } from './constants.js';
