/**
 * Vector Storage Module Constants
 *
 * Central location for log prefixes, error messages, field names and
 * configuration defaults used by the vector storage adapter.
 *
 * @module vector_storage/constants
 */

/**
 * Log prefixes for consistent logging across the vector storage module
 */
export const LOG_PREFIXES = {
	FACTORY: '[VectorStoreFactory]',
	MILVUS: '[VectorStore:Milvus]',
} as const;

/**
 * Error messages for the vector storage module
 */
export const ERROR_MESSAGES = {
	// Initialization errors
	CLIENT_INIT_FAILED: 'Failed to initialize vector store client',
	INVALID_CONFIG: 'Invalid vector store configuration',

	// Operation errors
	ADD_FAILED: 'failed to add vector entries',
	DELETE_FAILED: 'failed to delete vector entries',
	QUERY_FAILED: 'failed to query vector entries',

	// Validation errors
	INVALID_TOP_K: 'topK must be a positive integer',
	EMPTY_QUERY: 'empty embedding or filters not allowed simultaneously',

	// Conversion errors
	INVALID_INT64_ID: 'id is not a valid int64 primary key',
	EMPTY_ID: 'id must not be empty',
} as const;

/**
 * Status code Milvus reports for a successful call
 */
export const MILVUS_SUCCESS = 'Success';

/**
 * Default configuration values
 */
export const DEFAULTS = {
	PRIMARY_KEY_FIELD: 'id',
	PRIMARY_KEY_TYPE: 'int64' as const,
	VECTOR_FIELD: 'vector',
	CHUNK_FIELD: 'content',
	TYPE_FIELD: 'type',
	TOP_K: 10,
} as const;
