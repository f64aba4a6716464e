/**
 * Vector Storage Module Public Types
 *
 * Re-exports the record model, filter tree and configuration types without
 * exposing implementation details.
 *
 * @module vector_storage/types
 */

export type {
	// Core interfaces
	VectorStore,
	VectorEntry,
	VectorMatch,
	VectorStoreQuery,
	Chunk,
	MetadataValue,
	MetadataScalar,

	// Filter tree
	MetadataFilter,
	MetadataFilterGroup,
	FilterNode,
	FilterValue,

	// Configuration types
	StoreConfiguration,
	StoreConfigInput,
	StoreCredentials,
	TransportOptions,
	FieldKind,
	AdditionalField,
} from './backend/types.js';
