/**
 * Vector Store Interface
 *
 * Defines the generic contract a schema-specific backend adapter satisfies.
 * Records are written and read through the generic model; the adapter owns the
 * mapping to the backend's columns and filter grammar.
 *
 * @module vector_storage/backend/vector-store
 */

import type { VectorEntry, VectorMatch, VectorStoreQuery } from './types.js';

/**
 * VectorStore Interface
 *
 * Implementations must be safe to call concurrently; operations on one
 * instance run one at a time.
 *
 * @example
 * ```typescript
 * await store.add([{ id: '1', embedding, chunk: { type: 'text', content: 'hello' } }]);
 *
 * const matches = await store.query({
 *   embedding: queryEmbedding,
 *   topK: 5,
 *   filters: {
 *     condition: 'and',
 *     filters: [{ key: 'fileName', operator: '==', value: 'test.txt' }],
 *   },
 * });
 *
 * await store.delete(['1', '2']);
 * ```
 */
export interface VectorStore {
	/**
	 * Upsert entries, one at a time and in order.
	 *
	 * An empty array resolves without contacting the backend. The first failure
	 * aborts the remaining entries; entries already written stay written.
	 *
	 * @throws {ConversionError} If an id cannot be converted to the primary key type
	 * @throws {BackendError} If the backend rejects an upsert
	 */
	add(entries: VectorEntry[]): Promise<void>;

	/**
	 * Delete one or more entries by id.
	 *
	 * @throws {ConversionError} If an id cannot be converted to the primary key type
	 * @throws {BackendError} If the backend rejects a delete
	 */
	delete(ids: string | string[]): Promise<void>;

	/**
	 * Similarity search when an embedding is given, filter-only lookup otherwise.
	 *
	 * @throws {ValidationError} If topK is not positive, or neither embedding nor filters are set
	 * @throws {BackendError} If the backend call fails
	 */
	query(request: VectorStoreQuery): Promise<VectorMatch[]>;

	/**
	 * Returns the backend type identifier (e.g. 'milvus')
	 */
	getBackendType(): string;

	getCollectionName(): string;
}
