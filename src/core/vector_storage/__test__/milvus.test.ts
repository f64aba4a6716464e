/**
 * Milvus Vector Store Tests
 *
 * Tests for the Milvus-backed store. Uses mocking since Milvus requires an
 * external service.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMilvusVectorStore } from '../factory.js';
import type { MilvusVectorStore } from '../backend/milvus.js';
import {
	BackendError,
	ConversionError,
	FilterCondition,
	FilterOperator,
	ValidationError,
} from '../backend/types.js';
import type { MetadataFilterGroup, VectorEntry } from '../backend/types.js';

// Mock the Milvus client
const mockMilvusClient = {
	upsert: vi.fn(),
	deleteEntities: vi.fn(),
	loadCollection: vi.fn(),
	query: vi.fn(),
	search: vi.fn(),
};

vi.mock('@zilliz/milvus2-sdk-node', () => ({
	MilvusClient: vi.fn(function () {
		return mockMilvusClient;
	}),
}));

// Mock the logger to reduce noise in tests
vi.mock('../../logger/index.js', () => ({
	createLogger: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

const SUCCESS = { error_code: 'Success', reason: '' };

const entry = (id: string, content: string, metadata?: VectorEntry['metadata']): VectorEntry => ({
	id,
	embedding: [0.1, 0.2],
	chunk: { type: 'text', content },
	...(metadata ? { metadata } : {}),
});

const fileFilter: MetadataFilterGroup = {
	condition: FilterCondition.AND,
	filters: [
		{ key: 'fileName', operator: FilterOperator.EQUAL, value: 'test.txt' },
		{ key: 'pages', operator: FilterOperator.GREATER_THAN, value: 2 },
	],
};

const backendCalls = () =>
	mockMilvusClient.upsert.mock.calls.length +
	mockMilvusClient.deleteEntities.mock.calls.length +
	mockMilvusClient.loadCollection.mock.calls.length +
	mockMilvusClient.query.mock.calls.length +
	mockMilvusClient.search.mock.calls.length;

describe('MilvusVectorStore', () => {
	let store: MilvusVectorStore;

	beforeEach(() => {
		vi.clearAllMocks();
		mockMilvusClient.upsert.mockResolvedValue({ status: SUCCESS });
		mockMilvusClient.deleteEntities.mockResolvedValue({ status: SUCCESS });
		mockMilvusClient.loadCollection.mockResolvedValue(SUCCESS);
		mockMilvusClient.query.mockResolvedValue({ status: SUCCESS, data: [] });
		mockMilvusClient.search.mockResolvedValue({ status: SUCCESS, results: [] });

		store = createMilvusVectorStore('http://localhost:19530', 'test-token', {
			collectionName: 'docs',
			additionalFields: ['fileName'],
		});
	});

	it('should report backend type and collection', () => {
		expect(store.getBackendType()).toBe('milvus');
		expect(store.getCollectionName()).toBe('docs');
	});

	describe('add', () => {
		it('should succeed without backend calls for an empty batch', async () => {
			await expect(store.add([])).resolves.toBeUndefined();
			expect(backendCalls()).toBe(0);
		});

		it('should upsert entries one at a time in order', async () => {
			await store.add([entry('1', 'first', { fileName: 'a.txt' }), entry('2', 'second')]);

			expect(mockMilvusClient.upsert).toHaveBeenCalledTimes(2);
			expect(mockMilvusClient.upsert).toHaveBeenNthCalledWith(1, {
				collection_name: 'docs',
				data: [{ id: 1, vector: [0.1, 0.2], type: 'text', content: 'first', fileName: 'a.txt' }],
			});
			expect(mockMilvusClient.upsert).toHaveBeenNthCalledWith(2, {
				collection_name: 'docs',
				data: [{ id: 2, vector: [0.1, 0.2], type: 'text', content: 'second' }],
			});
		});

		it('should store timestamps as ISO-8601 strings', async () => {
			await store.add([entry('3', 'dated', { createdAt: new Date('2024-03-04T05:06:07.000Z') })]);

			expect(mockMilvusClient.upsert).toHaveBeenCalledWith({
				collection_name: 'docs',
				data: [
					{
						id: 3,
						vector: [0.1, 0.2],
						type: 'text',
						content: 'dated',
						createdAt: '2024-03-04T05:06:07.000Z',
					},
				],
			});
		});

		it('should abort remaining entries on a conversion failure', async () => {
			await expect(
				store.add([entry('1', 'first'), entry('abc', 'bad'), entry('3', 'third')])
			).rejects.toThrow(ConversionError);
			expect(mockMilvusClient.upsert).toHaveBeenCalledTimes(1);
		});

		it('should wrap the first backend failure and stop', async () => {
			mockMilvusClient.upsert.mockRejectedValueOnce(new Error('connection reset'));

			const error = await store.add([entry('1', 'first'), entry('2', 'second')]).catch(e => e);

			expect(error).toBeInstanceOf(BackendError);
			expect(error.message).toBe('failed to add vector entries');
			expect(error.operation).toBe('add');
			expect(error.cause.message).toBe('connection reset');
			expect(mockMilvusClient.upsert).toHaveBeenCalledTimes(1);
		});

		it('should treat an unsuccessful status as a backend failure', async () => {
			mockMilvusClient.upsert.mockResolvedValueOnce({
				status: { error_code: 'UnexpectedError', reason: 'dimension mismatch' },
			});

			const error = await store.add([entry('1', 'first')]).catch(e => e);

			expect(error).toBeInstanceOf(BackendError);
			expect(error.cause.message).toBe('upsert returned UnexpectedError: dimension mismatch');
		});
	});

	describe('delete', () => {
		it('should delete a single id', async () => {
			await store.delete('5');
			expect(mockMilvusClient.deleteEntities).toHaveBeenCalledWith({
				collection_name: 'docs',
				expr: 'id == 5',
			});
		});

		it('should delete each id of a list', async () => {
			await store.delete(['1', '2']);
			expect(mockMilvusClient.deleteEntities).toHaveBeenCalledTimes(2);
			expect(mockMilvusClient.deleteEntities).toHaveBeenLastCalledWith({
				collection_name: 'docs',
				expr: 'id == 2',
			});
		});

		it('should delete int64 ids beyond the safe integer range', async () => {
			await store.delete('9223372036854775807');
			expect(mockMilvusClient.deleteEntities).toHaveBeenCalledWith({
				collection_name: 'docs',
				expr: 'id == 9223372036854775807',
			});
		});

		it('should do nothing for an empty list', async () => {
			await store.delete([]);
			expect(backendCalls()).toBe(0);
		});

		it('should return a ConversionError for non-integer ids', async () => {
			await expect(store.delete('abc')).rejects.toThrow(ConversionError);
			await expect(store.delete('abc')).rejects.not.toThrow(BackendError);
			expect(mockMilvusClient.deleteEntities).not.toHaveBeenCalled();
		});

		it('should stop at the first id that cannot be converted', async () => {
			await expect(store.delete(['1', 'x', '3'])).rejects.toThrow(ConversionError);
			expect(mockMilvusClient.deleteEntities).toHaveBeenCalledTimes(1);
		});

		it('should quote varchar keys', async () => {
			const varcharStore = createMilvusVectorStore('http://localhost:19530', undefined, {
				collectionName: 'docs',
				primaryKeyField: 'doc_id',
				primaryKeyType: 'varchar',
			});
			await varcharStore.delete('a-1');
			expect(mockMilvusClient.deleteEntities).toHaveBeenCalledWith({
				collection_name: 'docs',
				expr: 'doc_id == "a-1"',
			});
		});

		it('should wrap backend failures', async () => {
			mockMilvusClient.deleteEntities.mockRejectedValueOnce(new Error('timeout'));
			await expect(store.delete('1')).rejects.toThrow('failed to delete vector entries');
		});
	});

	describe('query validation', () => {
		it('should reject topK of zero before any backend call', async () => {
			await expect(store.query({ embedding: [0.1, 0.2], topK: 0 })).rejects.toThrow(
				ValidationError
			);
			expect(backendCalls()).toBe(0);
		});

		it('should reject negative and fractional topK', async () => {
			await expect(store.query({ embedding: [0.1], topK: -1 })).rejects.toThrow(ValidationError);
			await expect(store.query({ embedding: [0.1], topK: 1.5 })).rejects.toThrow(ValidationError);
		});

		it('should reject a query without embedding and filters', async () => {
			await expect(store.query({})).rejects.toThrow(
				'empty embedding or filters not allowed simultaneously'
			);
			await expect(store.query({ embedding: [] })).rejects.toThrow(ValidationError);
			expect(backendCalls()).toBe(0);
		});

		it('should check topK before the empty query', async () => {
			await expect(store.query({ topK: 0 })).rejects.toThrow('topK must be a positive integer');
		});
	});

	describe('similarity search', () => {
		it('should load the collection and search with the compiled filter', async () => {
			mockMilvusClient.search.mockResolvedValueOnce({
				status: SUCCESS,
				results: [{ id: '1', score: 0.9, type: 'text', content: 'hello', fileName: 'test.txt' }],
			});

			const matches = await store.query({ embedding: [0.1, 0.2], topK: 3, filters: fileFilter });

			expect(mockMilvusClient.loadCollection).toHaveBeenCalledWith({ collection_name: 'docs' });
			expect(mockMilvusClient.search).toHaveBeenCalledWith({
				collection_name: 'docs',
				anns_field: 'vector',
				data: [0.1, 0.2],
				limit: 3,
				output_fields: ['type', 'content', 'fileName'],
				filter: '( fileName == "test.txt"  AND  pages > 2 )',
			});
			expect(matches).toEqual([
				{
					id: '1',
					embedding: [],
					chunk: { type: 'text', content: 'hello' },
					similarityScore: 0.9,
					metadata: { fileName: 'test.txt' },
				},
			]);
		});

		it('should omit the filter and use the default topK when none is given', async () => {
			await store.query({ embedding: [0.1, 0.2] });

			const [params] = mockMilvusClient.search.mock.calls[0] ?? [];
			expect(params.limit).toBe(10);
			expect('filter' in params).toBe(false);
		});

		it('should treat an empty filter group as no filter', async () => {
			await store.query({
				embedding: [0.1, 0.2],
				filters: { condition: FilterCondition.OR, filters: [] },
			});

			const [params] = mockMilvusClient.search.mock.calls[0] ?? [];
			expect('filter' in params).toBe(false);
		});

		it('should default fields missing from hits', async () => {
			mockMilvusClient.search.mockResolvedValueOnce({
				status: SUCCESS,
				results: [[{ id: 8, score: 0.5 }]],
			});

			const matches = await store.query({ embedding: [0.1, 0.2] });

			expect(matches).toEqual([
				{
					id: '8',
					embedding: [],
					chunk: { type: '', content: '' },
					similarityScore: 0.5,
					metadata: { fileName: '' },
				},
			]);
		});

		it('should wrap search failures', async () => {
			mockMilvusClient.search.mockRejectedValueOnce(new Error('search failed'));
			await expect(store.query({ embedding: [0.1, 0.2] })).rejects.toThrow(BackendError);
		});

		it('should wrap collection load failures', async () => {
			mockMilvusClient.loadCollection.mockResolvedValueOnce({
				error_code: 'CollectionNotExists',
				reason: 'collection not found',
			});
			await expect(store.query({ embedding: [0.1, 0.2] })).rejects.toThrow(
				'failed to query vector entries'
			);
			expect(mockMilvusClient.search).not.toHaveBeenCalled();
		});
	});

	describe('filter-only lookup', () => {
		it('should query by filter and score matches zero', async () => {
			mockMilvusClient.query.mockResolvedValueOnce({
				status: SUCCESS,
				data: [
					{ id: 5, type: 'text', content: 'x', vector: [1, 2], fileName: 'test.txt' },
					{ id: 6 },
				],
			});

			const matches = await store.query({ filters: fileFilter, topK: 2 });

			expect(mockMilvusClient.loadCollection).toHaveBeenCalledTimes(1);
			expect(mockMilvusClient.search).not.toHaveBeenCalled();
			expect(mockMilvusClient.query).toHaveBeenCalledWith({
				collection_name: 'docs',
				output_fields: ['id', 'type', 'content', 'vector', 'fileName'],
				limit: 2,
				filter: '( fileName == "test.txt"  AND  pages > 2 )',
			});
			expect(matches).toEqual([
				{
					id: '5',
					embedding: [1, 2],
					chunk: { type: 'text', content: 'x' },
					similarityScore: 0,
					metadata: { fileName: 'test.txt' },
				},
				{
					id: '6',
					embedding: [],
					chunk: { type: '', content: '' },
					similarityScore: 0,
					metadata: { fileName: '' },
				},
			]);
		});

		it('should wrap query failures', async () => {
			mockMilvusClient.query.mockRejectedValueOnce(new Error('query failed'));
			await expect(store.query({ filters: fileFilter })).rejects.toThrow(
				'failed to query vector entries'
			);
		});
	});

	describe('concurrency', () => {
		it('should not start an operation while another is in flight', async () => {
			let releaseUpsert: () => void = () => {};
			mockMilvusClient.upsert.mockImplementationOnce(
				() =>
					new Promise(resolve => {
						releaseUpsert = () => resolve({ status: SUCCESS });
					})
			);

			const adding = store.add([entry('1', 'first')]);
			const querying = store.query({ embedding: [0.1, 0.2], topK: 1 });
			await new Promise(resolve => setTimeout(resolve, 0));

			expect(mockMilvusClient.upsert).toHaveBeenCalledTimes(1);
			expect(mockMilvusClient.loadCollection).not.toHaveBeenCalled();

			releaseUpsert();
			await adding;
			await querying;

			expect(mockMilvusClient.loadCollection).toHaveBeenCalledTimes(1);
			expect(mockMilvusClient.search).toHaveBeenCalledTimes(1);
		});

		it('should release the lock after a failed operation', async () => {
			mockMilvusClient.upsert.mockRejectedValueOnce(new Error('boom'));
			await expect(store.add([entry('1', 'first')])).rejects.toThrow(BackendError);
			await expect(store.delete('1')).resolves.toBeUndefined();
		});
	});
});
