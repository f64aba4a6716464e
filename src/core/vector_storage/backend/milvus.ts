import type { MilvusClient } from '@zilliz/milvus2-sdk-node';
import type { VectorStore } from './vector-store.js';
import type { StoreConfiguration } from '../config.js';
import type { VectorEntry, VectorMatch, VectorStoreQuery } from './types.js';
import { BackendError, ValidationError } from './types.js';
import { toBackendRecord, toPrimaryKeyLiteral } from './entry-mapper.js';
import { buildOutputSchema, fromBackendRow, type OutputSchema } from './match-builder.js';
import { compileFilter } from '../filters.js';
import { AsyncLock } from '../utils/async-lock.js';
import { createLogger, type Logger } from '../../logger/index.js';
import { LOG_PREFIXES, ERROR_MESSAGES, MILVUS_SUCCESS } from '../constants.js';
import { env } from '../../env.js';

type Row = Record<string, unknown>;

const isRow = (value: unknown): value is Row =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const toError = (error: unknown): Error =>
	error instanceof Error ? error : new Error(String(error));

/**
 * Throw when a Milvus response status reports anything but success.
 * Responses without a status are taken as successful.
 */
function assertSuccess(status: unknown, action: string): void {
	if (!isRow(status) || status.error_code === undefined) return;
	if (status.error_code === MILVUS_SUCCESS) return;
	const reason = typeof status.reason === 'string' && status.reason ? status.reason : 'unknown error';
	throw new Error(`${action} returned ${String(status.error_code)}: ${reason}`);
}

/**
 * Rows from a query or search response. Multi-vector searches nest one level.
 */
function collectRows(results: unknown): Row[] {
	if (!Array.isArray(results)) return [];
	const rows: Row[] = [];
	for (const item of results) {
		if (Array.isArray(item)) {
			rows.push(...item.filter(isRow));
		} else if (isRow(item)) {
			rows.push(item);
		}
	}
	return rows;
}

/**
 * MilvusVectorStore Class
 *
 * Implements the VectorStore interface on top of an existing Milvus
 * collection. Collection and index creation are left to the operator; the
 * store only loads the collection before reading.
 *
 * Every public operation holds a per-instance lock for its whole duration,
 * and entries of one batch are upserted sequentially.
 */
export class MilvusVectorStore implements VectorStore {
	private readonly client: MilvusClient;
	private readonly config: StoreConfiguration;
	private readonly logger: Logger;
	private readonly lock = new AsyncLock();

	constructor(client: MilvusClient, config: StoreConfiguration) {
		this.client = client;
		this.config = config;
		this.logger = createLogger({
			level: env.VECTORBRIDGE_LOG_LEVEL,
		});

		this.logger.debug(`${LOG_PREFIXES.MILVUS} Store initialized`, {
			collection: config.collectionName,
			primaryKey: `${config.primaryKeyField}:${config.primaryKeyType}`,
		});
	}

	async add(entries: VectorEntry[]): Promise<void> {
		if (entries.length === 0) return;

		await this.lock.withLock(async () => {
			for (const entry of entries) {
				const record = toBackendRecord(entry, this.config, 'add');
				await this.callBackend('add', ERROR_MESSAGES.ADD_FAILED, async () => {
					const res = await this.client.upsert({
						collection_name: this.config.collectionName,
						data: [record],
					});
					assertSuccess(res.status, 'upsert');
				});
			}
			this.logger.debug(`${LOG_PREFIXES.MILVUS} Upserted ${entries.length} entries`);
		});
	}

	async delete(ids: string | string[]): Promise<void> {
		const idList = Array.isArray(ids) ? ids : [ids];
		if (idList.length === 0) return;

		await this.lock.withLock(async () => {
			for (const id of idList) {
				const literal = toPrimaryKeyLiteral(id, this.config, 'delete');
				await this.callBackend('delete', ERROR_MESSAGES.DELETE_FAILED, async () => {
					const res = await this.client.deleteEntities({
						collection_name: this.config.collectionName,
						expr: `${this.config.primaryKeyField} == ${literal}`,
					});
					assertSuccess(res.status, 'delete');
				});
			}
			this.logger.debug(`${LOG_PREFIXES.MILVUS} Deleted ${idList.length} entries`);
		});
	}

	async query(request: VectorStoreQuery): Promise<VectorMatch[]> {
		if (
			request.topK !== undefined &&
			(!Number.isInteger(request.topK) || request.topK <= 0)
		) {
			throw new ValidationError(`${ERROR_MESSAGES.INVALID_TOP_K}, got ${request.topK}`, 'query');
		}
		const embedding = request.embedding?.length ? request.embedding : undefined;
		if (!embedding && !request.filters) {
			throw new ValidationError(ERROR_MESSAGES.EMPTY_QUERY, 'query');
		}

		const filter = request.filters ? compileFilter(request.filters) : '';
		const topK = request.topK ?? this.config.topK;

		return this.lock.withLock(async () => {
			await this.callBackend('query', ERROR_MESSAGES.QUERY_FAILED, async () => {
				const status = await this.client.loadCollection({
					collection_name: this.config.collectionName,
				});
				assertSuccess(status, 'loadCollection');
			});

			const matches = embedding
				? await this.search(embedding, filter, topK)
				: await this.lookup(filter, topK);

			this.logger.debug(`${LOG_PREFIXES.MILVUS} Query returned ${matches.length} matches`, {
				mode: embedding ? 'search' : 'filter',
				filter,
				topK,
			});
			return matches;
		});
	}

	private async search(embedding: number[], filter: string, topK: number): Promise<VectorMatch[]> {
		const schema = buildOutputSchema(this.config);
		const res = await this.callBackend('query', ERROR_MESSAGES.QUERY_FAILED, async () => {
			const response = await this.client.search({
				collection_name: this.config.collectionName,
				anns_field: this.config.vectorField,
				data: embedding,
				limit: topK,
				output_fields: [...schema.keys()],
				...(filter ? { filter } : {}),
			});
			assertSuccess(response.status, 'search');
			return response;
		});

		return collectRows(res.results).map(hit =>
			this.toMatch(hit, schema, typeof hit.score === 'number' ? hit.score : undefined)
		);
	}

	private async lookup(filter: string, limit: number): Promise<VectorMatch[]> {
		const schema = buildOutputSchema(this.config, { includeVector: true });
		const res = await this.callBackend('query', ERROR_MESSAGES.QUERY_FAILED, async () => {
			const response = await this.client.query({
				collection_name: this.config.collectionName,
				output_fields: [this.config.primaryKeyField, ...schema.keys()],
				limit,
				...(filter ? { filter } : {}),
			});
			assertSuccess(response.status, 'query');
			return response;
		});

		return collectRows(res.data).map(row => this.toMatch(row, schema, undefined));
	}

	private toMatch(row: Row, schema: OutputSchema, score: number | undefined): VectorMatch {
		const id = row[this.config.primaryKeyField] ?? row.id;
		return fromBackendRow(id, row, score, schema, this.config);
	}

	/**
	 * Run one backend call, wrapping any failure in a BackendError
	 */
	private async callBackend<T>(
		operation: string,
		failureMessage: string,
		call: () => Promise<T>
	): Promise<T> {
		try {
			return await call();
		} catch (error) {
			const cause = toError(error);
			this.logger.error(`${LOG_PREFIXES.MILVUS} ${failureMessage}`, {
				collection: this.config.collectionName,
				error: cause.message,
			});
			throw new BackendError(failureMessage, operation, cause);
		}
	}

	getBackendType(): string {
		return 'milvus';
	}

	getCollectionName(): string {
		return this.config.collectionName;
	}

	getConfig(): StoreConfiguration {
		return this.config;
	}
}
