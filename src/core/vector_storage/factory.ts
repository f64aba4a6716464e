/**
 * Vector Storage Factory
 *
 * Validates configuration, constructs the Milvus client and returns a ready
 * store.
 *
 * @module vector_storage/factory
 */

import { MilvusClient } from '@zilliz/milvus2-sdk-node';
import {
	TransportOptionsSchema,
	formatIssues,
	parseStoreConfig,
	type StoreConfigInput,
	type StoreCredentials,
	type TransportOptions,
} from './config.js';
import { MilvusVectorStore } from './backend/milvus.js';
import { ConfigValidationError, InitializationError } from './backend/types.js';
import { ERROR_MESSAGES, LOG_PREFIXES } from './constants.js';
import { createLogger } from '../logger/index.js';
import { env } from '../env.js';

/**
 * Create a Milvus-backed vector store.
 *
 * @param serviceUrl - Milvus address, e.g. `http://localhost:19530`
 * @param credentials - API token, or username and password; omit for open servers
 * @param config - Store configuration
 * @param transportOptions - TLS, timeout and database options for the client
 * @throws {InitializationError} If the configuration is invalid or the client cannot be built
 *
 * @example
 * ```typescript
 * const store = createMilvusVectorStore('http://localhost:19530', 'test-token', {
 *   collectionName: 'documents',
 *   additionalFields: ['fileName'],
 * });
 * ```
 */
export function createMilvusVectorStore(
	serviceUrl: string,
	credentials: StoreCredentials | undefined,
	config: StoreConfigInput,
	transportOptions: TransportOptions = {}
): MilvusVectorStore {
	const logger = createLogger({ level: env.VECTORBRIDGE_LOG_LEVEL });

	if (!serviceUrl) {
		throw new InitializationError(`${ERROR_MESSAGES.CLIENT_INIT_FAILED}: service URL is required`);
	}
	const storeConfig = parseStoreConfig(config);
	const transport = TransportOptionsSchema.safeParse(transportOptions);
	if (!transport.success) {
		throw new ConfigValidationError(
			`${ERROR_MESSAGES.INVALID_CONFIG}: ${formatIssues(transport.error.issues)}`,
			transport.error.issues
		);
	}

	let client: MilvusClient;
	try {
		client = new MilvusClient({
			address: serviceUrl,
			...(typeof credentials === 'string' ? { token: credentials } : {}),
			...(typeof credentials === 'object' ? credentials : {}),
			...transport.data,
		});
	} catch (error) {
		logger.error(`${LOG_PREFIXES.FACTORY} Client construction failed`, {
			address: serviceUrl,
			error: error instanceof Error ? error.message : String(error),
		});
		throw new InitializationError(
			ERROR_MESSAGES.CLIENT_INIT_FAILED,
			error instanceof Error ? error : new Error(String(error))
		);
	}

	logger.info(`${LOG_PREFIXES.FACTORY} Created Milvus vector store`, {
		collection: storeConfig.collectionName,
	});

	return new MilvusVectorStore(client, storeConfig);
}

/**
 * Create a Milvus-backed vector store from environment variables.
 *
 * Reads VECTOR_STORE_URL, VECTOR_STORE_API_KEY (or VECTOR_STORE_USERNAME and
 * VECTOR_STORE_PASSWORD), VECTOR_STORE_COLLECTION, VECTOR_STORE_PRIMARY_KEY,
 * VECTOR_STORE_CHUNK_FIELD, VECTOR_STORE_TOP_K, VECTOR_STORE_SSL,
 * VECTOR_STORE_TIMEOUT and VECTOR_STORE_DATABASE. `overrides` win over the
 * environment.
 *
 * @throws {InitializationError} If VECTOR_STORE_URL is not set
 */
export function createMilvusVectorStoreFromEnv(
	overrides: Partial<StoreConfigInput> = {}
): MilvusVectorStore {
	const url = env.VECTOR_STORE_URL;
	if (!url) {
		throw new InitializationError(`${ERROR_MESSAGES.CLIENT_INIT_FAILED}: VECTOR_STORE_URL is not set`);
	}

	let credentials: StoreCredentials | undefined;
	if (env.VECTOR_STORE_API_KEY) {
		credentials = env.VECTOR_STORE_API_KEY;
	} else if (env.VECTOR_STORE_USERNAME && env.VECTOR_STORE_PASSWORD) {
		credentials = { username: env.VECTOR_STORE_USERNAME, password: env.VECTOR_STORE_PASSWORD };
	}

	const config: StoreConfigInput = {
		collectionName: env.VECTOR_STORE_COLLECTION,
		...(env.VECTOR_STORE_PRIMARY_KEY ? { primaryKeyField: env.VECTOR_STORE_PRIMARY_KEY } : {}),
		...(env.VECTOR_STORE_CHUNK_FIELD ? { chunkFieldName: env.VECTOR_STORE_CHUNK_FIELD } : {}),
		...(env.VECTOR_STORE_TOP_K !== undefined ? { topK: env.VECTOR_STORE_TOP_K } : {}),
		...overrides,
	};

	const transportOptions: TransportOptions = {
		...(env.VECTOR_STORE_SSL ? { ssl: true } : {}),
		...(env.VECTOR_STORE_TIMEOUT !== undefined ? { timeout: env.VECTOR_STORE_TIMEOUT } : {}),
		...(env.VECTOR_STORE_DATABASE ? { database: env.VECTOR_STORE_DATABASE } : {}),
	};

	return createMilvusVectorStore(url, credentials, config, transportOptions);
}
