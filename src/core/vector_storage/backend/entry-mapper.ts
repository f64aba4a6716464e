/**
 * Entry Mapper
 *
 * Converts generic {@link VectorEntry} records into Milvus rows: primary key,
 * float vector and a flat property map.
 *
 * @module vector_storage/backend/entry-mapper
 */

import type { StoreConfiguration } from '../config.js';
import { ERROR_MESSAGES } from '../constants.js';
import { serializeFilterValue } from '../filters.js';
import { ConversionError } from './types.js';
import type { MetadataScalar, MetadataValue, VectorEntry } from './types.js';

export type PrimaryKey = number | string;

export type BackendScalar = string | number | boolean;

export type BackendValue = BackendScalar | null | BackendScalar[] | number[];

/**
 * Row shape written with upsert
 */
export type BackendRecord = Record<string, BackendValue>;

const INT64_PATTERN = /^[+-]?\d+$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a decimal id within the signed 64-bit range.
 */
function parseInt64(id: string, operation: string): bigint {
	const trimmed = id.trim();
	if (!INT64_PATTERN.test(trimmed)) {
		throw new ConversionError(`${ERROR_MESSAGES.INVALID_INT64_ID}: "${id}"`, operation, id);
	}
	const value = BigInt(trimmed);
	if (value < INT64_MIN || value > INT64_MAX) {
		throw new ConversionError(
			`${ERROR_MESSAGES.INVALID_INT64_ID}: "${id}" is outside the int64 range`,
			operation,
			id
		);
	}
	return value;
}

/**
 * Convert an entry id to the key value written with upsert.
 *
 * The Milvus client types int64 columns as `number`, so written int64 keys are
 * limited to the safe integer range (±2^53 - 1). Larger keys can still be
 * deleted, see {@link toPrimaryKeyLiteral}.
 *
 * @throws {ConversionError} If the id is empty, or not a decimal integer within
 * the safe integer range for int64 keys
 */
export function toPrimaryKey(
	id: string,
	config: StoreConfiguration,
	operation: string = 'convert'
): PrimaryKey {
	if (config.primaryKeyType === 'varchar') {
		if (id === '') throw new ConversionError(ERROR_MESSAGES.EMPTY_ID, operation, id);
		return id;
	}

	const value = parseInt64(id, operation);
	if (value < BigInt(Number.MIN_SAFE_INTEGER) || value > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new ConversionError(
			`${ERROR_MESSAGES.INVALID_INT64_ID}: "${id}" is outside the safe integer range`,
			operation,
			id
		);
	}
	return Number(value);
}

/**
 * Render an id as a primary key literal for filter expressions.
 *
 * int64 ids are validated against the full signed 64-bit range and written
 * as plain decimals; varchar ids are quoted.
 *
 * @throws {ConversionError} If the id cannot be a key of the collection's type
 */
export function toPrimaryKeyLiteral(
	id: string,
	config: StoreConfiguration,
	operation: string = 'convert'
): string {
	if (config.primaryKeyType === 'varchar') {
		if (id === '') throw new ConversionError(ERROR_MESSAGES.EMPTY_ID, operation, id);
		return serializeFilterValue(id);
	}
	return parseInt64(id, operation).toString();
}

function coerceScalar(value: MetadataScalar): BackendScalar {
	return value instanceof Date ? value.toISOString() : value;
}

/**
 * Timestamps become ISO-8601 strings; everything else passes through.
 */
export function coerceMetadataValue(value: MetadataValue): BackendValue {
	if (value === null) return null;
	if (Array.isArray(value)) return value.map(coerceScalar);
	return coerceScalar(value);
}

/**
 * Map an entry to the row written to the collection.
 *
 * Chunk type and content are written last so they win over same-named
 * metadata keys.
 *
 * @throws {ConversionError} If the id cannot be converted
 */
export function toBackendRecord(
	entry: VectorEntry,
	config: StoreConfiguration,
	operation: string = 'add'
): BackendRecord {
	const record: BackendRecord = {};

	if (config.storeMetadata && entry.metadata) {
		for (const [key, value] of Object.entries(entry.metadata)) {
			record[key] = coerceMetadataValue(value);
		}
	}

	record[config.typeFieldName] = entry.chunk.type;
	record[config.chunkFieldName] = entry.chunk.content;
	record[config.vectorField] = entry.embedding;
	record[config.primaryKeyField] = toPrimaryKey(entry.id, config, operation);

	return record;
}
