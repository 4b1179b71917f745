/**
 * IndexedDB persistence for lightdb: block headers and the best-chain index.
 *
 * @example
 * ```typescript
 * import { HeaderDatabase, withDatabase } from '@lightdb/indexeddb';
 *
 * const db = await HeaderDatabase.open('chain-db');
 * try {
 *   await db.insertHeader(encodedHeader);
 * } finally {
 *   await db.close();
 * }
 *
 * // or, closing automatically:
 * await withDatabase('chain-db', db => db.insertHeader(encodedHeader));
 * ```
 */

export {
	HeaderDatabase,
	withDatabase,
	scaleHeaderCodec,
	DEFAULT_OPEN_TIMEOUT_MS,
	type HeaderCodec,
	type OpenOptions,
	type OperationOptions,
	type CollectionKey,
} from './database.js';
export { Collections, SCHEMA_VERSION, createSchema, type CollectionName } from './schema.js';
export { beginTransaction, waitForTransaction, type AccessMode } from './transaction.js';
export { settle, type SettleOptions } from './completion.js';
export {
	StoreError,
	StatusCode,
	OpenError,
	OpenErrorKind,
	AccessError,
	AccessErrorKind,
	CorruptedError,
	PreconditionError,
	CancelledError,
} from './common/errors.js';
export { enableLogging, disableLogging } from './common/logger.js';
