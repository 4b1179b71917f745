/**
 * Object store layout of a lightdb database and its upgrade path.
 *
 *   block-headers  key: hex block hash    value: hex SCALE-encoded header
 *   best-chain     key: block number      value: hex block hash
 */

import { createLogger } from './common/logger.js';
import { PreconditionError } from './common/errors.js';

const log = createLogger('indexeddb:schema');

/** Database version this code expects. Bump together with a new block in createSchema. */
export const SCHEMA_VERSION = 1;

export const Collections = {
	BlockHeaders: 'block-headers',
	BestChain: 'best-chain',
} as const;

export type CollectionName = typeof Collections[keyof typeof Collections];

/**
 * Bring a database from `oldVersion` up to SCHEMA_VERSION.
 *
 * Runs inside `upgradeneeded`. Upgrades only ever add stores; an existing store with the same
 * name makes createObjectStore throw ConstraintError, which is left to abort the upgrade since
 * it means the recorded version is wrong.
 */
export function createSchema(database: IDBDatabase, oldVersion: number): void {
	if (!Number.isInteger(oldVersion) || oldVersion < 0) {
		throw new PreconditionError(`Invalid stored schema version: ${oldVersion}`);
	}

	if (oldVersion < 1) {
		log('Creating version 1 stores in %s', database.name);
		database.createObjectStore(Collections.BlockHeaders);
		database.createObjectStore(Collections.BestChain);
	}

	// Later versions follow the same shape:
	// if (oldVersion < N) {
	// 	database.createObjectStore('...');
	// }
}
