/**
 * Transaction scoping and completion.
 */

import { createLogger } from './common/logger.js';
import { AccessError, PreconditionError } from './common/errors.js';
import { eventTargetError, settle, type SettleOptions } from './completion.js';

const log = createLogger('indexeddb:transaction');

export type AccessMode = Extract<IDBTransactionMode, 'readonly' | 'readwrite'>;

/**
 * Open a transaction over `collections`.
 *
 * An unknown collection is a programming error and throws PreconditionError rather than
 * surfacing as an access failure.
 */
export function beginTransaction(
	database: IDBDatabase,
	collections: readonly string[],
	mode: AccessMode
): IDBTransaction {
	const missing = collections.filter(name => !database.objectStoreNames.contains(name));
	if (missing.length > 0) {
		throw new PreconditionError(`Unknown collection(s) in ${database.name}: ${missing.join(', ')}`);
	}
	if (collections.length === 0) {
		throw new PreconditionError('A transaction needs at least one collection');
	}
	log('Begin %s transaction over %o', mode, collections);
	return database.transaction([...collections], mode);
}

/**
 * Wait for the transaction's terminal notification.
 *
 * Resolves on `complete`. `abort` and `error` reject with AccessError, carrying the
 * transaction's error, else the failing request's, else an AbortError for an explicit abort.
 */
export async function waitForTransaction(transaction: IDBTransaction, options?: SettleOptions): Promise<void> {
	const event = await settle(transaction, ['complete', 'abort', 'error'], options);

	if (event.type === 'complete' && transaction.error === null) {
		return;
	}

	const cause = transaction.error
		?? eventTargetError(event)
		?? new DOMException('Transaction was aborted', 'AbortError');
	log('Transaction ended with %s: %s', event.type, cause.message);
	throw AccessError.transaction(cause);
}
