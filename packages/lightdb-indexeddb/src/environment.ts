/**
 * Locating the IndexedDB factory of the host.
 */

import { OpenError, OpenErrorKind } from './common/errors.js';

function isIdbFactory(value: unknown): value is IDBFactory {
	return typeof value === 'object'
		&& value !== null
		&& 'open' in value
		&& typeof value.open === 'function';
}

/**
 * Read `indexedDB` from a global scope (a window, a worker, or Node with a polyfill).
 *
 * @throws OpenError NoWindow when the scope has no `indexedDB` slot at all, and
 *   IndexedDbNotSupported when the slot is empty, not a factory, or throws on access
 *   (some browsers throw SecurityError in sandboxed frames or private modes).
 */
export function resolveIndexedDB(scope: object = globalThis): IDBFactory {
	if (!('indexedDB' in scope)) {
		throw new OpenError(OpenErrorKind.NoWindow, 'No global scope exposing IndexedDB');
	}

	let factory: unknown;
	try {
		factory = Reflect.get(scope, 'indexedDB');
	} catch (err) {
		throw new OpenError(OpenErrorKind.IndexedDbNotSupported, 'IndexedDB is not supported by the environment', err);
	}

	if (!isIdbFactory(factory)) {
		throw new OpenError(OpenErrorKind.IndexedDbNotSupported, 'IndexedDB is not supported by the environment');
	}
	return factory;
}
