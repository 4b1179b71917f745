/**
 * Persistent storage of light-client headers in IndexedDB.
 *
 * One handle owns one IDBDatabase connection. Headers go into `block-headers` keyed by their
 * hash, and `best-chain` maps each inserted header's number to its hash.
 */

import { decodeHeader, hashHeader, toHex } from '@lightdb/header';
import { createLogger } from './common/logger.js';
import {
	AccessError,
	CancelledError,
	CorruptedError,
	OpenError,
	OpenErrorKind,
	PreconditionError,
} from './common/errors.js';
import { settleRequest, type SettleOptions } from './completion.js';
import { resolveIndexedDB } from './environment.js';
import { Collections, createSchema, SCHEMA_VERSION, type CollectionName } from './schema.js';
import { beginTransaction, waitForTransaction } from './transaction.js';

const log = createLogger('indexeddb:database');
const warnLog = log.extend('warn');

/** How long open waits for the engine unless told otherwise. */
export const DEFAULT_OPEN_TIMEOUT_MS = 10_000;

/**
 * Hashing and decoding of encoded headers.
 */
export interface HeaderCodec {
	hash(encodedHeader: Uint8Array): Uint8Array;
	decode(encodedHeader: Uint8Array): { number: number };
}

/** SCALE-encoded headers hashed with blake2b-256. */
export const scaleHeaderCodec: HeaderCodec = {
	hash: hashHeader,
	decode: decodeHeader,
};

/** Cancellation options accepted by every awaited operation. */
export type OperationOptions = SettleOptions;

export interface OpenOptions extends OperationOptions {
	/**
	 * Global scope to find `indexedDB` on: a window, a worker, or any object with that slot.
	 * @default globalThis
	 */
	scope?: object;

	/**
	 * Header hashing and decoding.
	 * @default scaleHeaderCodec
	 */
	codec?: HeaderCodec;
}

export type CollectionKey = string | number;

function hasErrorName(err: unknown, name: string): boolean {
	return typeof err === 'object' && err !== null && 'name' in err && err.name === name;
}

function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
	if (signal?.aborted) {
		throw new CancelledError(`${what} cancelled before it started`, signal.reason);
	}
}

/**
 * An open database.
 *
 * Single-owner: the handle is not meant to be shared by independent callers. `close()` must
 * be called once the handle is no longer needed, or use {@link withDatabase}.
 */
export class HeaderDatabase {
	private readonly connection: IDBDatabase;
	private readonly codec: HeaderCodec;
	private readonly inFlight = new Set<Promise<unknown>>();
	private closePromise: Promise<void> | null = null;
	private closed = false;
	private connectionReleased = false;

	private constructor(connection: IDBDatabase, codec: HeaderCodec) {
		this.connection = connection;
		this.codec = codec;

		// Another context wants to upgrade this database; holding on would block it.
		connection.addEventListener('versionchange', () => {
			warnLog('Version change requested on %s; closing this connection', connection.name);
			this.closed = true;
			this.releaseConnection();
		});
	}

	/**
	 * Open (creating or upgrading as needed) the database called `name`.
	 *
	 * @throws OpenError when IndexedDB is unavailable or the open request fails
	 * @throws CancelledError when the signal aborts or the timeout elapses first
	 */
	static async open(name: string, options: OpenOptions = {}): Promise<HeaderDatabase> {
		const { signal, timeoutMs = DEFAULT_OPEN_TIMEOUT_MS, codec = scaleHeaderCodec } = options;
		const factory = resolveIndexedDB(options.scope);
		throwIfAborted(signal, 'Open');

		log('Opening %s at version %d', name, SCHEMA_VERSION);
		let request: IDBOpenDBRequest;
		try {
			request = factory.open(name, SCHEMA_VERSION);
		} catch (err) {
			// Browsers throw SecurityError here when storage is denied to the context.
			const kind = hasErrorName(err, 'SecurityError') ? OpenErrorKind.IndexedDbNotSupported : OpenErrorKind.OpenFailed;
			throw new OpenError(kind, `Failed to open IndexedDB database '${name}'`, err);
		}
		let schemaError: unknown;

		request.addEventListener('upgradeneeded', event => {
			log('Upgrading %s from version %d', name, event.oldVersion);
			try {
				createSchema(request.result, event.oldVersion);
			} catch (err) {
				schemaError = err;
				warnLog('Schema upgrade of %s failed: %O', name, err);
				request.transaction?.abort();
			}
		});

		request.addEventListener('blocked', () => {
			// Other connections get a versionchange event and should close; keep waiting.
			warnLog('Open of %s is blocked by another connection, waiting...', name);
		});

		try {
			await settleRequest(request, { signal, timeoutMs });
		} catch (err) {
			// The engine may still hand over a connection later; nobody will own it.
			request.addEventListener('success', () => request.result.close());
			throw err;
		}

		if (schemaError !== undefined || request.error) {
			throw new OpenError(
				OpenErrorKind.OpenFailed,
				`Failed to open IndexedDB database '${name}': ${request.error?.message ?? 'schema upgrade failed'}`,
				schemaError ?? request.error
			);
		}

		log('Opened %s', name);
		return new HeaderDatabase(request.result, codec);
	}

	get name(): string {
		return this.connection.name;
	}

	get version(): number {
		return this.connection.version;
	}

	/** Object store names, sorted. */
	get collections(): string[] {
		return Array.from(this.connection.objectStoreNames).sort();
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Insert an encoded header and point `best-chain` at it for its block number.
	 *
	 * A header that is already stored is left alone, `best-chain` included, and the call
	 * succeeds.
	 *
	 * @throws PreconditionError when the header cannot be decoded or the handle is closed
	 * @throws AccessError (TransactionError) when the engine fails the transaction
	 */
	insertHeader(encodedHeader: Uint8Array, options: OperationOptions = {}): Promise<void> {
		return this.track(() => this.doInsertHeader(encodedHeader, options));
	}

	/**
	 * Read one value.
	 *
	 * An absent key, or one IndexedDB cannot look up (NaN, say), gives undefined.
	 *
	 * @internal Used by this package's tests; not part of the public contract.
	 * @throws AccessError (Corrupted) when the stored value is not a string
	 */
	get(collection: CollectionName, key: CollectionKey, options: OperationOptions = {}): Promise<string | undefined> {
		return this.track(() => this.doGet(collection, key, options));
	}

	/**
	 * Close the connection once every in-flight operation has settled.
	 * Later calls return the same promise.
	 */
	close(): Promise<void> {
		if (!this.closePromise) {
			this.closed = true;
			this.closePromise = this.drainAndRelease();
		}
		return this.closePromise;
	}

	private async drainAndRelease(): Promise<void> {
		if (this.inFlight.size > 0) {
			log('Waiting for %d operation(s) before closing %s', this.inFlight.size, this.name);
			await Promise.allSettled(this.inFlight);
		}
		this.releaseConnection();
	}

	private releaseConnection(): void {
		if (this.connectionReleased) return;
		this.connectionReleased = true;
		this.connection.close();
		log('Closed %s', this.connection.name);
	}

	private async track<T>(operation: () => Promise<T>): Promise<T> {
		if (this.closed) {
			throw new PreconditionError(`Database '${this.connection.name}' is closed`);
		}
		const pending = operation();
		this.inFlight.add(pending);
		try {
			return await pending;
		} finally {
			this.inFlight.delete(pending);
		}
	}

	private async doInsertHeader(encodedHeader: Uint8Array, options: OperationOptions): Promise<void> {
		let hash: Uint8Array;
		let number: number;
		try {
			number = this.codec.decode(encodedHeader).number;
			hash = this.codec.hash(encodedHeader);
		} catch (err) {
			throw new PreconditionError('Cannot insert a header that does not decode', err);
		}
		if (!Number.isSafeInteger(number) || number < 0) {
			throw new PreconditionError(`Header decoded to an invalid block number: ${number}`);
		}
		throwIfAborted(options.signal, 'Insert');

		const key = toHex(hash);
		const value = toHex(encodedHeader);
		const transaction = beginTransaction(this.connection, [Collections.BlockHeaders, Collections.BestChain], 'readwrite');

		let added: IDBRequest;
		try {
			// Argument order is value, then key.
			added = transaction.objectStore(Collections.BlockHeaders).add(value, key);
		} catch (err) {
			throw AccessError.transaction(err, 'Failed to issue header insert');
		}

		let duplicate = false;
		let putError: unknown;

		added.addEventListener('error', event => {
			if (hasErrorName(added.error, 'ConstraintError')) {
				// Already stored. Handled here so the transaction neither aborts nor sees it.
				duplicate = true;
				event.preventDefault();
				event.stopPropagation();
			}
		});

		added.addEventListener('success', () => {
			// Issued from the request callback, while the transaction is still active.
			// TODO: only overwrite when the header extends the stored best chain; needs a reorg policy.
			try {
				transaction.objectStore(Collections.BestChain).put(key, number);
			} catch (err) {
				putError = err;
				transaction.abort();
			}
		});

		try {
			await waitForTransaction(transaction, options);
		} catch (err) {
			if (duplicate) {
				log('Header %s already stored', key);
				return;
			}
			if (putError !== undefined) {
				throw AccessError.transaction(putError, 'Failed to update best chain');
			}
			throw err;
		}

		if (duplicate) {
			log('Header %s already stored', key);
		} else {
			log('Stored header %s at height %d', key, number);
		}
	}

	private async doGet(collection: CollectionName, key: CollectionKey, options: OperationOptions): Promise<string | undefined> {
		throwIfAborted(options.signal, 'Read');
		const transaction = beginTransaction(this.connection, [collection], 'readonly');

		let request: IDBRequest;
		try {
			request = transaction.objectStore(collection).get(key);
		} catch (err) {
			if (hasErrorName(err, 'DataError')) {
				return undefined;
			}
			throw AccessError.transaction(err, `Failed to read ${collection}`);
		}

		await settleRequest(request, options);
		if (request.error) {
			throw AccessError.transaction(request.error, `Failed to read ${collection}`);
		}

		const result: unknown = request.result;
		if (result === undefined) {
			return undefined;
		}
		if (typeof result === 'string') {
			return result;
		}
		throw AccessError.corrupted(
			CorruptedError.UnexpectedValueType,
			`${collection}[${String(key)}] holds a ${typeof result}, expected a string`
		);
	}
}

/**
 * Open `name`, run `fn` with the handle, and close the handle however `fn` exits.
 */
export async function withDatabase<T>(
	name: string,
	fn: (database: HeaderDatabase) => Promise<T> | T,
	options?: OpenOptions
): Promise<T> {
	const database = await HeaderDatabase.open(name, options);
	try {
		return await fn(database);
	} finally {
		await database.close();
	}
}
