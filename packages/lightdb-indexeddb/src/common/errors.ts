/**
 * Status codes carried by every StoreError.
 */
export enum StatusCode {
	ERROR = 1,
	ABORT = 4,
	INTERRUPT = 9,
	CORRUPT = 11,
	CANTOPEN = 14,
	MISUSE = 21,
	UNSUPPORTED = 30,
}

/**
 * Base class for lightdb store errors.
 * The underlying engine error, when there is one, is kept as `cause`.
 */
export class StoreError extends Error {
	public code: StatusCode;

	constructor(message: string, code: StatusCode = StatusCode.ERROR, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.code = code;
		this.name = 'StoreError';

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

export enum OpenErrorKind {
	/** No global scope exposing IndexedDB. */
	NoWindow = 'no-window',
	/** The scope has an IndexedDB slot, but it is unset, disabled or throws on access. */
	IndexedDbNotSupported = 'indexeddb-not-supported',
	/** The open request itself failed. */
	OpenFailed = 'open-failed',
}

/**
 * Error when opening the database.
 */
export class OpenError extends StoreError {
	public kind: OpenErrorKind;

	constructor(kind: OpenErrorKind, message: string, cause?: unknown) {
		super(message, kind === OpenErrorKind.OpenFailed ? StatusCode.CANTOPEN : StatusCode.UNSUPPORTED, cause);
		this.kind = kind;
		this.name = 'OpenError';
	}
}

export enum AccessErrorKind {
	Corrupted = 'corrupted',
	TransactionError = 'transaction-error',
}

export enum CorruptedError {
	/** A stored value is not a string. */
	UnexpectedValueType = 'unexpected-value-type',
}

/**
 * Error reading or writing an open database.
 */
export class AccessError extends StoreError {
	public kind: AccessErrorKind;
	public corruption?: CorruptedError;

	private constructor(kind: AccessErrorKind, message: string, code: StatusCode, cause?: unknown, corruption?: CorruptedError) {
		super(message, code, cause);
		this.kind = kind;
		this.corruption = corruption;
		this.name = 'AccessError';
	}

	static corrupted(corruption: CorruptedError, detail: string): AccessError {
		return new AccessError(AccessErrorKind.Corrupted, `Database corrupted (${corruption}): ${detail}`, StatusCode.CORRUPT, undefined, corruption);
	}

	static transaction(cause: unknown, detail = 'Error while committing transaction'): AccessError {
		const reason = cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
		return new AccessError(AccessErrorKind.TransactionError, `${detail}: ${reason}`, StatusCode.ABORT, cause);
	}
}

/**
 * A caller or schema bug rather than an environmental failure: an unknown collection,
 * an undecodable header, an invalid schema version, or use of a closed handle.
 */
export class PreconditionError extends StoreError {
	constructor(message: string, cause?: unknown) {
		super(message, StatusCode.MISUSE, cause);
		this.name = 'PreconditionError';
	}
}

/**
 * The caller's signal aborted, or the wait timed out, before the engine answered.
 */
export class CancelledError extends StoreError {
	constructor(message: string, cause?: unknown) {
		super(message, StatusCode.INTERRUPT, cause);
		this.name = 'CancelledError';
	}
}
