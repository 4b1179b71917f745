/**
 * Error thrown when header bytes cannot be decoded.
 */
export class HeaderDecodeError extends Error {
	/** Byte offset at which decoding failed. */
	public offset: number;

	constructor(message: string, offset: number) {
		super(`${message} (at byte ${offset})`);
		this.name = 'HeaderDecodeError';
		this.offset = offset;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, HeaderDecodeError);
		}
	}
}
