/**
 * SCALE compact integers.
 *
 * The two low bits of the first byte select the mode:
 *   0b00 - one byte, values below 2^6
 *   0b01 - two bytes little-endian, values below 2^14
 *   0b10 - four bytes little-endian, values below 2^30
 *   0b11 - (first >> 2) + 4 further bytes little-endian, up to 2^536 - 1
 */

import { HeaderDecodeError } from './errors.js';

/** Largest payload of the big-integer mode. */
const MAX_BIG_MODE_BYTES = 67;

export interface CompactDecoded {
	value: bigint;
	/** Number of bytes consumed, including the mode byte. */
	length: number;
}

function requireBytes(bytes: Uint8Array, offset: number, count: number): void {
	if (offset + count > bytes.length) {
		throw new HeaderDecodeError(`Compact integer needs ${count} bytes, found ${bytes.length - offset}`, offset);
	}
}

/**
 * Decode the compact integer starting at `offset`.
 */
export function decodeCompact(bytes: Uint8Array, offset = 0): CompactDecoded {
	requireBytes(bytes, offset, 1);
	const first = bytes[offset];

	switch (first & 0b11) {
		case 0b00:
			return { value: BigInt(first >> 2), length: 1 };
		case 0b01: {
			requireBytes(bytes, offset, 2);
			const raw = first | (bytes[offset + 1] << 8);
			return { value: BigInt(raw >> 2), length: 2 };
		}
		case 0b10: {
			requireBytes(bytes, offset, 4);
			const raw = (first
				| (bytes[offset + 1] << 8)
				| (bytes[offset + 2] << 16)
				| (bytes[offset + 3] << 24)) >>> 0;
			return { value: BigInt(raw >>> 2), length: 4 };
		}
		default: {
			const size = (first >> 2) + 4;
			requireBytes(bytes, offset, 1 + size);
			let value = 0n;
			for (let i = size; i > 0; i--) {
				value = (value << 8n) | BigInt(bytes[offset + i]);
			}
			return { value, length: 1 + size };
		}
	}
}

/**
 * Encode a non-negative integer in its shortest compact form.
 */
export function encodeCompact(input: bigint | number): Uint8Array {
	const value = BigInt(input);
	if (value < 0n) {
		throw new RangeError(`Compact integers are unsigned, got ${value}`);
	}

	if (value < 1n << 6n) {
		return Uint8Array.of(Number(value << 2n));
	}
	if (value < 1n << 14n) {
		const raw = Number((value << 2n) | 0b01n);
		return Uint8Array.of(raw & 0xff, raw >> 8);
	}
	if (value < 1n << 30n) {
		const raw = Number((value << 2n) | 0b10n);
		return Uint8Array.of(raw & 0xff, (raw >> 8) & 0xff, (raw >> 16) & 0xff, raw >>> 24);
	}

	const payload: number[] = [];
	for (let rest = value; rest > 0n; rest >>= 8n) {
		payload.push(Number(rest & 0xffn));
	}
	if (payload.length > MAX_BIG_MODE_BYTES) {
		throw new RangeError(`Value needs ${payload.length} bytes; compact integers hold at most ${MAX_BIG_MODE_BYTES}`);
	}
	return Uint8Array.of(((payload.length - 4) << 2) | 0b11, ...payload);
}
