/**
 * SCALE-encoded block headers.
 *
 * Layout:
 *   parent_hash      32 bytes
 *   number           compact integer
 *   state_root       32 bytes
 *   extrinsics_root  32 bytes
 *   digest           compact length, then that many digest items
 *
 * A digest item is a one-byte tag followed by its payload. Consensus, seal and pre-runtime
 * items carry a 4-byte engine id and a length-prefixed byte string; "other" carries only the
 * byte string; runtime-environment-updated carries nothing.
 */

import { blake2b } from '@noble/hashes/blake2b';
import { decodeCompact, encodeCompact } from './compact.js';
import { HeaderDecodeError } from './errors.js';

/** Length of block hashes and of the header's root fields. */
export const HASH_LENGTH = 32;

/** Length of a consensus engine id. */
export const ENGINE_ID_LENGTH = 4;

const DigestTag = {
	other: 0,
	consensus: 4,
	seal: 5,
	preRuntime: 6,
	runtimeEnvironmentUpdated: 8,
} as const;

export type EngineDigestItem = {
	type: 'consensus' | 'seal' | 'preRuntime';
	engine: Uint8Array;
	data: Uint8Array;
};

export type DigestItem =
	| { type: 'other'; data: Uint8Array }
	| EngineDigestItem
	| { type: 'runtimeEnvironmentUpdated' };

export interface Header {
	parentHash: Uint8Array;
	number: number;
	stateRoot: Uint8Array;
	extrinsicsRoot: Uint8Array;
	digest: DigestItem[];
}

class ByteReader {
	private offset = 0;

	constructor(private readonly bytes: Uint8Array) {}

	get position(): number {
		return this.offset;
	}

	get remaining(): number {
		return this.bytes.length - this.offset;
	}

	take(count: number, what: string): Uint8Array {
		if (count > this.remaining) {
			throw new HeaderDecodeError(`Truncated ${what}: need ${count} bytes, ${this.remaining} left`, this.offset);
		}
		const slice = this.bytes.slice(this.offset, this.offset + count);
		this.offset += count;
		return slice;
	}

	byte(what: string): number {
		return this.take(1, what)[0];
	}

	compact(): bigint {
		const { value, length } = decodeCompact(this.bytes, this.offset);
		this.offset += length;
		return value;
	}

	/** Compact length followed by that many bytes. */
	byteString(what: string): Uint8Array {
		const start = this.offset;
		const length = this.compact();
		if (length > BigInt(this.remaining)) {
			throw new HeaderDecodeError(`Truncated ${what}: declared ${length} bytes, ${this.remaining} left`, start);
		}
		return this.take(Number(length), what);
	}
}

function decodeDigestItem(reader: ByteReader): DigestItem {
	const start = reader.position;
	const tag = reader.byte('digest item tag');
	switch (tag) {
		case DigestTag.other:
			return { type: 'other', data: reader.byteString('digest item') };
		case DigestTag.consensus:
		case DigestTag.seal:
		case DigestTag.preRuntime: {
			const type = tag === DigestTag.consensus ? 'consensus' : tag === DigestTag.seal ? 'seal' : 'preRuntime';
			const engine = reader.take(ENGINE_ID_LENGTH, 'engine id');
			return { type, engine, data: reader.byteString('digest item') };
		}
		case DigestTag.runtimeEnvironmentUpdated:
			return { type: 'runtimeEnvironmentUpdated' };
		default:
			throw new HeaderDecodeError(`Unknown digest item tag ${tag}`, start);
	}
}

/**
 * Decode a SCALE-encoded header. The whole input must be consumed.
 */
export function decodeHeader(bytes: Uint8Array): Header {
	const reader = new ByteReader(bytes);
	const parentHash = reader.take(HASH_LENGTH, 'parent hash');

	const numberOffset = reader.position;
	const number = reader.compact();
	if (number > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new HeaderDecodeError(`Block number ${number} exceeds the safe integer range`, numberOffset);
	}

	const stateRoot = reader.take(HASH_LENGTH, 'state root');
	const extrinsicsRoot = reader.take(HASH_LENGTH, 'extrinsics root');

	const digestOffset = reader.position;
	const itemCount = reader.compact();
	// Every item is at least one byte, so a larger count can only be truncated.
	if (itemCount > BigInt(reader.remaining)) {
		throw new HeaderDecodeError(`Digest declares ${itemCount} items, ${reader.remaining} bytes left`, digestOffset);
	}
	const digest: DigestItem[] = [];
	for (let i = 0; i < Number(itemCount); i++) {
		digest.push(decodeDigestItem(reader));
	}

	if (reader.remaining !== 0) {
		throw new HeaderDecodeError(`${reader.remaining} trailing bytes after header`, reader.position);
	}

	return { parentHash, number: Number(number), stateRoot, extrinsicsRoot, digest };
}

function requireLength(field: string, value: Uint8Array, length: number): void {
	if (value.length !== length) {
		throw new RangeError(`${field} must be ${length} bytes, got ${value.length}`);
	}
}

function encodeDigestItem(item: DigestItem): Uint8Array[] {
	switch (item.type) {
		case 'other':
			return [Uint8Array.of(DigestTag.other), encodeCompact(item.data.length), item.data];
		case 'runtimeEnvironmentUpdated':
			return [Uint8Array.of(DigestTag.runtimeEnvironmentUpdated)];
		default:
			requireLength('Engine id', item.engine, ENGINE_ID_LENGTH);
			return [Uint8Array.of(DigestTag[item.type]), item.engine, encodeCompact(item.data.length), item.data];
	}
}

/**
 * SCALE-encode a header.
 */
export function encodeHeader(header: Header): Uint8Array {
	requireLength('Parent hash', header.parentHash, HASH_LENGTH);
	requireLength('State root', header.stateRoot, HASH_LENGTH);
	requireLength('Extrinsics root', header.extrinsicsRoot, HASH_LENGTH);
	if (!Number.isSafeInteger(header.number) || header.number < 0) {
		throw new RangeError(`Block number must be a non-negative safe integer, got ${header.number}`);
	}

	const parts: Uint8Array[] = [
		header.parentHash,
		encodeCompact(header.number),
		header.stateRoot,
		header.extrinsicsRoot,
		encodeCompact(header.digest.length),
	];
	for (const item of header.digest) {
		parts.push(...encodeDigestItem(item));
	}

	const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
	let offset = 0;
	for (const part of parts) {
		out.set(part, offset);
		offset += part.length;
	}
	return out;
}

/**
 * Block hash: blake2b with a 32-byte digest over the encoded header.
 */
export function hashHeader(encodedHeader: Uint8Array): Uint8Array {
	return blake2b(encodedHeader, { dkLen: HASH_LENGTH });
}
