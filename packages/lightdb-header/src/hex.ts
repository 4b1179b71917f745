import { bytesToHex, hexToBytes } from '@noble/hashes/utils';

/** Lowercase hex, no `0x` prefix. */
export function toHex(bytes: Uint8Array): string {
	return bytesToHex(bytes);
}

/**
 * Parse hex text, with or without a `0x` prefix.
 * Throws on odd length or non-hex characters.
 */
export function fromHex(text: string): Uint8Array {
	return hexToBytes(text.startsWith('0x') ? text.slice(2) : text);
}
