/**
 * Block header codec for lightdb.
 *
 * @example
 * ```typescript
 * import { decodeHeader, hashHeader, toHex } from '@lightdb/header';
 *
 * const { number } = decodeHeader(bytes);
 * const hash = toHex(hashHeader(bytes));
 * ```
 */

export { decodeCompact, encodeCompact, type CompactDecoded } from './compact.js';
export {
	decodeHeader,
	encodeHeader,
	hashHeader,
	HASH_LENGTH,
	ENGINE_ID_LENGTH,
	type Header,
	type DigestItem,
	type EngineDigestItem,
} from './header.js';
export { toHex, fromHex } from './hex.js';
export { HeaderDecodeError } from './errors.js';
