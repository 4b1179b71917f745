import { expect } from 'chai';
import { decodeCompact, encodeCompact } from '../src/compact.js';
import { HeaderDecodeError } from '../src/errors.js';

describe('compact integers', () => {
	describe('decodeCompact', () => {
		it('decodes single-byte mode', () => {
			expect(decodeCompact(Uint8Array.of(0x00))).to.deep.equal({ value: 0n, length: 1 });
			expect(decodeCompact(Uint8Array.of(0xa8))).to.deep.equal({ value: 42n, length: 1 });
		});

		it('decodes two-byte mode', () => {
			expect(decodeCompact(Uint8Array.of(0x15, 0x01))).to.deep.equal({ value: 69n, length: 2 });
		});

		it('decodes four-byte mode', () => {
			expect(decodeCompact(Uint8Array.of(0xfe, 0xff, 0x03, 0x00))).to.deep.equal({ value: 65535n, length: 4 });
		});

		it('decodes big-integer mode', () => {
			expect(decodeCompact(Uint8Array.of(0x03, 0x00, 0x00, 0x00, 0x40))).to.deep.equal({ value: 1n << 30n, length: 5 });
		});

		it('reads at an offset', () => {
			expect(decodeCompact(Uint8Array.of(0xff, 0xff, 0x04), 2)).to.deep.equal({ value: 1n, length: 1 });
		});

		it('rejects truncated input', () => {
			expect(() => decodeCompact(Uint8Array.of(0x01))).to.throw(HeaderDecodeError, /needs 2 bytes/);
			expect(() => decodeCompact(new Uint8Array(0))).to.throw(HeaderDecodeError);
		});
	});

	describe('encodeCompact', () => {
		it('picks the shortest mode', () => {
			expect(encodeCompact(42)).to.deep.equal(Uint8Array.of(0xa8));
			expect(encodeCompact(69)).to.deep.equal(Uint8Array.of(0x15, 0x01));
			expect(encodeCompact(65535)).to.deep.equal(Uint8Array.of(0xfe, 0xff, 0x03, 0x00));
			expect(encodeCompact(1n << 30n)).to.deep.equal(Uint8Array.of(0x03, 0x00, 0x00, 0x00, 0x40));
		});

		it('handles mode boundaries', () => {
			expect(encodeCompact(63)).to.have.length(1);
			expect(encodeCompact(64)).to.have.length(2);
			expect(encodeCompact((1 << 14) - 1)).to.have.length(2);
			expect(encodeCompact(1 << 14)).to.have.length(4);
		});

		it('rejects negative values', () => {
			expect(() => encodeCompact(-1)).to.throw(RangeError);
		});

		it('decodes what it encodes', () => {
			const value = 2n ** 64n - 1n;
			const encoded = encodeCompact(value);
			expect(decodeCompact(encoded)).to.deep.equal({ value, length: encoded.length });
		});
	});
});
