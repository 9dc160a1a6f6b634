import { describe, it, expect } from 'vitest';
import type { CodecLayout } from '../src/codec/signal-codec.js';
import {
  decodeSignal,
  encodeSignal,
  extractRaw,
  readPayloadWord,
  uint64ToFloat32,
  writePayloadWord,
} from '../src/codec/signal-codec.js';
import { DbcOverflowError } from '../src/errors.js';

const ENGINE_SPEED: CodecLayout = {
  startBit: 24,
  bitLength: 16,
  littleEndian: true,
  scale: 0.125,
  offset: 0,
};

const ALT_SPEED: CodecLayout = {
  startBit: 41,
  bitLength: 16,
  littleEndian: false,
  scale: 0.125,
  offset: 10,
};

const MSG = [0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77, 0x88];
const MSG_BE = [...MSG].reverse();

describe('payload word', () => {
  it('reads little endian with byte 0 least significant', () => {
    expect(readPayloadWord(Uint8Array.from(MSG), true)).toBe(0x8877665544332211n);
  });

  it('reads big endian with byte 0 most significant', () => {
    expect(readPayloadWord(Uint8Array.from(MSG), false)).toBe(0x1122334455667788n);
  });

  it('zero-extends short payloads on the high-index side', () => {
    expect(readPayloadWord(Uint8Array.from([0x01, 0x02]), true)).toBe(0x0201n);
    expect(readPayloadWord(Uint8Array.from([0x01, 0x02]), false)).toBe(0x0102000000000000n);
  });

  it('writes a word in the requested byte order', () => {
    expect([...writePayloadWord(0x0102n, false)]).toEqual([0, 0, 0, 0, 0, 0, 1, 2]);
    expect([...writePayloadWord(0x0102n, true)]).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
  });

  it('drops bits above 64 when writing', () => {
    expect([...writePayloadWord((1n << 64n) | 1n, true)]).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe('decodeSignal', () => {
  it('decodes a little endian signal', () => {
    expect(decodeSignal(ENGINE_SPEED, MSG)).toBe(2728.5);
  });

  it('decodes the same value from a byte-reversed big endian payload', () => {
    expect(decodeSignal({ ...ENGINE_SPEED, littleEndian: false }, MSG_BE)).toBe(2728.5);
  });

  it('accepts a 7-byte payload', () => {
    expect(decodeSignal(ENGINE_SPEED, MSG.slice(0, 7))).toBe(2728.5);
    expect(decodeSignal({ ...ENGINE_SPEED, littleEndian: false }, MSG_BE.slice(0, 7))).toBe(
      2728.5
    );
  });

  it('reads only the first 8 bytes of a longer payload', () => {
    expect(decodeSignal(ENGINE_SPEED, [...MSG, 0xff, 0xff])).toBe(2728.5);
  });

  it('accepts a Uint8Array', () => {
    expect(decodeSignal(ENGINE_SPEED, Uint8Array.from(MSG))).toBe(2728.5);
  });

  it('returns null for an empty payload', () => {
    expect(decodeSignal(ENGINE_SPEED, [])).toBeNull();
    expect(decodeSignal(ENGINE_SPEED, new Uint8Array(0))).toBeNull();
  });

  it('rounds every step to single precision', () => {
    const layout: CodecLayout = { startBit: 0, bitLength: 8, littleEndian: true, scale: 0.1, offset: 0 };
    expect(decodeSignal(layout, [1])).toBe(Math.fround(0.1));
  });

  it('does not sign-extend raw values', () => {
    const layout: CodecLayout = { startBit: 0, bitLength: 8, littleEndian: true, scale: 1, offset: 0 };
    expect(decodeSignal(layout, [0xff])).toBe(255);
  });

  it('rounds wide raw values to float32 in a single step', () => {
    const wide: CodecLayout = { startBit: 0, bitLength: 64, littleEndian: true, scale: 1, offset: 0 };
    // raw = 2^60 + 2^36 + 1: just above the halfway point between 2^60 and 2^60 + 2^37
    const payload = [0x01, 0x00, 0x00, 0x00, 0x10, 0x00, 0x00, 0x10];
    expect(decodeSignal(wide, payload)).toBe(2 ** 60 + 2 ** 37);
  });

  it('decodes an all-ones 64-bit raw value as 2^64', () => {
    const wide: CodecLayout = { startBit: 0, bitLength: 64, littleEndian: false, scale: 1, offset: 0 };
    expect(decodeSignal(wide, Array.from({ length: 8 }, () => 0xff))).toBe(2 ** 64);
  });

  it('extracts the unscaled bits', () => {
    expect(extractRaw(ENGINE_SPEED, Uint8Array.from(MSG))).toBe(0x5544n);
  });
});

describe('encodeSignal', () => {
  it('places the raw value at the start bit', () => {
    expect([...encodeSignal(ENGINE_SPEED, 2728.5)]).toEqual([0, 0, 0, 0x44, 0x55, 0, 0, 0]);
  });

  it('applies offset and writes big endian', () => {
    expect([...encodeSignal(ALT_SPEED, 2728.5)]).toEqual([0x00, 0xa9, 0xe8, 0, 0, 0, 0, 0]);
  });

  it('decodes back to the encoded value', () => {
    expect(decodeSignal(ENGINE_SPEED, encodeSignal(ENGINE_SPEED, 1234.5))).toBe(1234.5);
    expect(decodeSignal(ALT_SPEED, encodeSignal(ALT_SPEED, 1234.5))).toBe(1234.5);
  });

  it('rejects values whose magnitude exceeds the bit width', () => {
    expect(() => encodeSignal(ENGINE_SPEED, 1e10)).toThrow(DbcOverflowError);
    expect(() => encodeSignal(ENGINE_SPEED, 98304 * 0.125)).toThrow(
      'Signal value 98304 does not fit into 16 bits'
    );
  });

  it('lets a raw value of exactly 2^bitLength through', () => {
    // 65536 << 24 = 2^40, i.e. bit 0 of byte 5
    expect([...encodeSignal(ENGINE_SPEED, 8192)]).toEqual([0, 0, 0, 0, 0, 1, 0, 0]);
  });

  it('maps negative and NaN raw values to zero', () => {
    expect([...encodeSignal(ENGINE_SPEED, -10)]).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    expect([...encodeSignal(ENGINE_SPEED, Number.NaN)]).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('truncates fractional raw values', () => {
    // 1.3 / 0.125 = 10.4 -> 10
    expect([...encodeSignal(ENGINE_SPEED, 1.3)]).toEqual([0, 0, 0, 10, 0, 0, 0, 0]);
  });
});

describe('uint64ToFloat32', () => {
  it('keeps values up to 24 bits exact', () => {
    expect(uint64ToFloat32(0n)).toBe(0);
    expect(uint64ToFloat32(0xffffffn)).toBe(0xffffff);
  });

  it('rounds halfway cases to an even significand', () => {
    // significand 2^23 is even: stays
    expect(uint64ToFloat32((1n << 60n) + (1n << 36n))).toBe(2 ** 60);
    // significand 2^23 + 1 is odd: rounds up
    expect(uint64ToFloat32((1n << 60n) + (1n << 37n) + (1n << 36n))).toBe(2 ** 60 + 2 ** 38);
  });

  it('rounds up when any discarded bit lies past the halfway point', () => {
    expect(uint64ToFloat32((1n << 60n) + (1n << 36n) + 1n)).toBe(2 ** 60 + 2 ** 37);
    expect(uint64ToFloat32((1n << 63n) + (1n << 39n) + (1n << 2n))).toBe(2 ** 63 + 2 ** 40);
  });
});

describe('encode then decode', () => {
  function largestExact(bitLength: number): number {
    return bitLength <= 24 ? 2 ** bitLength - 1 : 2 ** 24;
  }

  for (const littleEndian of [true, false]) {
    it(`returns the encoded value for every layout (${littleEndian ? 'little' : 'big'} endian)`, () => {
      const mismatches: string[] = [];
      for (let startBit = 0; startBit < 64; startBit++) {
        for (let bitLength = 1; startBit + bitLength <= 64; bitLength++) {
          const layout: CodecLayout = { startBit, bitLength, littleEndian, scale: 1, offset: 0 };
          for (const value of [0, 1, largestExact(bitLength)]) {
            const decoded = decodeSignal(layout, encodeSignal(layout, value));
            if (decoded !== value) mismatches.push(`${startBit}|${bitLength}: ${value} -> ${decoded}`);
          }
        }
      }
      expect(mismatches).toEqual([]);
    });
  }
});
