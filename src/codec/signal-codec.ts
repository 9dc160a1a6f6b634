// src/codec/signal-codec.ts

import { MAX_PAYLOAD_BYTES, PAYLOAD_WORD_BITS } from '../constants/constants.js';
import { DbcOverflowError } from '../errors.js';
import type { SignalLayout } from '../types/dbc-types.js';
import { fitPayload, toUint8Array } from '../utils/utils.js';

const U64_MAX = (1n << 64n) - 1n;
const TWO_POW_64 = 2 ** 64;
const FLOAT32_SIGNIFICAND_BITS = 24;

/** Layout fields the codec actually reads */
export type CodecLayout = Pick<
  SignalLayout,
  'startBit' | 'bitLength' | 'littleEndian' | 'scale' | 'offset'
>;

function bitMask(bitLength: number): bigint {
  return (1n << BigInt(bitLength)) - 1n;
}

/**
 * Reads the payload as one unsigned 64-bit word.
 * Little endian: byte 0 is least significant; big endian: byte 0 is most significant.
 */
export function readPayloadWord(payload: Uint8Array, littleEndian: boolean): bigint {
  const bytes = fitPayload(payload, MAX_PAYLOAD_BYTES);
  const view = new DataView(bytes.buffer, bytes.byteOffset, MAX_PAYLOAD_BYTES);
  return view.getBigUint64(0, littleEndian);
}

/**
 * Serialises a 64-bit word into 8 bytes in the requested byte order.
 */
export function writePayloadWord(word: bigint, littleEndian: boolean): Uint8Array {
  const out = new Uint8Array(MAX_PAYLOAD_BYTES);
  new DataView(out.buffer).setBigUint64(0, BigInt.asUintN(PAYLOAD_WORD_BITS, word), littleEndian);
  return out;
}

/**
 * Extracts the raw (unscaled) bits of a signal.
 * The signed flag of a layout is not applied: the result is always unsigned.
 */
export function extractRaw(layout: CodecLayout, payload: Uint8Array): bigint {
  const word = readPayloadWord(payload, layout.littleEndian);
  return (word >> BigInt(layout.startBit)) & bitMask(layout.bitLength);
}

/**
 * Rounds an unsigned integer to the nearest float32 in one step, ties to even.
 * Going through `Number()` first would round twice for values above 2^53.
 */
export function uint64ToFloat32(raw: bigint): number {
  const width = raw.toString(2).length;
  if (width <= FLOAT32_SIGNIFICAND_BITS) return Number(raw);

  const shift = BigInt(width - FLOAT32_SIGNIFICAND_BITS);
  let significand = raw >> shift;
  const rest = raw & ((1n << shift) - 1n);
  const half = 1n << (shift - 1n);
  if (rest > half || (rest === half && (significand & 1n) === 1n)) {
    significand += 1n;
  }
  return Math.fround(Number(significand) * 2 ** Number(shift));
}

/**
 * Decodes a physical value from frame bytes.
 *
 * Buffers shorter than 8 bytes are zero-extended, longer ones are read up to 8 bytes.
 * Arithmetic follows single precision: `raw * scale + offset` with every step rounded
 * to float32.
 *
 * @param layout - bit layout of the signal
 * @param bytes - frame payload
 * @returns the physical value, or null for an empty buffer
 */
export function decodeSignal(
  layout: CodecLayout,
  bytes: Uint8Array | readonly number[]
): number | null {
  const payload = toUint8Array(bytes);
  if (payload.length === 0) return null;

  const raw = uint64ToFloat32(extractRaw(layout, payload));
  const scaled = Math.fround(raw * Math.fround(layout.scale));
  return Math.fround(scaled + Math.fround(layout.offset));
}

/**
 * Converts a double to an unsigned 64-bit integer the way a saturating cast does:
 * NaN and negatives become 0, fractions are truncated, huge values clamp to 2^64-1.
 */
function toUint64(raw: number): bigint {
  if (!(raw > 0)) return 0n;
  if (raw >= TWO_POW_64) return U64_MAX;
  return BigInt(Math.trunc(raw));
}

/**
 * Encodes a physical value into an 8-byte contribution for one signal.
 *
 * Only the magnitude is bounded: the value is rejected when `log2(raw) > bitLength`.
 * Bits shifted past bit 63 are dropped.
 *
 * @param layout - bit layout of the signal
 * @param value - physical value
 * @returns 8 bytes with only this signal's bits set
 * @throws DbcOverflowError when the raw value is too large for the bit width
 */
export function encodeSignal(layout: CodecLayout, value: number): Uint8Array {
  const raw = (value - Math.fround(layout.offset)) / Math.fround(layout.scale);

  if (Math.log2(raw) > layout.bitLength) {
    throw new DbcOverflowError(raw, layout.bitLength);
  }

  const word = toUint64(raw) << BigInt(layout.startBit);
  return writePayloadWord(word, layout.littleEndian);
}
