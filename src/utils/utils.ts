// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Checks if the input object is a Uint8Array.
 * @param obj - The object to check.
 * @returns True if the object is a Uint8Array, false otherwise.
 */
export function isUint8Array(obj: unknown): obj is Uint8Array {
  return obj instanceof Uint8Array;
}

/**
 * Accepts either a Uint8Array or a plain array of byte values.
 * Plain numbers are masked to 8 bits.
 */
export function toUint8Array(bytes: Uint8Array | readonly number[]): Uint8Array {
  if (isUint8Array(bytes)) return bytes;
  return Uint8Array.from(bytes, b => b & 0xff);
}

/**
 * Returns a buffer of exactly `size` bytes: shorter input is right-padded with zeros,
 * longer input is cut.
 * @param bytes - source bytes
 * @param size - length of the result
 */
export function fitPayload(bytes: Uint8Array, size: number): Uint8Array {
  if (bytes.length === size) return bytes;
  const out = new Uint8Array(size); // zero-filled
  out.set(bytes.subarray(0, size));
  return out;
}

/**
 * ORs `source` into `target` byte by byte, up to the shorter of the two.
 * @returns target
 */
export function orInto(target: Uint8Array, source: Uint8Array): Uint8Array {
  const n = Math.min(target.length, source.length);
  for (let i = 0; i < n; i++) {
    target[i] = (target[i] ?? 0) | (source[i] ?? 0);
  }
  return target;
}

/**
 * Converts a Uint8Array to a hex string (optimized with lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @returns A hex string representation of the input Uint8Array.
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += (HEX_TABLE[(b >> 4) & 0xf] ?? '') + (HEX_TABLE[b & 0xf] ?? '');
  }
  return hex;
}

/**
 * Reads one value from a Map or a plain record; undefined when absent.
 */
export function lookupValue(
  values: Map<string, number> | Record<string, number>,
  key: string
): number | undefined {
  if (values instanceof Map) return values.get(key);
  return Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined;
}
