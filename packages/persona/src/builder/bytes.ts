/**
 * Byte helpers shared by the builders
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function toBytes(body: Uint8Array | string): Uint8Array {
  return typeof body === 'string' ? encoder.encode(body) : body;
}

export function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const joined = new Uint8Array(a.length + b.length);
  joined.set(a, 0);
  joined.set(b, a.length);
  return joined;
}

/**
 * Number of characters (code points) in a UTF-8 payload
 */
export function countCharacters(payload: Uint8Array): number {
  return Array.from(decoder.decode(payload)).length;
}
