/**
 * Byte Utilities
 * Low-level byte helpers shared by the serializers, the puzzle solver and the miner
 */

/**
 * Convert hex string to Uint8Array
 * Handles '0x' prefix and validates input
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.startsWith('0x') ? hex.slice(2) : hex;

  if (clean.length % 2 !== 0) {
    throw new Error('hexToBytes: invalid hex string length');
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < clean.length; i += 2) {
    const byte = parseInt(clean.substring(i, i + 2), 16);
    if (isNaN(byte)) {
      throw new Error(`hexToBytes: invalid hex character at position ${i}`);
    }
    bytes[i / 2] = byte;
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Compare two Uint8Arrays for equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Lexicographic comparison of the first `length` bytes (memcmp semantics)
 */
export function compareBytes(a: Uint8Array, b: Uint8Array, length: number): number {
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}

/**
 * True when every byte is zero
 */
export function isZeroBytes(bytes: Uint8Array): boolean {
  return bytes.every(b => b === 0);
}

/**
 * Reverse a Uint8Array (internal byte order <-> display order)
 */
export function reverseBytes(bytes: Uint8Array): Uint8Array {
  const result = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    result[i] = bytes[bytes.length - 1 - i];
  }
  return result;
}

/**
 * Convert number to little-endian bytes (up to 4 bytes)
 */
export function numberToLEBytes(num: number, byteLength: number): Uint8Array {
  const bytes = new Uint8Array(byteLength);
  for (let i = 0; i < byteLength; i++) {
    bytes[i] = (num >> (8 * i)) & 0xff;
  }
  return bytes;
}

/**
 * Convert little-endian bytes to number (up to 4 bytes)
 */
export function leBytesToNumber(bytes: Uint8Array): number {
  let result = 0;
  for (let i = 0; i < bytes.length; i++) {
    result |= bytes[i] << (8 * i);
  }
  return result >>> 0; // Ensure unsigned
}

/**
 * Convert bigint to little-endian bytes, wrapping modulo 2^(8 * byteLength)
 */
export function bigintToLEBytes(num: bigint, byteLength: number): Uint8Array {
  const bytes = new Uint8Array(byteLength);
  let n = num;
  for (let i = 0; i < byteLength; i++) {
    bytes[i] = Number(n & 0xffn);
    n >>= 8n;
  }
  return bytes;
}

/**
 * Convert little-endian bytes to (unsigned) bigint
 */
export function leBytesToBigint(bytes: Uint8Array): bigint {
  let result = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    result = (result << 8n) | BigInt(bytes[i]);
  }
  return result;
}

/**
 * Write compact size encoding to DataView
 * Returns the offset just past the written bytes
 */
export function writeCompactSize(
  view: DataView,
  offset: number,
  value: number
): number {
  if (value < 0xfd) {
    view.setUint8(offset, value);
    return offset + 1;
  } else if (value <= 0xffff) {
    view.setUint8(offset, 0xfd);
    view.setUint16(offset + 1, value, true);
    return offset + 3;
  } else if (value <= 0xffffffff) {
    view.setUint8(offset, 0xfe);
    view.setUint32(offset + 1, value, true);
    return offset + 5;
  } else {
    view.setUint8(offset, 0xff);
    view.setBigUint64(offset + 1, BigInt(value), true);
    return offset + 9;
  }
}

/**
 * Calculate compact size encoding length
 */
export function compactSizeLength(value: number): number {
  if (value < 0xfd) return 1;
  if (value <= 0xffff) return 3;
  if (value <= 0xffffffff) return 5;
  return 9;
}

/**
 * Write raw bytes into a DataView-backed buffer, returning the next offset
 */
export function writeBytes(view: DataView, offset: number, bytes: Uint8Array): number {
  new Uint8Array(view.buffer, view.byteOffset + offset, bytes.length).set(bytes);
  return offset + bytes.length;
}

/**
 * Write a compact-size length prefix followed by the bytes themselves
 */
export function writeVarBytes(view: DataView, offset: number, bytes: Uint8Array): number {
  return writeBytes(view, writeCompactSize(view, offset, bytes.length), bytes);
}

/**
 * Serialized length of a compact-size prefixed byte string
 */
export function varBytesLength(bytes: Uint8Array): number {
  return compactSizeLength(bytes.length) + bytes.length;
}
