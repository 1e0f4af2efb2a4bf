/**
 * Encoding Utilities
 * Base58 and Base58Check for transparent addresses
 */

import { computeChecksum, verifyChecksum } from './hash';
import { concatBytes } from './bytes';

const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';
const BASE58_MAP = new Map<string, number>();
for (let i = 0; i < BASE58_ALPHABET.length; i++) {
  BASE58_MAP.set(BASE58_ALPHABET[i], i);
}

/**
 * Encode bytes to Base58 string
 */
export function base58Encode(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    return '';
  }

  // Count leading zeros
  let leadingZeros = 0;
  for (const byte of bytes) {
    if (byte === 0) {
      leadingZeros++;
    } else {
      break;
    }
  }

  const digits: number[] = [0];
  for (const byte of bytes) {
    let carry = byte;
    for (let i = 0; i < digits.length; i++) {
      carry += digits[i] << 8;
      digits[i] = carry % 58;
      carry = Math.floor(carry / 58);
    }
    while (carry > 0) {
      digits.push(carry % 58);
      carry = Math.floor(carry / 58);
    }
  }

  let result = BASE58_ALPHABET[0].repeat(leadingZeros);
  // A lone zero digit only stands for the value of an all-zero input
  const top = digits.length === 1 && digits[0] === 0 ? -1 : digits.length - 1;
  for (let i = top; i >= 0; i--) {
    result += BASE58_ALPHABET[digits[i]];
  }

  return result;
}

/**
 * Decode Base58 string to bytes
 */
export function base58Decode(str: string): Uint8Array {
  if (str.length === 0) {
    return new Uint8Array(0);
  }

  // Count leading '1's (zeros)
  let leadingOnes = 0;
  for (const char of str) {
    if (char === '1') {
      leadingOnes++;
    } else {
      break;
    }
  }

  const bytes: number[] = [];
  for (const char of str) {
    const digit = BASE58_MAP.get(char);
    if (digit === undefined) {
      throw new Error(`Invalid base58 character: ${char}`);
    }

    let carry = digit;
    for (let i = 0; i < bytes.length; i++) {
      carry += bytes[i] * 58;
      bytes[i] = carry & 0xff;
      carry >>= 8;
    }
    while (carry > 0) {
      bytes.push(carry & 0xff);
      carry >>= 8;
    }
  }

  const result = new Uint8Array(leadingOnes + bytes.length);
  for (let i = bytes.length - 1, j = leadingOnes; i >= 0; i--, j++) {
    result[j] = bytes[i];
  }
  return result;
}

/**
 * Base58Check encode: payload followed by the first four bytes of its double SHA-256
 */
export function base58CheckEncode(payload: Uint8Array): string {
  return base58Encode(concatBytes(payload, computeChecksum(payload)));
}

/**
 * Base58Check decode; returns null on a bad alphabet or checksum
 */
export function base58CheckDecode(str: string): Uint8Array | null {
  let decoded: Uint8Array;
  try {
    decoded = base58Decode(str);
  } catch {
    return null;
  }
  if (!verifyChecksum(decoded)) {
    return null;
  }
  return decoded.slice(0, -4);
}
