/**
 * Difficulty
 * Compact target encoding and the proof-of-work target check
 */

import { leBytesToBigint } from '../utils/bytes';

export const MAX_UINT256 = (1n << 256n) - 1n;

export interface DecodedCompact {
  target: bigint;
  negative: boolean;
  overflow: boolean;
}

/**
 * Decode compact "bits" (base-256 exponent + 23-bit mantissa + sign bit)
 */
export function decodeCompact(bits: number): DecodedCompact {
  const size = bits >>> 24;
  let word = bits & 0x007fffff;
  let target: bigint;

  if (size <= 3) {
    word >>>= 8 * (3 - size);
    target = BigInt(word);
  } else {
    target = BigInt(word) << BigInt(8 * (size - 3));
  }

  const negative = word !== 0 && (bits & 0x00800000) !== 0;
  const overflow = word !== 0 && (
    size > 34 ||
    (word > 0xff && size > 33) ||
    (word > 0xffff && size > 32)
  );

  return { target, negative, overflow };
}

/**
 * Encode a non-negative target as compact bits
 */
export function encodeCompact(target: bigint): number {
  if (target < 0n) {
    throw new RangeError('encodeCompact: target must be non-negative');
  }

  let size = target === 0n ? 0 : Math.ceil(target.toString(2).length / 8);
  let compact: number;
  if (size <= 3) {
    compact = Number(target << BigInt(8 * (3 - size)));
  } else {
    compact = Number(target >> BigInt(8 * (size - 3)));
  }

  // The 0x00800000 bit is the sign; move it into the exponent instead
  if (compact & 0x00800000) {
    compact >>>= 8;
    size++;
  }

  return ((size << 24) | compact) >>> 0;
}

/**
 * Target for compact bits, or null when the bits are invalid under powLimit
 */
export function targetFromBits(bits: number, powLimit: bigint): bigint | null {
  const { target, negative, overflow } = decodeCompact(bits);
  if (negative || overflow || target === 0n || target > powLimit) {
    return null;
  }
  return target;
}

/**
 * Interpret a 32-byte hash (internal byte order) as a 256-bit integer
 */
export function hashToBigint(hash: Uint8Array): bigint {
  return leBytesToBigint(hash);
}

/**
 * True if the hash does not exceed the target
 */
export function meetsTarget(hash: Uint8Array, target: bigint): boolean {
  return hashToBigint(hash) <= target;
}

/**
 * Full proof-of-work check: bits must decode to a valid target and the hash must meet it
 */
export function checkProofOfWork(hash: Uint8Array, bits: number, powLimit: bigint): boolean {
  const target = targetFromBits(bits, powLimit);
  if (target === null) {
    return false;
  }
  return meetsTarget(hash, target);
}
