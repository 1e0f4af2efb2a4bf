/**
 * Hash Utilities
 * Hash functions used for transaction ids, block hashes and address checksums
 */

import { sha256 as sha256Noble } from '@noble/hashes/sha256';
import { bytesToHex, reverseBytes } from './bytes';

/**
 * SHA-256 hash
 */
export function sha256(data: Uint8Array): Uint8Array {
  return sha256Noble(data);
}

/**
 * Double SHA-256 hash (txids, block hashes, Merkle nodes, checksums)
 */
export function doubleSha256(data: Uint8Array): Uint8Array {
  return sha256(sha256(data));
}

/**
 * Compute checksum for Base58Check encoding
 */
export function computeChecksum(data: Uint8Array): Uint8Array {
  return doubleSha256(data).slice(0, 4);
}

/**
 * Verify Base58Check checksum
 */
export function verifyChecksum(data: Uint8Array): boolean {
  if (data.length < 5) {
    return false;
  }
  const payload = data.slice(0, -4);
  const checksum = data.slice(-4);
  const computed = computeChecksum(payload);

  for (let i = 0; i < 4; i++) {
    if (checksum[i] !== computed[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Convert a 32-byte hash in internal byte order to display hex (byte-reversed)
 */
export function hashToHex(hash: Uint8Array): string {
  return bytesToHex(reverseBytes(hash));
}
