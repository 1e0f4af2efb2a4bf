/**
 * Tests for hash utilities
 */

import {
  sha256,
  doubleSha256,
  computeChecksum,
  verifyChecksum,
  hashToHex
} from '../../src/utils/hash';
import { bytesToHex, concatBytes } from '../../src/utils/bytes';

describe('sha256', () => {
  test('hashes empty input correctly', () => {
    const hash = sha256(new Uint8Array(0));
    expect(bytesToHex(hash)).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  test('hashes "abc" correctly', () => {
    const input = new TextEncoder().encode('abc');
    const hash = sha256(input);
    expect(bytesToHex(hash)).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});

describe('doubleSha256', () => {
  test('applies SHA256 twice', () => {
    const input = new TextEncoder().encode('test');
    expect(doubleSha256(input)).toEqual(sha256(sha256(input)));
  });

  test('hashes empty input correctly', () => {
    expect(bytesToHex(doubleSha256(new Uint8Array(0)))).toBe(
      '5df6e0e2761359d30a8275058e299fcc0381534545f55cf43e41983f5d4c9456'
    );
  });
});

describe('checksum', () => {
  test('is the first four bytes of the double hash', () => {
    const data = new Uint8Array([1, 2, 3]);
    expect(computeChecksum(data)).toEqual(doubleSha256(data).slice(0, 4));
  });

  test('verifies appended checksums', () => {
    const data = new Uint8Array([1, 2, 3]);
    const withChecksum = concatBytes(data, computeChecksum(data));
    expect(verifyChecksum(withChecksum)).toBe(true);

    withChecksum[0] ^= 1;
    expect(verifyChecksum(withChecksum)).toBe(false);
  });

  test('rejects input too short to hold a checksum', () => {
    expect(verifyChecksum(new Uint8Array(4))).toBe(false);
  });
});

describe('hashToHex', () => {
  test('displays hashes byte-reversed', () => {
    const hash = new Uint8Array(32);
    hash[0] = 0x01;
    expect(hashToHex(hash)).toBe('00'.repeat(31) + '01');
  });
});
