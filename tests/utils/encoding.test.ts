/**
 * Tests for encoding utilities
 */

import {
  base58Encode,
  base58Decode,
  base58CheckEncode,
  base58CheckDecode
} from '../../src/utils/encoding';
import { hexToBytes } from '../../src/utils/bytes';

describe('base58', () => {
  test('encodes bytes correctly', () => {
    const input = new Uint8Array([0, 1, 2, 3, 4, 5]);
    const encoded = base58Encode(input);
    const decoded = base58Decode(encoded);
    expect(decoded).toEqual(input);
  });

  test('encodes known values correctly', () => {
    expect(base58Encode(new TextEncoder().encode('hello world'))).toBe('StV1DL6CwTryKyV');
    expect(base58Encode(hexToBytes('0000287fb4cd'))).toBe('11233QC4');
  });

  test('handles leading zeros', () => {
    const input = new Uint8Array([0, 0, 0, 1, 2, 3]);
    const encoded = base58Encode(input);
    expect(encoded.startsWith('111')).toBe(true); // Leading zeros = '1's
    expect(base58Decode(encoded)).toEqual(input);
  });

  test('encodes an all-zero input as ones only', () => {
    expect(base58Encode(new Uint8Array(3))).toBe('111');
    expect(base58Decode('111')).toEqual(new Uint8Array(3));
  });

  test('handles empty input', () => {
    expect(base58Encode(new Uint8Array(0))).toBe('');
    expect(base58Decode('')).toEqual(new Uint8Array(0));
  });

  test('throws on invalid characters', () => {
    expect(() => base58Decode('0OIl')).toThrow('Invalid base58 character'); // 0, O, I, l are not in Base58
  });
});

describe('base58Check', () => {
  test('decodes what it encodes', () => {
    const payload = new Uint8Array([0x1d, 0x25, ...new Uint8Array(20).fill(7)]);
    expect(base58CheckDecode(base58CheckEncode(payload))).toEqual(payload);
  });

  test('returns null on a checksum mismatch', () => {
    const encoded = base58Encode(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]));
    expect(base58CheckDecode(encoded)).toBeNull();
  });

  test('returns null on invalid characters', () => {
    expect(base58CheckDecode('0OIl')).toBeNull();
  });

  test('returns null when too short to carry a checksum', () => {
    expect(base58CheckDecode('1')).toBeNull();
  });
});
