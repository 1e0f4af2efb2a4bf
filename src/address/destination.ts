/**
 * Destination Decoding
 * Transparent address -> output script for coinbase payouts
 */

import { base58CheckDecode, base58CheckEncode } from '../utils/encoding';
import { concatBytes } from '../utils/bytes';
import type { ChainParams } from '../consensus/params';

/**
 * Script opcodes used by standard transparent outputs
 */
export const OP = {
  OP_DUP: 0x76,
  OP_HASH160: 0xa9,
  OP_EQUAL: 0x87,
  OP_EQUALVERIFY: 0x88,
  OP_CHECKSIG: 0xac
} as const;

export type DestinationType = 'p2pkh' | 'p2sh';

export interface Destination {
  type: DestinationType;
  hash: Uint8Array;  // 20 bytes
}

/**
 * P2PKH: OP_DUP OP_HASH160 <20-byte pubKeyHash> OP_EQUALVERIFY OP_CHECKSIG
 */
export function createP2PKHScript(pubKeyHash: Uint8Array): Uint8Array {
  if (pubKeyHash.length !== 20) {
    throw new Error('Public key hash must be 20 bytes');
  }
  return new Uint8Array([
    OP.OP_DUP,
    OP.OP_HASH160,
    0x14,  // Push 20 bytes
    ...pubKeyHash,
    OP.OP_EQUALVERIFY,
    OP.OP_CHECKSIG
  ]);
}

/**
 * P2SH: OP_HASH160 <20-byte scriptHash> OP_EQUAL
 */
export function createP2SHScript(scriptHash: Uint8Array): Uint8Array {
  if (scriptHash.length !== 20) {
    throw new Error('Script hash must be 20 bytes');
  }
  return new Uint8Array([
    OP.OP_HASH160,
    0x14,
    ...scriptHash,
    OP.OP_EQUAL
  ]);
}

export function scriptForDestination(destination: Destination): Uint8Array {
  return destination.type === 'p2pkh'
    ? createP2PKHScript(destination.hash)
    : createP2SHScript(destination.hash);
}

function prefixMatches(payload: Uint8Array, prefix: readonly [number, number]): boolean {
  return payload[0] === prefix[0] && payload[1] === prefix[1];
}

/**
 * Decode a transparent address for the given network; null if it is not one
 */
export function decodeDestination(address: string, params: ChainParams): Destination | null {
  const payload = base58CheckDecode(address);
  // 2 (version) + 20 (hash)
  if (payload === null || payload.length !== 22) {
    return null;
  }

  const hash = payload.slice(2);
  if (prefixMatches(payload, params.base58Prefixes.pubKeyHash)) {
    return { type: 'p2pkh', hash };
  }
  if (prefixMatches(payload, params.base58Prefixes.scriptHash)) {
    return { type: 'p2sh', hash };
  }
  return null;
}

export function encodeDestination(destination: Destination, params: ChainParams): string {
  const prefix = destination.type === 'p2pkh'
    ? params.base58Prefixes.pubKeyHash
    : params.base58Prefixes.scriptHash;
  return base58CheckEncode(concatBytes(new Uint8Array(prefix), destination.hash));
}

/**
 * True if the script has exactly the P2PKH or P2SH shape
 */
export function isValidDestinationScript(script: Uint8Array): boolean {
  const p2pkh = script.length === 25
    && script[0] === OP.OP_DUP
    && script[1] === OP.OP_HASH160
    && script[2] === 0x14
    && script[23] === OP.OP_EQUALVERIFY
    && script[24] === OP.OP_CHECKSIG;
  const p2sh = script.length === 23
    && script[0] === OP.OP_HASH160
    && script[1] === 0x14
    && script[22] === OP.OP_EQUAL;
  return p2pkh || p2sh;
}
