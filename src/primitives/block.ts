/**
 * Block Header Serialization
 * Header layout, the Equihash input prefix, block hash and Merkle root
 */

import type { BlockHeader, CandidateBlock, Transaction } from '../types/index';
import { concatBytes, varBytesLength, writeBytes, writeVarBytes } from '../utils/bytes';
import { doubleSha256 } from '../utils/hash';
import { transactionHash } from './transaction';

/**
 * Bytes of header before the nonce: version, prevHash, merkleRoot,
 * finalSaplingRoot, time, bits
 */
export const EQUIHASH_INPUT_LENGTH = 4 + 32 + 32 + 32 + 4 + 4;

/**
 * Serialize the header fields the puzzle commits to (everything except nonce and solution)
 */
export function serializeEquihashInput(header: BlockHeader): Uint8Array {
  const bytes = new Uint8Array(EQUIHASH_INPUT_LENGTH);
  const view = new DataView(bytes.buffer);
  let offset = 0;

  view.setInt32(offset, header.version, true);
  offset += 4;
  offset = writeBytes(view, offset, header.prevHash);
  offset = writeBytes(view, offset, header.merkleRoot);
  offset = writeBytes(view, offset, header.finalSaplingRoot);
  view.setUint32(offset, header.time, true);
  offset += 4;
  view.setUint32(offset, header.bits, true);

  return bytes;
}

/**
 * Serialize the full header, nonce and compact-size prefixed solution included
 */
export function serializeHeader(header: BlockHeader): Uint8Array {
  const tail = new Uint8Array(header.nonce.length + varBytesLength(header.solution));
  const view = new DataView(tail.buffer);
  const offset = writeBytes(view, 0, header.nonce);
  writeVarBytes(view, offset, header.solution);
  return concatBytes(serializeEquihashInput(header), tail);
}

/**
 * Block hash: double SHA-256 of the serialized header, internal byte order
 */
export function blockHash(header: BlockHeader): Uint8Array {
  return doubleSha256(serializeHeader(header));
}

/**
 * Merkle root over a list of 32-byte hashes. An odd level repeats its last node.
 */
export function computeMerkleRoot(hashes: readonly Uint8Array[]): Uint8Array {
  if (hashes.length === 0) {
    return new Uint8Array(32);
  }

  let level = [...hashes];
  while (level.length > 1) {
    const next: Uint8Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = i + 1 < level.length ? level[i + 1] : left;
      next.push(doubleSha256(concatBytes(left, right)));
    }
    level = next;
  }
  return level[0];
}

export function blockMerkleRoot(transactions: readonly Transaction[]): Uint8Array {
  return computeMerkleRoot(transactions.map(transactionHash));
}

/**
 * Coinbase transaction of a block
 */
export function coinbaseOf(block: CandidateBlock): Transaction {
  const coinbase = block.transactions[0];
  if (coinbase === undefined) {
    throw new Error('Block has no transactions');
  }
  return coinbase;
}
