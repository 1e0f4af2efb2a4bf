/**
 * Transaction Serialization
 * Sapling (v4) wire layout, transaction ids and coinbase detection
 */

import type {
  Transaction,
  TxIn,
  TxOut,
  OutPoint,
  JoinSplitDescription,
  SpendDescription,
  OutputDescription
} from '../types/index';
import {
  compactSizeLength,
  isZeroBytes,
  varBytesLength,
  writeBytes,
  writeCompactSize,
  writeVarBytes
} from '../utils/bytes';
import { doubleSha256 } from '../utils/hash';

const NULL_INDEX = 0xffffffff;

/**
 * The prevout a coinbase input spends
 */
export function nullOutPoint(): OutPoint {
  return { hash: new Uint8Array(32), n: NULL_INDEX };
}

export function isNullOutPoint(prevout: OutPoint): boolean {
  return prevout.n === NULL_INDEX && isZeroBytes(prevout.hash);
}

/**
 * Coinbase: exactly one input, and that input spends the null prevout
 */
export function isCoinBase(tx: Transaction): boolean {
  return tx.vin.length === 1 && isNullOutPoint(tx.vin[0].prevout);
}

function hasSaplingFields(tx: Transaction): boolean {
  return tx.overwintered && tx.version >= 4;
}

function joinSplitSize(js: JoinSplitDescription): number {
  return 8 + 8
    + js.anchor.length
    + js.nullifiers[0].length + js.nullifiers[1].length
    + js.commitments[0].length + js.commitments[1].length
    + js.ephemeralKey.length
    + js.randomSeed.length
    + js.macs[0].length + js.macs[1].length
    + js.proof.length
    + js.ciphertexts[0].length + js.ciphertexts[1].length;
}

function spendSize(spend: SpendDescription): number {
  return spend.cv.length + spend.anchor.length + spend.nullifier.length
    + spend.rk.length + spend.zkproof.length + spend.spendAuthSig.length;
}

function outputSize(output: OutputDescription): number {
  return output.cv.length + output.cmu.length + output.ephemeralKey.length
    + output.encCiphertext.length + output.outCiphertext.length + output.zkproof.length;
}

/**
 * Serialized size in bytes, without allocating the serialization
 */
export function serializedSize(tx: Transaction): number {
  let size = 4; // header
  if (tx.overwintered) {
    size += 4; // versionGroupId
  }

  size += compactSizeLength(tx.vin.length);
  for (const input of tx.vin) {
    size += 32 + 4 + varBytesLength(input.scriptSig) + 4;
  }

  size += compactSizeLength(tx.vout.length);
  for (const output of tx.vout) {
    size += 8 + varBytesLength(output.scriptPubKey);
  }

  size += 4; // lockTime
  if (tx.overwintered) {
    size += 4; // expiryHeight
  }

  if (hasSaplingFields(tx)) {
    size += 8; // valueBalance
    size += compactSizeLength(tx.shieldedSpends.length);
    size += tx.shieldedSpends.reduce((sum, s) => sum + spendSize(s), 0);
    size += compactSizeLength(tx.shieldedOutputs.length);
    size += tx.shieldedOutputs.reduce((sum, o) => sum + outputSize(o), 0);
  }

  if (tx.version >= 2) {
    size += compactSizeLength(tx.joinSplits.length);
    size += tx.joinSplits.reduce((sum, js) => sum + joinSplitSize(js), 0);
    if (tx.joinSplits.length > 0) {
      size += (tx.joinSplitPubKey?.length ?? 32) + (tx.joinSplitSig?.length ?? 64);
    }
  }

  if (hasSaplingFields(tx) && (tx.shieldedSpends.length > 0 || tx.shieldedOutputs.length > 0)) {
    size += tx.bindingSig?.length ?? 64;
  }

  return size;
}

/**
 * Serialize transaction to bytes
 */
export function serializeTransaction(tx: Transaction): Uint8Array {
  const bytes = new Uint8Array(serializedSize(tx));
  const view = new DataView(bytes.buffer);
  let offset = 0;

  // Header: version with the overwintered flag in the top bit
  view.setUint32(offset, (tx.version | (tx.overwintered ? 0x80000000 : 0)) >>> 0, true);
  offset += 4;

  if (tx.overwintered) {
    view.setUint32(offset, tx.versionGroupId, true);
    offset += 4;
  }

  offset = serializeInputs(view, offset, tx.vin);
  offset = serializeOutputs(view, offset, tx.vout);

  view.setUint32(offset, tx.lockTime, true);
  offset += 4;
  if (tx.overwintered) {
    view.setUint32(offset, tx.expiryHeight, true);
    offset += 4;
  }

  if (hasSaplingFields(tx)) {
    view.setBigInt64(offset, tx.valueBalance, true);
    offset += 8;

    offset = writeCompactSize(view, offset, tx.shieldedSpends.length);
    for (const spend of tx.shieldedSpends) {
      for (const field of [spend.cv, spend.anchor, spend.nullifier, spend.rk, spend.zkproof, spend.spendAuthSig]) {
        offset = writeBytes(view, offset, field);
      }
    }

    offset = writeCompactSize(view, offset, tx.shieldedOutputs.length);
    for (const output of tx.shieldedOutputs) {
      for (const field of [output.cv, output.cmu, output.ephemeralKey, output.encCiphertext, output.outCiphertext, output.zkproof]) {
        offset = writeBytes(view, offset, field);
      }
    }
  }

  if (tx.version >= 2) {
    offset = serializeJoinSplits(view, offset, tx);
  }

  if (hasSaplingFields(tx) && (tx.shieldedSpends.length > 0 || tx.shieldedOutputs.length > 0)) {
    offset = writeBytes(view, offset, tx.bindingSig ?? new Uint8Array(64));
  }

  return bytes;
}

function serializeInputs(view: DataView, offset: number, inputs: readonly TxIn[]): number {
  offset = writeCompactSize(view, offset, inputs.length);
  for (const input of inputs) {
    offset = writeBytes(view, offset, input.prevout.hash);
    view.setUint32(offset, input.prevout.n, true);
    offset += 4;
    offset = writeVarBytes(view, offset, input.scriptSig);
    view.setUint32(offset, input.sequence, true);
    offset += 4;
  }
  return offset;
}

function serializeOutputs(view: DataView, offset: number, outputs: readonly TxOut[]): number {
  offset = writeCompactSize(view, offset, outputs.length);
  for (const output of outputs) {
    view.setBigInt64(offset, output.value, true);
    offset += 8;
    offset = writeVarBytes(view, offset, output.scriptPubKey);
  }
  return offset;
}

function serializeJoinSplits(view: DataView, offset: number, tx: Transaction): number {
  offset = writeCompactSize(view, offset, tx.joinSplits.length);
  for (const js of tx.joinSplits) {
    view.setBigInt64(offset, js.vpubOld, true);
    offset += 8;
    view.setBigInt64(offset, js.vpubNew, true);
    offset += 8;
    for (const field of [
      js.anchor,
      ...js.nullifiers,
      ...js.commitments,
      js.ephemeralKey,
      js.randomSeed,
      ...js.macs,
      js.proof,
      ...js.ciphertexts
    ]) {
      offset = writeBytes(view, offset, field);
    }
  }
  if (tx.joinSplits.length > 0) {
    offset = writeBytes(view, offset, tx.joinSplitPubKey ?? new Uint8Array(32));
    offset = writeBytes(view, offset, tx.joinSplitSig ?? new Uint8Array(64));
  }
  return offset;
}

/**
 * Transaction id: double SHA-256 of the serialization, internal byte order
 */
export function transactionHash(tx: Transaction): Uint8Array {
  return doubleSha256(serializeTransaction(tx));
}
