/**
 * Equihash
 * Basic Wagner-algorithm solver and solution verifier for the proof-of-work puzzle
 *
 * The puzzle: find 2^K distinct indices i_j such that the XOR of
 * H(I || V || i_j) over all of them is zero, where collisions on
 * N/(K+1)-bit chunks occur at each of the K levels of the binary tree
 * the indices form, and each left subtree starts with a smaller index
 * than its right sibling.
 */

import { blake2b } from '@noble/hashes/blake2b';
import type { EquihashParams } from '../types/index';
import { compareBytes, concatBytes, isZeroBytes, numberToLEBytes } from '../utils/bytes';

/**
 * Incremental BLAKE2b state the puzzle hashes are derived from
 */
export type EquihashState = ReturnType<typeof blake2b.create>;

/**
 * Produces candidate solutions lazily for a prepared state. The consumer
 * stops pulling as soon as it accepts one.
 */
export interface PuzzleSolver {
  solve(params: EquihashParams, state: EquihashState): Iterable<Uint8Array>;
}

interface Derived {
  collisionBitLength: number;
  collisionByteLength: number;
  hashLength: number;
  indicesPerHashOutput: number;
  hashOutput: number;
  solutionWidth: number;
}

/**
 * Row of the solver table: the not-yet-collided part of the hash plus
 * the indices whose hashes were XORed into it
 */
export interface Row {
  hash: Uint8Array;
  indices: number[];
}

function derive(params: EquihashParams): Derived {
  const { n, k } = params;
  if (k < 1 || k >= n || n % 8 !== 0 || n % (k + 1) !== 0) {
    throw new Error(`Unsupported Equihash parameters: n=${n}, k=${k}`);
  }
  const collisionBitLength = n / (k + 1);
  const collisionByteLength = Math.ceil(collisionBitLength / 8);
  const indicesPerHashOutput = Math.floor(512 / n);
  return {
    collisionBitLength,
    collisionByteLength,
    hashLength: (k + 1) * collisionByteLength,
    indicesPerHashOutput,
    hashOutput: indicesPerHashOutput * n / 8,
    solutionWidth: (1 << k) * (collisionBitLength + 1) / 8
  };
}

/**
 * Size in bytes of a minimal-encoded solution
 */
export function solutionWidth(params: EquihashParams): number {
  return derive(params).solutionWidth;
}

/**
 * Fresh BLAKE2b state personalized with the 8-byte tag, N and K
 */
export function initialiseState(params: EquihashParams, personalization: string): EquihashState {
  const tag = new TextEncoder().encode(personalization);
  if (tag.length !== 8) {
    throw new Error('Equihash personalization must be 8 bytes');
  }
  const { hashOutput } = derive(params);
  return blake2b.create({
    dkLen: hashOutput,
    personalization: concatBytes(tag, numberToLEBytes(params.n, 4), numberToLEBytes(params.k, 4))
  });
}

function generateHash(state: EquihashState, g: number): Uint8Array {
  return state.clone().update(numberToLEBytes(g, 4)).digest();
}

/**
 * Split a bit string into bitLen-bit chunks, each stored big-endian in
 * ceil(bitLen / 8) bytes
 */
export function expandArray(input: Uint8Array, bitLen: number): Uint8Array {
  const outWidth = Math.ceil(bitLen / 8);
  const chunks = Math.floor((input.length * 8) / bitLen);
  const out = new Uint8Array(chunks * outWidth);
  for (let c = 0; c < chunks; c++) {
    let value = 0;
    for (let b = 0; b < bitLen; b++) {
      const bit = c * bitLen + b;
      value = value * 2 + ((input[bit >> 3] >> (7 - (bit & 7))) & 1);
    }
    for (let x = outWidth - 1; x >= 0; x--) {
      out[c * outWidth + x] = value & 0xff;
      value = Math.floor(value / 256);
    }
  }
  return out;
}

/**
 * Pack indices into a bit string of (collisionBitLength + 1) bits each, most significant bit first
 */
export function compressIndices(indices: readonly number[], bitLen: number): Uint8Array {
  const out = new Uint8Array(Math.ceil((indices.length * bitLen) / 8));
  let bit = 0;
  for (const index of indices) {
    for (let b = bitLen - 1; b >= 0; b--) {
      if (Math.floor(index / 2 ** b) % 2 === 1) {
        out[bit >> 3] |= 0x80 >> (bit & 7);
      }
      bit++;
    }
  }
  return out;
}

/**
 * Inverse of compressIndices
 */
export function expandIndices(solution: Uint8Array, bitLen: number): number[] {
  const count = Math.floor((solution.length * 8) / bitLen);
  const indices: number[] = [];
  for (let i = 0; i < count; i++) {
    let value = 0;
    for (let b = 0; b < bitLen; b++) {
      const bit = i * bitLen + b;
      value = value * 2 + ((solution[bit >> 3] >> (7 - (bit & 7))) & 1);
    }
    indices.push(value);
  }
  return indices;
}

function leafRow(state: EquihashState, index: number, params: EquihashParams, d: Derived, cache: Map<number, Uint8Array>): Row {
  const g = Math.floor(index / d.indicesPerHashOutput);
  let digest = cache.get(g);
  if (digest === undefined) {
    digest = generateHash(state, g);
    cache.set(g, digest);
  }
  const start = (index % d.indicesPerHashOutput) * params.n / 8;
  return {
    hash: expandArray(digest.subarray(start, start + params.n / 8), d.collisionBitLength),
    indices: [index]
  };
}

function hasCollision(a: Row, b: Row, length: number): boolean {
  return compareBytes(a.hash, b.hash, length) === 0;
}

/**
 * Lexicographic order of index lists
 */
function indicesBefore(a: Row, b: Row): boolean {
  const length = Math.min(a.indices.length, b.indices.length);
  for (let i = 0; i < length; i++) {
    if (a.indices[i] !== b.indices[i]) {
      return a.indices[i] < b.indices[i];
    }
  }
  return false;
}

function distinctIndices(a: Row, b: Row): boolean {
  const seen = new Set(a.indices);
  return b.indices.every(index => !seen.has(index));
}

/**
 * XOR two rows, drop the first `trim` bytes, and order the indices
 */
function combineRows(a: Row, b: Row, trim: number): Row {
  const hash = new Uint8Array(a.hash.length - trim);
  for (let i = 0; i < hash.length; i++) {
    hash[i] = a.hash[i + trim] ^ b.hash[i + trim];
  }
  const indices = indicesBefore(a, b)
    ? [...a.indices, ...b.indices]
    : [...b.indices, ...a.indices];
  return { hash, indices };
}

function sortRows(rows: Row[], length: number): void {
  rows.sort((a, b) => compareBytes(a.hash, b.hash, length));
}

/**
 * Every pair of rows with disjoint indices inside each run of rows that
 * agree on the first `length` bytes. Rows must already be sorted on them.
 */
export function* collidingPairs(rows: readonly Row[], length: number): Generator<[Row, Row]> {
  let i = 0;
  while (i < rows.length - 1) {
    let j = 1;
    while (i + j < rows.length && hasCollision(rows[i], rows[i + j], length)) {
      j++;
    }
    for (let l = 0; l < j - 1; l++) {
      for (let m = l + 1; m < j; m++) {
        if (distinctIndices(rows[i + l], rows[i + m])) {
          yield [rows[i + l], rows[i + m]];
        }
      }
    }
    i += j;
  }
}

/**
 * Basic solver. Yields each solution as it is found, so a consumer can
 * stop the search by not pulling further.
 */
export function* equihashSolutions(params: EquihashParams, state: EquihashState): Generator<Uint8Array> {
  const d = derive(params);
  const initSize = 2 ** (d.collisionBitLength + 1);

  // 1) Generate first list
  let rows: Row[] = [];
  for (let g = 0; rows.length < initSize; g++) {
    const digest = generateHash(state, g);
    for (let i = 0; i < d.indicesPerHashOutput && rows.length < initSize; i++) {
      const start = i * params.n / 8;
      rows.push({
        hash: expandArray(digest.subarray(start, start + params.n / 8), d.collisionBitLength),
        indices: [g * d.indicesPerHashOutput + i]
      });
    }
  }

  // 2) Collision rounds on successive chunks
  for (let round = 1; round < params.k && rows.length > 0; round++) {
    sortRows(rows, d.collisionByteLength);
    const next: Row[] = [];
    for (const [a, b] of collidingPairs(rows, d.collisionByteLength)) {
      next.push(combineRows(a, b, d.collisionByteLength));
    }
    rows = next;
  }

  // 3) Final round: the remaining two chunks must collide completely
  if (rows.length > 1) {
    const remaining = 2 * d.collisionByteLength;
    sortRows(rows, remaining);
    for (const [a, b] of collidingPairs(rows, remaining)) {
      const { indices } = combineRows(a, b, remaining);
      yield compressIndices(indices, d.collisionBitLength + 1);
    }
  }
}

/**
 * Default PuzzleSolver backed by equihashSolutions
 */
export const basicSolver: PuzzleSolver = {
  solve: equihashSolutions
};

/**
 * Verify a minimal-encoded solution against a prepared state
 */
export function isValidSolution(params: EquihashParams, state: EquihashState, solution: Uint8Array): boolean {
  const d = derive(params);
  if (solution.length !== d.solutionWidth) {
    return false;
  }

  const cache = new Map<number, Uint8Array>();
  let rows = expandIndices(solution, d.collisionBitLength + 1)
    .map(index => leafRow(state, index, params, d, cache));

  while (rows.length > 1) {
    const next: Row[] = [];
    for (let i = 0; i < rows.length; i += 2) {
      const a = rows[i];
      const b = rows[i + 1];
      if (!hasCollision(a, b, d.collisionByteLength)) {
        return false;
      }
      if (indicesBefore(b, a)) {
        return false;
      }
      if (!distinctIndices(a, b)) {
        return false;
      }
      next.push(combineRows(a, b, d.collisionByteLength));
    }
    rows = next;
  }

  return isZeroBytes(rows[0].hash);
}
