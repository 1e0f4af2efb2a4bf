/**
 * Tests for chain parameters
 */

import { COIN } from '../../src/consensus/amount';
import { blockSubsidy, equihashParamsAt, getChainParams } from '../../src/consensus/params';
import { encodeCompact } from '../../src/pow/difficulty';

describe('getChainParams', () => {
  test('returns parameters for each network', () => {
    expect(getChainParams('mainnet').network).toBe('mainnet');
    expect(getChainParams('testnet').network).toBe('testnet');
    expect(getChainParams('regtest').network).toBe('regtest');
  });

  test('regtest powLimit encodes to the easiest compact bits', () => {
    expect(encodeCompact(getChainParams('regtest').powLimit)).toBe(0x200f0f0f);
  });

  test('personalization is eight bytes', () => {
    expect(getChainParams('mainnet').powPersonalization).toHaveLength(8);
  });
});

describe('equihashParamsAt', () => {
  test('follows the mainnet upgrade schedule', () => {
    const mainnet = getChainParams('mainnet');
    expect(equihashParamsAt(mainnet, 0)).toEqual({ n: 200, k: 9 });
    expect(equihashParamsAt(mainnet, 94_999)).toEqual({ n: 200, k: 9 });
    expect(equihashParamsAt(mainnet, 95_000)).toEqual({ n: 144, k: 5 });
  });

  test('follows the testnet upgrade schedule', () => {
    const testnet = getChainParams('testnet');
    expect(equihashParamsAt(testnet, 1_499)).toEqual({ n: 200, k: 9 });
    expect(equihashParamsAt(testnet, 1_500)).toEqual({ n: 144, k: 5 });
  });

  test('regtest uses small parameters throughout', () => {
    const regtest = getChainParams('regtest');
    expect(equihashParamsAt(regtest, 0)).toEqual({ n: 48, k: 5 });
    expect(equihashParamsAt(regtest, 1_000_000)).toEqual({ n: 48, k: 5 });
  });
});

describe('blockSubsidy', () => {
  const regtest = getChainParams('regtest');

  test('pays the initial subsidy before the first halving', () => {
    expect(blockSubsidy(regtest, 1)).toBe(50n * COIN);
    expect(blockSubsidy(regtest, 149)).toBe(50n * COIN);
  });

  test('halves every interval', () => {
    expect(blockSubsidy(regtest, 150)).toBe(25n * COIN);
    expect(blockSubsidy(regtest, 300)).toBe(1_250_000_000n);
  });

  test('drops to zero after 64 halvings', () => {
    expect(blockSubsidy(regtest, 150 * 64)).toBe(0n);
  });
});
