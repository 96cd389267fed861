import { describe, it, expect } from 'vitest';
import { seedFromAddress, seededAmount, NativeValueResolver, SeededAmountResolver, createAmountResolver } from '../src/staking/amounts.js';
import { tx, ALICE, BOB, STAKING } from './helpers/fakeLedger.js';

describe('amount resolvers', () => {
  it('seeds from the last 8 hex digits', () => {
    expect(seedFromAddress('0x00000000000000000000000000000000deadbeef')).toBe(0xdeadbeef);
    expect(seedFromAddress('xyz')).toBe(42);
    expect(seedFromAddress('0xzzzzzzzz')).toBe(42);
  });

  it('seeded amounts are deterministic and within the kind tiers', () => {
    for (const a of [ALICE, BOB, '0x0000000000000000000000000000000000000001']) {
      const s = seededAmount('stake', a);
      const u = seededAmount('unstake', a);
      expect(seededAmount('stake', a)).toBe(s);
      expect(s).toBeGreaterThanOrEqual(10_000);
      expect(s).toBeLessThanOrEqual(20_000_000);
      expect(u).toBeGreaterThanOrEqual(20_000);
      expect(u).toBeLessThanOrEqual(15_000_000);
    }
    expect(seededAmount('stake', ALICE)).toBe(seededAmount('stake', ALICE.toUpperCase().replace('0X', '0x')));
  });

  it('seeded resolver is flagged untrusted', async () => {
    const r = new SeededAmountResolver();
    expect(r.trusted).toBe(false);
    expect(await r.resolve('stake', ALICE)).toBe(seededAmount('stake', ALICE));
  });

  it('native-value resolver scales by decimals', async () => {
    const r = new NativeValueResolver(18);
    expect(r.trusted).toBe(true);
    expect(await r.resolve('stake', ALICE, tx(ALICE, STAKING, '0x', 1_500_000_000_000_000_000n))).toBe(1.5);
    expect(await new NativeValueResolver(0).resolve('unstake', ALICE, tx(ALICE, STAKING, '0x', 20_000n))).toBe(20_000);
  });

  it('factory picks by mode', () => {
    expect(createAmountResolver('seeded', 18).name).toBe('seeded');
    expect(createAmountResolver('native-value', 18).name).toBe('native-value');
  });
});
