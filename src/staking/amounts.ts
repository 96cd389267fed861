import type { EventKind } from './schemas.js';
import type { LedgerTransaction } from '../ledger/port.js';
import { toTokens } from '../utils/units.js';

/**
 * Produces the token amount of a classified transaction.
 *
 * Must be deterministic per (kind, sender) within a run: aggregation sums
 * these values and reruns have to reproduce the totals. `trusted` is false
 * for resolvers that guess rather than read the chain; every downstream
 * metric inherits that caveat and the report says so.
 */
export interface AmountResolver {
  readonly name: string;
  readonly trusted: boolean;
  resolve(kind: EventKind, sender: string, tx: LedgerTransaction): Promise<number>;
}

type Tier = { below: number; min: number; max: number };

// placeholder distribution, not derived from chain data
const TIERS: Record<EventKind, Tier[]> = {
  stake: [
    { below: 0.4, min: 10_000, max: 100_000 },
    { below: 0.7, min: 100_000, max: 1_000_000 },
    { below: 0.9, min: 1_000_000, max: 5_000_000 },
    { below: 1, min: 5_000_000, max: 20_000_000 },
  ],
  unstake: [
    { below: 0.3, min: 20_000, max: 150_000 },
    { below: 0.6, min: 150_000, max: 800_000 },
    { below: 0.85, min: 800_000, max: 3_000_000 },
    { below: 1, min: 3_000_000, max: 15_000_000 },
  ],
};

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seedFromAddress(address: string): number {
  const tail = address.slice(-8);
  return address.length >= 8 && /^[0-9a-f]{8}$/i.test(tail) ? parseInt(tail, 16) : 42;
}

export function seededAmount(kind: EventKind, sender: string): number {
  const rnd = mulberry32(seedFromAddress(sender.toLowerCase()));
  const pick = rnd();
  const tiers = TIERS[kind];
  const tier = tiers.find(t => pick < t.below) ?? tiers[tiers.length - 1];
  return tier.min + rnd() * (tier.max - tier.min);
}

/** Degraded fallback for when no decoder is available. Never trusted. */
export class SeededAmountResolver implements AmountResolver {
  readonly name = 'seeded';
  readonly trusted = false;
  async resolve(kind: EventKind, sender: string): Promise<number> {
    return seededAmount(kind, sender);
  }
}

/** For contracts staking the native coin: the call value is the amount. */
export class NativeValueResolver implements AmountResolver {
  readonly name = 'native-value';
  readonly trusted = true;
  constructor(private readonly decimals = 18) {}
  async resolve(_kind: EventKind, _sender: string, tx: LedgerTransaction): Promise<number> {
    if (tx.value < 0n) throw new RangeError(`negative value in ${tx.hash}`);
    return toTokens(tx.value, this.decimals);
  }
}

export type AmountMode = 'seeded' | 'native-value';

export function createAmountResolver(mode: AmountMode, decimals: number): AmountResolver {
  return mode === 'native-value' ? new NativeValueResolver(decimals) : new SeededAmountResolver();
}
