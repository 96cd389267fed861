import { describe, it, expect } from 'vitest';
import { scanWindow, countWindow, blockNumbers, unstakeCountdown, type ScanProgress } from '../src/staking/scanner.js';
import { SignatureClassifier } from '../src/staking/classify.js';
import type { AmountResolver } from '../src/staking/amounts.js';
import { FakeLedger, tx, STAKING, TOKEN, ALICE, BOB, STAKE_SEL, UNSTAKE_SEL } from './helpers/fakeLedger.js';

const classifier = new SignatureClassifier(STAKING, { stake: [STAKE_SEL], unstake: [UNSTAKE_SEL] });
const fixed: AmountResolver = {
  name: 'fixed',
  trusted: true,
  async resolve(kind) { return kind === 'stake' ? 100 : 40; },
};
const DAY = 86_400;

describe('window scanner', () => {
  it('visits every step-th block of the half-open window', () => {
    expect(blockNumbers({ fromBlock: 0, toBlock: 10, step: 3 })).toEqual([0, 3, 6, 9]);
    expect(blockNumbers({ fromBlock: 5, toBlock: 5 })).toEqual([]);
    expect(() => blockNumbers({ fromBlock: 6, toBlock: 5 })).toThrow(RangeError);
  });

  it('returns events in block order regardless of completion order', async () => {
    const ledger = new FakeLedger(100, 1_700_000_000, 2, 4);
    for (const n of [0, 1, 2, 3, 4, 5, 6, 7]) ledger.add(n, tx(ALICE, STAKING, STAKE_SEL));
    const now = ledger.timestampOf(100);
    const r = await scanWindow(ledger, { fromBlock: 0, toBlock: 8, concurrency: 3, classifier, resolver: fixed, now });
    expect(r.stakeEvents.map(e => e.blockNumber)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(ledger.fetched).not.toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(ledger.maxInFlight).toBeLessThanOrEqual(3);
  });

  it('builds events from the block and keeps array order within a block', async () => {
    const ledger = new FakeLedger(100);
    const s = tx(ALICE.toUpperCase().replace('0X', '0x'), STAKING, STAKE_SEL + 'ff');
    const u = tx(BOB, STAKING, UNSTAKE_SEL);
    const s2 = tx(BOB, STAKING, STAKE_SEL);
    ledger.add(10, s, u, s2);
    const now = ledger.timestampOf(10) + 3 * DAY;
    const r = await scanWindow(ledger, { fromBlock: 10, toBlock: 11, classifier, resolver: fixed, now });
    expect(r.stakeEvents).toEqual([
      { kind: 'stake', address: ALICE, txHash: s.hash, blockNumber: 10, timestamp: ledger.timestampOf(10), selector: STAKE_SEL, amount: 100 },
      { kind: 'stake', address: BOB, txHash: s2.hash, blockNumber: 10, timestamp: ledger.timestampOf(10), selector: STAKE_SEL, amount: 100 },
    ]);
    expect(r.unstakeEvents).toHaveLength(1);
    expect(r.unstakeEvents[0]).toMatchObject({ address: BOB, amount: 40, daysRemaining: 11, status: 'active', maturesAt: ledger.timestampOf(10) + 14 * DAY });
  });

  it('counts failing blocks as missing and keeps scanning', async () => {
    const ledger = new FakeLedger(100);
    ledger.add(1, tx(ALICE, STAKING, STAKE_SEL)).add(3, tx(BOB, STAKING, UNSTAKE_SEL));
    ledger.missing.add(2);
    const r = await scanWindow(ledger, { fromBlock: 0, toBlock: 5, classifier, resolver: fixed, now: ledger.timestampOf(100) });
    expect(r.blocksScanned).toBe(5);
    expect(r.blocksMissing).toBe(1);
    expect(r.stakeEvents).toHaveLength(1);
    expect(r.unstakeEvents).toHaveLength(1);
  });

  it('treats blocks past the tip as missing', async () => {
    const ledger = new FakeLedger(2);
    const r = await scanWindow(ledger, { fromBlock: 0, toBlock: 5, classifier, resolver: fixed, now: 0 });
    expect(r.blocksMissing).toBe(2);
  });

  it('drops only the transaction whose amount fails', async () => {
    const ledger = new FakeLedger(100);
    ledger.add(1, tx(ALICE, STAKING, STAKE_SEL), tx(BOB, STAKING, STAKE_SEL), tx(ALICE, STAKING, UNSTAKE_SEL));
    const picky: AmountResolver = {
      name: 'picky',
      trusted: true,
      async resolve(kind, sender) {
        if (sender === BOB) throw new Error('no amount');
        return kind === 'stake' ? 1 : Number.NaN;
      },
    };
    const r = await scanWindow(ledger, { fromBlock: 1, toBlock: 2, classifier, resolver: picky, now: 0 });
    expect(r.stakeEvents.map(e => e.address)).toEqual([ALICE]);
    expect(r.unstakeEvents).toEqual([]);
    expect(r.droppedEvents).toBe(2);
  });

  it('skips transactions without a destination and other contracts', async () => {
    const ledger = new FakeLedger(100);
    ledger.add(1, tx(ALICE, null, STAKE_SEL), tx(ALICE, TOKEN, STAKE_SEL));
    const r = await scanWindow(ledger, { fromBlock: 0, toBlock: 2, classifier, resolver: fixed, now: 0 });
    expect(r.stakeEvents).toEqual([]);
    expect(r.droppedEvents).toBe(0);
  });

  it('reports progress every N visited blocks', async () => {
    const ledger = new FakeLedger(100);
    const seen: ScanProgress[] = [];
    await scanWindow(ledger, { fromBlock: 0, toBlock: 10, concurrency: 1, classifier, resolver: fixed, now: 0, progressEvery: 5, onProgress: p => seen.push(p) });
    expect(seen).toEqual([
      { visited: 5, total: 10, events: 0, pct: 50 },
      { visited: 10, total: 10, events: 0, pct: 100 },
    ]);
  });

  it('count-only pass matches the full scan', async () => {
    const ledger = new FakeLedger(100);
    ledger.add(1, tx(ALICE, STAKING, STAKE_SEL)).add(2, tx(BOB, STAKING, UNSTAKE_SEL), tx(BOB, STAKING, UNSTAKE_SEL));
    ledger.missing.add(3);
    expect(await countWindow(ledger, { fromBlock: 0, toBlock: 5, classifier })).toEqual({ stake: 1, unstake: 2, blocksScanned: 5, blocksMissing: 1 });
  });
});

describe('unlock countdown', () => {
  const now = 1_700_000_000;
  it('counts whole days to maturity', () => {
    expect(unstakeCountdown(now - 3 * DAY, now)).toEqual({ maturesAt: now + 11 * DAY, daysRemaining: 11, status: 'active' });
  });
  it('is expired at or below zero days', () => {
    expect(unstakeCountdown(now - 14 * DAY, now).status).toBe('expired');
    expect(unstakeCountdown(now - 13.5 * DAY, now)).toMatchObject({ daysRemaining: 0, status: 'expired' });
    expect(unstakeCountdown(now - 20 * DAY, now).daysRemaining).toBe(-6);
  });
});
