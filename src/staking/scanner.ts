import type { LedgerBlock, LedgerPort } from '../ledger/port.js';
import type { AmountResolver } from './amounts.js';
import type { SignatureClassifier } from './classify.js';
import { DAY_SECONDS, UNLOCK_PERIOD_DAYS, type StakeEvent, type StakingEvent, type UnstakeEvent } from './schemas.js';
import { mapLimit } from '../utils/limit.js';

export type ScanProgress = { visited: number; total: number; events: number; pct: number };

export type ScanRange = {
  fromBlock: number;
  toBlock: number; // exclusive
  step?: number;   // stride between visited blocks; 1 = every block
  concurrency?: number;
};

export type ScanOptions = ScanRange & {
  classifier: SignatureClassifier;
  resolver: AmountResolver;
  now: number; // unix seconds, reference for unlock countdowns
  onProgress?: (p: ScanProgress) => void;
  progressEvery?: number; // blocks
};

export type ScanResult = {
  stakeEvents: StakeEvent[];
  unstakeEvents: UnstakeEvent[];
  blocksScanned: number;
  blocksMissing: number;
  droppedEvents: number;
};

export type CountResult = { stake: number; unstake: number; blocksScanned: number; blocksMissing: number };

export function blockNumbers(r: ScanRange): number[] {
  const step = Math.max(1, Math.floor(r.step ?? 1));
  if (r.fromBlock > r.toBlock) throw new RangeError(`fromBlock ${r.fromBlock} > toBlock ${r.toBlock}`);
  const out: number[] = [];
  for (let b = Math.max(0, r.fromBlock); b < r.toBlock; b += step) out.push(b);
  return out;
}

async function fetchOrEmpty(ledger: LedgerPort, n: number): Promise<LedgerBlock | null> {
  try {
    return await ledger.blockByNumber(n);
  } catch {
    return null;
  }
}

export function unstakeCountdown(timestamp: number, now: number): Pick<UnstakeEvent, 'maturesAt' | 'daysRemaining' | 'status'> {
  const maturesAt = timestamp + UNLOCK_PERIOD_DAYS * DAY_SECONDS;
  const daysRemaining = Math.floor((maturesAt - now) / DAY_SECONDS);
  return { maturesAt, daysRemaining, status: daysRemaining > 0 ? 'active' : 'expired' };
}

async function eventsOfBlock(block: LedgerBlock, o: ScanOptions): Promise<{ events: StakingEvent[]; dropped: number }> {
  const events: StakingEvent[] = [];
  let dropped = 0;
  for (const tx of block.transactions) {
    if (!tx.to) continue;
    try {
      const m = o.classifier.match(tx.to, tx.input);
      if (m.kind === 'none') continue;
      const address = tx.from.toLowerCase();
      const amount = await o.resolver.resolve(m.kind, address, tx);
      if (!Number.isFinite(amount) || amount < 0) throw new RangeError(`amount ${amount} for ${tx.hash}`);
      const base = { address, txHash: tx.hash, blockNumber: block.number, timestamp: block.timestamp, selector: m.selector, amount };
      events.push(m.kind === 'stake'
        ? { kind: 'stake', ...base }
        : { kind: 'unstake', ...base, ...unstakeCountdown(block.timestamp, o.now) });
    } catch {
      dropped++;
    }
  }
  return { events, dropped };
}

/**
 * Scans a block window and returns classified events in block order.
 * Missing or failing blocks count as empty; one bad transaction only drops itself.
 */
export async function scanWindow(ledger: LedgerPort, o: ScanOptions): Promise<ScanResult> {
  const blocks = blockNumbers(o);
  const every = Math.max(1, o.progressEvery ?? 100);
  let visited = 0;
  let found = 0;
  let missing = 0;
  const perBlock = await mapLimit(blocks, o.concurrency ?? 8, async (n) => {
    const block = await fetchOrEmpty(ledger, n);
    const res = block ? await eventsOfBlock(block, o) : { events: [], dropped: 0 };
    if (!block) missing++;
    visited++;
    found += res.events.length;
    if (o.onProgress && visited % every === 0) {
      o.onProgress({ visited, total: blocks.length, events: found, pct: (visited / blocks.length) * 100 });
    }
    return res;
  });

  const stakeEvents: StakeEvent[] = [];
  const unstakeEvents: UnstakeEvent[] = [];
  let droppedEvents = 0;
  for (const r of perBlock) {
    droppedEvents += r.dropped;
    for (const e of r.events) {
      if (e.kind === 'stake') stakeEvents.push(e); else unstakeEvents.push(e);
    }
  }
  return { stakeEvents, unstakeEvents, blocksScanned: blocks.length, blocksMissing: missing, droppedEvents };
}

/** Count-only pass; no amounts are resolved. */
export async function countWindow(ledger: LedgerPort, r: ScanRange & { classifier: SignatureClassifier }): Promise<CountResult> {
  const blocks = blockNumbers(r);
  let stake = 0, unstake = 0, missing = 0;
  await mapLimit(blocks, r.concurrency ?? 8, async (n) => {
    const block = await fetchOrEmpty(ledger, n);
    if (!block) { missing++; return; }
    for (const tx of block.transactions) {
      if (!tx.to) continue;
      const kind = r.classifier.classify(tx.to, tx.input);
      if (kind === 'stake') stake++;
      else if (kind === 'unstake') unstake++;
    }
  });
  return { stake, unstake, blocksScanned: blocks.length, blocksMissing: missing };
}
