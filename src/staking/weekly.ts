import type { LedgerPort } from '../ledger/port.js';
import type { SignatureClassifier } from './classify.js';
import { countWindow } from './scanner.js';
import { DAY_SECONDS, type StakingEvent, type WeeklyBucket } from './schemas.js';

export type WeeklyMode = 'rescan' | 'timestamp';

const MAX_WEEKS = 4;
const WEEK_SECONDS = 7 * DAY_SECONDS;

export function weekCount(windowDays: number): number {
  return windowDays < 7 ? 0 : Math.min(MAX_WEEKS, Math.floor(windowDays / 7));
}

// index 0 = most recent week; output oldest first with week 1 = oldest
function toBuckets(counts: Array<{ stake: number; unstake: number }>): WeeklyBucket[] {
  const weeks = counts.length;
  return counts
    .map((c, ago) => ({ week: weeks - ago, stakeEvents: c.stake, unstakeEvents: c.unstake, netEvents: c.stake - c.unstake }))
    .sort((a, b) => a.week - b.week);
}

/** Re-scans each 7-day block sub-window counting matches only. */
export async function weeklyByRescan(
  ledger: LedgerPort,
  o: { latestBlock: number; windowDays: number; blocksPerDay: number; step: number; concurrency: number; classifier: SignatureClassifier },
): Promise<WeeklyBucket[]> {
  const weeks = weekCount(o.windowDays);
  const span = 7 * o.blocksPerDay;
  const counts: Array<{ stake: number; unstake: number }> = [];
  for (let ago = 0; ago < weeks; ago++) {
    const toBlock = Math.max(0, o.latestBlock - ago * span);
    const fromBlock = Math.max(0, o.latestBlock - (ago + 1) * span);
    const c = await countWindow(ledger, { fromBlock, toBlock, step: o.step, concurrency: o.concurrency, classifier: o.classifier });
    counts.push({ stake: c.stake, unstake: c.unstake });
  }
  return toBuckets(counts);
}

/** Single pass over already-collected events, bucketed by block time. */
export function weeklyByTimestamp(events: readonly StakingEvent[], windowDays: number, now: number): WeeklyBucket[] {
  const weeks = weekCount(windowDays);
  const counts = Array.from({ length: weeks }, () => ({ stake: 0, unstake: 0 }));
  for (const e of events) {
    // week k covers ages (k*7d, (k+1)*7d], matching the half-open block windows above
    const ago = Math.max(0, Math.ceil((now - e.timestamp) / WEEK_SECONDS) - 1);
    if (ago >= weeks) continue;
    if (e.kind === 'stake') counts[ago].stake++; else counts[ago].unstake++;
  }
  return toBuckets(counts);
}
