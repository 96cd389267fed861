import type { FlowComparison, FlowSide, StakingEvent, Trend, WeeklyBucket } from './schemas.js';
import { pctOf, share } from '../utils/pct.js';

export type AggregateOptions = {
  windowDays: number;
  stakedBalance: number; // verified or estimated, tokens
  weekly: readonly WeeklyBucket[];
};

export const TREND_SCORE: Record<Trend, number> = {
  strong_growth: 2,
  growth: 1,
  stable: 0,
  decline: -1,
  strong_decline: -2,
};

// with zero stake, zero net matches no band and falls to strong_decline
export function classifyTrend(netAmount: number, stakeAmount: number): Trend {
  if (netAmount > stakeAmount * 0.1) return 'strong_growth';
  if (netAmount > 0) return 'growth';
  if (netAmount > -stakeAmount * 0.1) return 'stable';
  if (netAmount > -stakeAmount * 0.3) return 'decline';
  return 'strong_decline';
}

export function assertWindowDays(windowDays: number): void {
  if (!Number.isInteger(windowDays) || windowDays < 1) throw new RangeError(`windowDays must be a positive integer, got ${windowDays}`);
}

function side(events: readonly StakingEvent[], windowDays: number): FlowSide {
  const amount = events.reduce((a, e) => a + e.amount, 0);
  return {
    events: events.length,
    uniqueAddresses: new Set(events.map(e => e.address)).size,
    amount,
    dailyEvents: events.length / windowDays,
    dailyAmount: amount / windowDays,
  };
}

export function aggregateFlows(stakeEvents: readonly StakingEvent[], unstakeEvents: readonly StakingEvent[], o: AggregateOptions): FlowComparison {
  assertWindowDays(o.windowDays);
  const stake = side(stakeEvents, o.windowDays);
  const unstake = side(unstakeEvents, o.windowDays);
  const netAmount = stake.amount - unstake.amount;
  const totalEvents = stake.events + unstake.events;
  const totalAmount = stake.amount + unstake.amount;
  const trend = classifyTrend(netAmount, stake.amount);
  return {
    windowDays: o.windowDays,
    stake,
    unstake,
    net: { events: stake.events - unstake.events, amount: netAmount, dailyAmount: netAmount / o.windowDays },
    percentages: {
      stakeEvents: share(stake.events, totalEvents),
      unstakeEvents: share(unstake.events, totalEvents),
      stakeAmount: share(stake.amount, totalAmount),
      unstakeAmount: share(unstake.amount, totalAmount),
    },
    trend: { trend, score: TREND_SCORE[trend], netFlowPct: pctOf(netAmount, o.stakedBalance) },
    weekly: o.weekly,
  };
}
