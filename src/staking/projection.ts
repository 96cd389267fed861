import {
  PROJECTION_HORIZON_DAYS,
  UNLOCK_PERIOD_DAYS,
  type BalanceSnapshot,
  type FlowComparison,
  type PressureBucket,
  type PressureIntensity,
  type ProjectionReport,
  type UnstakeEvent,
} from './schemas.js';
import { pctOf } from '../utils/pct.js';

/** Day buckets of unstakes unlocking within the unlock period, soonest first. */
export function pressureTimeline(unstakeEvents: readonly UnstakeEvent[]): PressureBucket[] {
  const byDay = new Map<number, { day: number; amount: number; count: number }>();
  for (const e of unstakeEvents) {
    if (e.daysRemaining < 0 || e.daysRemaining > UNLOCK_PERIOD_DAYS) continue;
    const b = byDay.get(e.daysRemaining) ?? { day: e.daysRemaining, amount: 0, count: 0 };
    b.amount += e.amount;
    b.count += 1;
    byDay.set(e.daysRemaining, b);
  }
  return [...byDay.values()].sort((a, b) => a.day - b.day);
}

export function pressureIntensity(pct: number): PressureIntensity {
  if (pct < 1) return 'low';
  if (pct < 3) return 'moderate';
  if (pct < 7) return 'high';
  return 'critical';
}

/**
 * Straight-line extrapolation of the window's daily rates; no seasonality,
 * no decay. Treat the 30-day figures as a direction, not a forecast.
 */
export function projectFlows(flow: FlowComparison, balance: BalanceSnapshot, unstakeEvents: readonly UnstakeEvent[]): ProjectionReport {
  const projectedStake = flow.stake.dailyAmount * PROJECTION_HORIZON_DAYS;
  const projectedUnstake = flow.unstake.dailyAmount * PROJECTION_HORIZON_DAYS;
  const projectedNet = flow.net.dailyAmount * PROJECTION_HORIZON_DAYS;
  const projectedChangePct = pctOf(projectedNet, balance.tokens);

  const timeline = pressureTimeline(unstakeEvents);
  const total = timeline.reduce((a, b) => a + b.amount, 0);
  const pctOfBalance = pctOf(total, balance.tokens);
  const intensity = pressureIntensity(pctOfBalance);

  return {
    horizonDays: PROJECTION_HORIZON_DAYS,
    projectedStake,
    projectedUnstake,
    projectedNet,
    projectedChangePct,
    dailyGrowthRatePct: pctOf(flow.net.dailyAmount, balance.tokens),
    pressure: { total, pctOfBalance, intensity, dailyAverage: total / UNLOCK_PERIOD_DAYS, timeline },
    risk: {
      liquidity: intensity === 'high' || intensity === 'critical' ? 'high' : intensity === 'moderate' ? 'medium' : 'low',
      growth: projectedChangePct > 0 ? 'sustainable' : projectedChangePct < -10 ? 'at_risk' : 'stable',
      marketImpact: pctOfBalance > 5 ? 'significant' : pctOfBalance > 2 ? 'moderate' : 'limited',
    },
  };
}
