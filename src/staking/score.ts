import type { BalanceSnapshot, FlowComparison, HealthAssessment, HealthFactor, HealthGrade } from './schemas.js';
import { pctOf } from '../utils/pct.js';

function stakingShareFactor(pct: number): HealthFactor {
  if (pct > 40) return 2;
  if (pct > 20) return 1;
  if (pct > 10) return 0;
  return -1;
}

function unstakingIncidenceFactor(pct: number): HealthFactor {
  if (pct < 2) return 2;
  if (pct < 5) return 1;
  if (pct < 10) return 0;
  return -1;
}

// strong decline scores -2 on the flow trend; the health factor floors at -1
function trendFactor(score: number): HealthFactor {
  if (score >= 2) return 2;
  if (score >= 1) return 1;
  if (score >= 0) return 0;
  return -1;
}

function netFlowFactor(pct: number): HealthFactor {
  if (pct > 5) return 2;
  if (pct > 0) return 1;
  if (pct > -5) return 0;
  return -1;
}

export function gradeFor(average: number): HealthGrade {
  if (average >= 1.5) return 'excellent';
  if (average >= 0.5) return 'good';
  if (average >= -0.5) return 'moderate';
  return 'critical';
}

export function scoreHealth(balance: BalanceSnapshot, flow: FlowComparison): HealthAssessment {
  const stakingSharePct = balance.percentOfSupply;
  const unstakingIncidencePct = pctOf(flow.unstake.amount, balance.tokens);
  const stakingFlowPct = pctOf(flow.stake.amount, balance.tokens);
  const netFlowPct = pctOf(flow.net.amount, balance.tokens);

  const factors = [
    stakingShareFactor(stakingSharePct),
    unstakingIncidenceFactor(unstakingIncidencePct),
    trendFactor(flow.trend.score),
    netFlowFactor(netFlowPct),
  ] as const;
  const average = factors.reduce<number>((a, b) => a + b, 0) / factors.length;

  return {
    factors,
    average,
    grade: gradeFor(average),
    metrics: { stakingSharePct, unstakingIncidencePct, stakingFlowPct, netFlowPct },
    interpretation: {
      stakingLevel: stakingSharePct > 40 ? 'very_high' : stakingSharePct > 20 ? 'high' : stakingSharePct > 10 ? 'medium' : 'low',
      flowBalance: flow.net.amount > 0 ? 'positive' : flow.net.amount < 0 ? 'negative' : 'balanced',
    },
  };
}
