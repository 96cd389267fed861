import type { ExecutiveSummary, FlowComparison, HealthAssessment, OverallStatus, ProjectionReport, Trend } from './schemas.js';

export const TREND_LABEL: Record<Trend, string> = {
  strong_growth: 'STRONG GROWTH',
  growth: 'GROWTH',
  stable: 'STABLE',
  decline: 'DECLINE',
  strong_decline: 'STRONG DECLINE',
};

const RECOMMENDATIONS: Record<OverallStatus, string[]> = {
  excellent: ['Maintain current strategies', 'Routine monitoring'],
  good: ['Continue regular monitoring', 'Consider gradual expansion'],
  stable: ['Close monitoring', 'Evaluate staking incentives'],
  attention: ['Preventive action recommended', 'Analyze causes of negative trend', 'Implement incentives to reduce unstaking'],
  critical: ['IMMEDIATE ACTION REQUIRED', 'Review staking strategy', 'Community communication'],
};

export function fmtTokens(n: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

export function fmtSignedPct(n: number): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(2)}%`;
}

export function overallStatus(health: HealthAssessment, flow: FlowComparison, projection: ProjectionReport): OverallStatus {
  const grade = health.grade;
  const netPct = health.metrics.netFlowPct;
  const growing = flow.trend.trend === 'growth' || flow.trend.trend === 'strong_growth';
  const heavyPressure = projection.pressure.intensity === 'high' || projection.pressure.intensity === 'critical';
  if (grade === 'excellent' && growing && netPct > 0) return 'excellent';
  if ((grade === 'excellent' || grade === 'good') && netPct >= 0) return 'good';
  if ((grade === 'good' || grade === 'moderate') && netPct > -5) return 'stable';
  if (grade === 'moderate' || heavyPressure) return 'attention';
  return 'critical';
}

export function priorityActions(status: OverallStatus, netFlowPct: number, pressurePct: number): string[] {
  const actions: string[] = [];
  if (status === 'critical') {
    actions.push('Implement emergency measures to reduce unstaking');
    actions.push('Immediate stakeholder communication');
    actions.push('Consider urgent economic incentives');
  }
  if (netFlowPct < -5) {
    actions.push('Analyze causes of negative flow');
    actions.push('Implement retention campaigns');
  }
  if (pressurePct > 5) {
    actions.push('Prepare liquidity to absorb sales');
    actions.push('Real-time market monitoring');
  }
  if (!actions.length) actions.push('Continue regular monitoring');
  return actions;
}

export function composeSummary(health: HealthAssessment, flow: FlowComparison, projection: ProjectionReport): ExecutiveSummary {
  const status = overallStatus(health, flow, projection);
  const p = projection.pressure;
  return {
    status,
    keyMetrics: {
      stakingShare: `${health.metrics.stakingSharePct.toFixed(2)}% of supply staked`,
      netFlow: `${fmtSignedPct(health.metrics.netFlowPct)} net flow`,
      trend: TREND_LABEL[flow.trend.trend],
      sellingPressure: `${p.intensity.toUpperCase()} - ${fmtTokens(p.total)} tokens`,
    },
    recommendations: [...RECOMMENDATIONS[status]],
    priorityActions: priorityActions(status, health.metrics.netFlowPct, p.pctOfBalance),
    nextReview: status === 'critical' ? '24 hours' : status === 'attention' ? '72 hours' : '7 days',
  };
}
