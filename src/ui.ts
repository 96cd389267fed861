import type { HealthReport, OverallStatus } from './staking/schemas.js';
import { TREND_LABEL, fmtSignedPct, fmtTokens } from './staking/summary.js';
import { maskAddr } from './security/log_mask.js';

export const Divider = '━━━━━━━━━━━━━━━━';
const Rule = '='.repeat(60);

const MD_CHARS = /([_*\[\]()~`>#+\-=|{}.!\\])/g;
export function escapeMD(s: string) { return s.replace(MD_CHARS, '\\$1'); }

function statusBadge(s: OverallStatus) {
  return ({ excellent: '🟢', good: '🟢', stable: '🟡', attention: '🟠', critical: '🔴' } as const)[s];
}

const pct2 = (n: number) => `${n.toFixed(2)}%`;

/** Plain-text report for stdout. */
export function renderReport(r: HealthReport): string {
  const { balance, flow, health, projection, summary } = r;
  const lines: string[] = [
    Rule,
    'STAKING HEALTH CHECK',
    Rule,
    `Staking contract: ${r.contracts.staking}`,
    `Token contract:   ${r.contracts.token}`,
    `Window: ${r.windowDays} days (blocks ${r.blockRange.from}..${r.blockRange.to}, step ${r.blockRange.step})`,
    `Generated: ${r.generatedAt} in ${(r.executionMs / 1000).toFixed(1)}s`,
    '',
    'BALANCE',
    `  Staked: ${fmtTokens(balance.tokens)} tokens (${pct2(balance.percentOfSupply)} of supply) [${balance.method}]`,
    '',
    'FLOWS',
    `  Stake:   ${flow.stake.events} events, ${flow.stake.uniqueAddresses} addresses, ${fmtTokens(flow.stake.amount)} tokens`,
    `  Unstake: ${flow.unstake.events} events, ${flow.unstake.uniqueAddresses} addresses, ${fmtTokens(flow.unstake.amount)} tokens`,
    `  Net:     ${fmtTokens(flow.net.amount)} tokens (${fmtSignedPct(flow.trend.netFlowPct)}), trend ${TREND_LABEL[flow.trend.trend]}`,
  ];
  if (!r.amountSource.trusted) {
    lines.push(`  Amounts are placeholders (${r.amountSource.resolver}); counts are exact, token figures are not.`);
  }
  if (flow.weekly.length) {
    lines.push('', 'WEEKLY');
    for (const w of flow.weekly) lines.push(`  Week ${w.week}: +${w.stakeEvents} / -${w.unstakeEvents} (net ${w.netEvents})`);
  }
  lines.push(
    '',
    'HEALTH',
    `  Factors: [${health.factors.join(', ')}] avg ${health.average.toFixed(2)} -> ${health.grade.toUpperCase()}`,
    `  Staking level ${health.interpretation.stakingLevel}, flow ${health.interpretation.flowBalance}`,
    '',
    `PROJECTION (${projection.horizonDays} days)`,
    `  Net ${fmtTokens(projection.projectedNet)} tokens (${fmtSignedPct(projection.projectedChangePct)}), daily ${fmtSignedPct(projection.dailyGrowthRatePct)}`,
    `  Unlock pressure: ${fmtTokens(projection.pressure.total)} tokens (${pct2(projection.pressure.pctOfBalance)}) ${projection.pressure.intensity.toUpperCase()}`,
  );
  for (const b of projection.pressure.timeline) lines.push(`    day ${String(b.day).padStart(2)}: ${fmtTokens(b.amount)} (${b.count})`);
  lines.push(
    `  Risk: liquidity ${projection.risk.liquidity}, growth ${projection.risk.growth}, market impact ${projection.risk.marketImpact}`,
    '',
    `SUMMARY: ${summary.status.toUpperCase()}`,
    ...Object.values(summary.keyMetrics).map(m => `  - ${m}`),
    'Recommendations:',
    ...summary.recommendations.map(m => `  - ${m}`),
    'Priority actions:',
    ...summary.priorityActions.map(m => `  - ${m}`),
    `Next review: ${summary.nextReview}`,
  );
  const d = r.diagnostics;
  if (d.blocksMissing || d.droppedEvents || d.invariantErrors.length) {
    lines.push('', `Diagnostics: ${d.blocksMissing}/${d.blocksScanned} blocks missing, ${d.droppedEvents} dropped, ${d.invariantErrors.length} invariant errors`);
  }
  lines.push(Rule);
  return lines.join('\n');
}

/** Telegram MarkdownV2 card. */
export function renderSummaryCard(r: HealthReport): string {
  const s = r.summary;
  const head = `${statusBadge(s.status)} *Staking health: ${escapeMD(s.status.toUpperCase())}*\n${Divider}`;
  const who = `📜 \`${escapeMD(maskAddr(r.contracts.staking))}\` · ${escapeMD(`${r.windowDays}d`)}`;
  const metrics = Object.values(s.keyMetrics).map(m => `• ${escapeMD(m)}`).join('\n');
  const grade = `🩺 Grade *${escapeMD(r.health.grade)}* \\(avg ${escapeMD(r.health.average.toFixed(2))}\\)`;
  const actions = s.priorityActions.map(a => `→ ${escapeMD(a)}`).join('\n');
  const review = `_Next review: ${escapeMD(s.nextReview)}_`;
  const caveat = r.amountSource.trusted ? '' : `_${escapeMD('Token amounts are placeholders; event counts are exact.')}_`;
  return [head, who, metrics, grade, Divider, actions, review, caveat].filter(Boolean).join('\n');
}
