// Dependency-free consistency checks over a composed health report

import type { HealthReport } from '../staking/schemas.js';
import { UNLOCK_PERIOD_DAYS } from '../staking/schemas.js';

export type InvariantResult = { ok: boolean; errs: string[] };

type ReportBody = Omit<HealthReport, 'diagnostics' | 'executionMs' | 'generatedAt'>;

const FACTORS = new Set([-1, 0, 1, 2]);
const near = (a: number, b: number) => Math.abs(a - b) <= 1e-6 * Math.max(1, Math.abs(a), Math.abs(b));

export function validateHealthReport(r: ReportBody): InvariantResult {
  const errs: string[] = [];
  const { flow, health, projection } = r;

  if (!(r.balance.tokens > 0)) errs.push('balance.tokens.nonpositive');
  if (r.staking.count !== flow.stake.events) errs.push('staking.count.mismatch');
  if (r.unstaking.count !== flow.unstake.events) errs.push('unstaking.count.mismatch');
  if (!near(flow.net.amount, flow.stake.amount - flow.unstake.amount)) errs.push('flow.net.amount');
  if (flow.net.events !== flow.stake.events - flow.unstake.events) errs.push('flow.net.events');
  if (flow.stake.uniqueAddresses > flow.stake.events) errs.push('flow.stake.unique');
  if (flow.unstake.uniqueAddresses > flow.unstake.events) errs.push('flow.unstake.unique');

  const p = flow.percentages;
  const evSum = p.stakeEvents + p.unstakeEvents;
  if (flow.stake.events + flow.unstake.events > 0 ? !near(evSum, 100) : evSum !== 0) errs.push('flow.percentages.events');
  const amtSum = p.stakeAmount + p.unstakeAmount;
  if (flow.stake.amount + flow.unstake.amount > 0 ? !near(amtSum, 100) : amtSum !== 0) errs.push('flow.percentages.amount');

  for (let i = 1; i < flow.weekly.length; i++) {
    if (flow.weekly[i].week <= flow.weekly[i - 1].week) errs.push(`flow.weekly[${i}].order`);
  }
  if (flow.weekly.length > 4) errs.push('flow.weekly.length');

  health.factors.forEach((f, i) => { if (!FACTORS.has(f)) errs.push(`health.factors[${i}].range`); });
  const mean = health.factors.reduce<number>((a, b) => a + b, 0) / health.factors.length;
  if (!near(mean, health.average)) errs.push('health.average');

  const tl = projection.pressure.timeline;
  for (let i = 0; i < tl.length; i++) {
    if (tl[i].day < 0 || tl[i].day > UNLOCK_PERIOD_DAYS) errs.push(`projection.timeline[${i}].day`);
    if (i > 0 && tl[i].day <= tl[i - 1].day) errs.push(`projection.timeline[${i}].order`);
  }
  if (!near(tl.reduce((a, b) => a + b.amount, 0), projection.pressure.total)) errs.push('projection.pressure.total');

  for (const e of r.staking.events) {
    if (e.blockNumber < r.blockRange.from || e.blockNumber >= r.blockRange.to) errs.push(`staking.${e.txHash}.range`);
  }
  for (const e of r.unstaking.events) {
    if (e.blockNumber < r.blockRange.from || e.blockNumber >= r.blockRange.to) errs.push(`unstaking.${e.txHash}.range`);
    if ((e.status === 'expired') !== (e.daysRemaining <= 0)) errs.push(`unstaking.${e.txHash}.status`);
  }

  return { ok: errs.length === 0, errs };
}

export function maskInvariantErrors(errs: readonly string[]): string {
  // compact, tx hashes shortened
  const uniq = Array.from(new Set(errs.map(e => e.replace(/0x[a-f0-9]{64}/gi, m => m.slice(0, 10) + '…')))).slice(0, 10);
  return uniq.join(', ');
}
