import { Gauge, Pushgateway, Registry } from 'prom-client';
import type { HealthReport } from '../staking/schemas.js';

const GRADE_VALUE = { excellent: 3, good: 2, moderate: 1, critical: 0 } as const;

export type RunMetrics = { registry: Registry; observe(r: HealthReport): void };

export function createRunMetrics(): RunMetrics {
  const registry = new Registry();
  const g = (name: string, help: string) => new Gauge({ name: `stakewatch_${name}`, help, registers: [registry] });
  const balance = g('staked_balance_tokens', 'Staked balance in tokens');
  const share = g('staking_share_pct', 'Share of supply staked');
  const netFlow = g('net_flow_pct', 'Net flow as % of staked balance');
  const healthAvg = g('health_average', 'Mean of the four health factors');
  const grade = g('health_grade', 'Health grade, 3 excellent to 0 critical');
  const pressure = g('unlock_pressure_pct', 'Unstakes unlocking within 14 days, % of balance');
  const events = new Gauge({ name: 'stakewatch_events', help: 'Classified events in window', labelNames: ['kind'], registers: [registry] });
  const blocks = new Gauge({ name: 'stakewatch_blocks', help: 'Blocks visited in window', labelNames: ['state'], registers: [registry] });
  const dropped = g('dropped_events', 'Transactions dropped during classification');
  const duration = g('run_duration_ms', 'Wall time of the run');

  return {
    registry,
    observe(r) {
      balance.set(r.balance.tokens);
      share.set(r.health.metrics.stakingSharePct);
      netFlow.set(r.health.metrics.netFlowPct);
      healthAvg.set(r.health.average);
      grade.set(GRADE_VALUE[r.health.grade]);
      pressure.set(r.projection.pressure.pctOfBalance);
      events.set({ kind: 'stake' }, r.staking.count);
      events.set({ kind: 'unstake' }, r.unstaking.count);
      blocks.set({ state: 'scanned' }, r.diagnostics.blocksScanned);
      blocks.set({ state: 'missing' }, r.diagnostics.blocksMissing);
      dropped.set(r.diagnostics.droppedEvents);
      duration.set(r.executionMs);
    },
  };
}

/** pushAdd to the configured gateway; returns false when none is configured. */
export async function pushRunMetrics(m: RunMetrics, stakingContract: string, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  const url = env.PUSHGATEWAY_URL || '';
  if (!url) return false;
  const gw = new Pushgateway(url, { timeout: 5000 }, m.registry);
  await gw.pushAdd({ jobName: 'stakewatch', groupings: { contract: stakingContract.toLowerCase() } });
  return true;
}
