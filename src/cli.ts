#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type HealthCheckConfig } from './config/healthcheck.js';
import { loadDialect } from './config/selectors.js';
import { ConfigError, LedgerError, BalanceUnavailableError } from './errors.js';
import { RpcClient, rpcUrls } from './rpc.js';
import { createCache } from './cache.js';
import { EvmLedger } from './ledger/evm.js';
import { runHealthCheck } from './staking/pipeline.js';
import type { HealthReport } from './staking/schemas.js';
import { defaultOutputName, writeReport } from './report.js';
import { getEndpointMetrics } from './metrics.js';
import { renderReport } from './ui.js';
import { notifyReport } from './notify.js';
import { createRunMetrics, pushRunMetrics } from './observability/run_metrics.js';
import { setupTracing } from './tracing.js';
import { bus, type ScanProgressEvent, type BreachEvent, type PhaseEvent } from './observability/events.js';

async function run(cfg: HealthCheckConfig): Promise<void> {
  const dialect = loadDialect(cfg.dialect);
  const { cache, close } = createCache();
  const ledger = new EvmLedger(new RpcClient(rpcUrls(), { cache }));

  let lastPct = -1;
  bus.on('scan:progress', (p: ScanProgressEvent) => {
    const pct = Math.floor(p.pct / 10) * 10;
    if (pct === lastPct) return;
    lastPct = pct;
    console.log(`[scan] ${pct}% (${p.visited}/${p.total} blocks, ${p.events} events)`);
  });
  bus.on('breach', (b: BreachEvent) => console.warn(`[${b.type}] ${b.note}`));
  bus.on('phase', (p: PhaseEvent) => console.log(`[phase] ${p.phase} ${p.ms}ms`));

  try {
    const base = await runHealthCheck(cfg, { ledger, dialect });
    const report: HealthReport = { ...base, diagnostics: { ...base.diagnostics, rpc: getEndpointMetrics() } };
    console.log(renderReport(report));

    const out = cfg.output ?? defaultOutputName(new Date());
    await writeReport(report, out);
    console.log(`[cli] report written to ${out}`);

    if (cfg.notify) {
      await notifyReport(report).catch((e: unknown) => console.warn(`[notify] failed: ${e instanceof Error ? e.message : String(e)}`));
    }
    const metrics = createRunMetrics();
    metrics.observe(report);
    await pushRunMetrics(metrics, cfg.stakingContract)
      .catch((e: unknown) => { console.warn(`[metrics] push failed: ${e instanceof Error ? e.message : String(e)}`); return false; });
  } finally {
    await close();
  }
}

async function main(): Promise<number> {
  const stopTracing = await setupTracing('stakewatch');
  try {
    const cfg = loadConfig();
    await run(cfg);
    return 0;
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`[cli] ${e.message}`);
      console.error('usage: stakewatch --staking 0x… --token 0x… [--days 14] [--step 100] [--weekly-mode rescan|timestamp] [--amounts seeded|native-value] [--output file.json] [--notify]');
    } else if (e instanceof LedgerError || e instanceof BalanceUnavailableError) {
      console.error(`[cli] ${e.name}: ${e.message}`);
    } else {
      console.error('[cli] unexpected failure', e);
    }
    return 1;
  } finally {
    await stopTracing();
  }
}

process.exitCode = await main();
