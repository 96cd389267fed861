import type { LedgerPort } from '../ledger/port.js';
import type { HealthCheckConfig } from '../config/healthcheck.js';
import { loadDialect, type SelectorDialect } from '../config/selectors.js';
import { createAmountResolver, type AmountResolver } from './amounts.js';
import { SignatureClassifier } from './classify.js';
import { scanWindow, type ScanProgress } from './scanner.js';
import { weeklyByRescan, weeklyByTimestamp } from './weekly.js';
import { verifyBalance, probeTokenMeta, type BalanceEstimator } from './balance.js';
import { aggregateFlows } from './aggregate.js';
import { scoreHealth } from './score.js';
import { projectFlows } from './projection.js';
import { composeSummary } from './summary.js';
import type { FlowSide, HealthReport, SideAnalysis, StakingEvent, WeeklyBucket } from './schemas.js';
import { validateHealthReport, maskInvariantErrors } from '../contracts/invariants.js';
import { withSpan } from '../observability/spans.js';
import { bus, type ScanProgressEvent, type BreachEvent } from '../observability/events.js';
import { LedgerError } from '../errors.js';

export type PipelineDeps = {
  ledger: LedgerPort;
  resolver?: AmountResolver;          // defaults to cfg.amountMode at the token's decimals
  estimateBalance?: BalanceEstimator; // defaults to cfg.balanceEstimate
  dialect?: SelectorDialect;          // defaults to the configured dialect file
  clock?: () => number;               // ms
};

function analyse<E extends StakingEvent>(events: E[], side: FlowSide): SideAnalysis<E> {
  return {
    events,
    count: side.events,
    uniqueAddresses: side.uniqueAddresses,
    totalAmount: side.amount,
    dailyAverageEvents: side.dailyEvents,
    dailyAverageAmount: side.dailyAmount,
  };
}

async function latestBlock(ledger: LedgerPort): Promise<number> {
  try {
    return await ledger.latestBlockNumber();
  } catch (e) {
    if (e instanceof LedgerError) throw e;
    throw new LedgerError('cannot read latest block number', e);
  }
}

/** End-to-end health check over one rolling window. */
export async function runHealthCheck(cfg: HealthCheckConfig, deps: PipelineDeps): Promise<HealthReport> {
  const clock = deps.clock ?? Date.now;
  const t0 = clock();
  const now = Math.floor(t0 / 1000);
  const { ledger } = deps;
  const dialect = deps.dialect ?? loadDialect(cfg.dialect);
  const classifier = new SignatureClassifier(cfg.stakingContract, dialect);

  const latest = await latestBlock(ledger);
  const fromBlock = Math.max(0, latest - cfg.windowDays * cfg.blocksPerDay);
  console.log(`[scan] window ${cfg.windowDays}d blocks ${fromBlock}..${latest} step ${cfg.step}`);

  const meta = await withSpan('token.meta', { token: cfg.tokenContract }, () =>
    probeTokenMeta(ledger, cfg.tokenContract, { decimals: cfg.decimals, totalSupply: cfg.totalSupply }));

  const resolver = deps.resolver ?? createAmountResolver(cfg.amountMode, meta.decimals);
  if (!resolver.trusted) console.warn(`[scan] amount resolver "${resolver.name}" produces placeholder amounts`);

  const balance = await withSpan('balance.verify', { staking: cfg.stakingContract }, () => verifyBalance(ledger, {
    tokenContract: cfg.tokenContract,
    stakingContract: cfg.stakingContract,
    decimals: meta.decimals,
    totalSupply: meta.totalSupply,
    estimate: deps.estimateBalance ?? (() => cfg.balanceEstimate),
    now,
  }));

  const scan = await withSpan('scan.window', { from: fromBlock, to: latest, step: cfg.step }, () => scanWindow(ledger, {
    fromBlock,
    toBlock: latest,
    step: cfg.step,
    concurrency: cfg.concurrency,
    classifier,
    resolver,
    now,
    progressEvery: Math.max(1, Math.floor((latest - fromBlock) / cfg.step / 20)),
    onProgress: (p: ScanProgress) => {
      const ev: ScanProgressEvent = { phase: 'scan', ...p };
      bus.emit('scan:progress', ev);
    },
  }));
  if (scan.blocksMissing) console.warn(`[scan] ${scan.blocksMissing}/${scan.blocksScanned} blocks unavailable`);
  if (scan.droppedEvents) console.warn(`[scan] ${scan.droppedEvents} matching transactions dropped`);

  const weekly: WeeklyBucket[] = await withSpan('scan.weekly', { mode: cfg.weeklyMode }, async () => {
    if (cfg.weeklyMode === 'timestamp') {
      const tip = await ledger.blockByNumber(latest).catch(() => null);
      return weeklyByTimestamp([...scan.stakeEvents, ...scan.unstakeEvents], cfg.windowDays, tip?.timestamp ?? now);
    }
    return weeklyByRescan(ledger, {
      latestBlock: latest,
      windowDays: cfg.windowDays,
      blocksPerDay: cfg.blocksPerDay,
      step: cfg.weeklyStep,
      concurrency: cfg.concurrency,
      classifier,
    });
  });

  const flow = aggregateFlows(scan.stakeEvents, scan.unstakeEvents, { windowDays: cfg.windowDays, stakedBalance: balance.tokens, weekly });
  const health = scoreHealth(balance, flow);
  const projection = projectFlows(flow, balance, scan.unstakeEvents);
  const summary = composeSummary(health, flow, projection);

  const body = {
    contracts: { staking: cfg.stakingContract, token: cfg.tokenContract },
    windowDays: cfg.windowDays,
    blockRange: { from: fromBlock, to: latest, step: cfg.step },
    token: { totalSupply: meta.totalSupply, decimals: meta.decimals },
    amountSource: { resolver: resolver.name, trusted: resolver.trusted },
    balance,
    staking: analyse(scan.stakeEvents, flow.stake),
    unstaking: analyse(scan.unstakeEvents, flow.unstake),
    flow,
    health,
    projection,
    summary,
  };
  const inv = validateHealthReport(body);
  if (!inv.ok) {
    const ev: BreachEvent = { type: 'invariant', note: maskInvariantErrors(inv.errs) };
    bus.emit('breach', ev);
  }

  return {
    generatedAt: new Date(t0).toISOString(),
    executionMs: clock() - t0,
    ...body,
    diagnostics: {
      blocksScanned: scan.blocksScanned,
      blocksMissing: scan.blocksMissing,
      droppedEvents: scan.droppedEvents,
      weeklyMode: cfg.weeklyMode,
      invariantErrors: inv.errs,
    },
  };
}
