import { ConfigError } from '../errors.js';
import type { WeeklyMode } from '../staking/weekly.js';
import type { AmountMode } from '../staking/amounts.js';

export type HealthCheckConfig = {
  stakingContract: string;
  tokenContract: string;
  windowDays: number;
  totalSupply?: number;  // probed from the token when absent
  decimals?: number;
  blocksPerDay: number;
  step: number;
  weeklyStep: number;
  weeklyMode: WeeklyMode;
  concurrency: number;
  dialect: string;
  amountMode: AmountMode;
  balanceEstimate: number;
  output?: string;
  notify: boolean;
};

export const DEFAULTS = {
  windowDays: 14,
  blocksPerDay: 43_200, // 2s blocks
  step: 100,
  weeklyStep: 200,
  weeklyMode: 'rescan',
  concurrency: 8,
  dialect: 'default',
  amountMode: 'seeded',
  balanceEstimate: 458_000_000,
} as const;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

function arg(argv: readonly string[], name: string): string | undefined {
  const i = argv.indexOf(`--${name}`);
  if (i < 0) return undefined;
  const v = argv[i + 1];
  return v === undefined || v.startsWith('--') ? '' : v;
}

const VALUE_FLAGS = {
  staking: 'stakingContract',
  token: 'tokenContract',
  days: 'windowDays',
  supply: 'totalSupply',
  decimals: 'decimals',
  'blocks-per-day': 'blocksPerDay',
  step: 'step',
  'weekly-mode': 'weeklyMode',
  concurrency: 'concurrency',
  dialect: 'dialect',
  amounts: 'amountMode',
  estimate: 'balanceEstimate',
  output: 'output',
} as const;

function flag(argv: readonly string[], name: string): boolean {
  return argv.includes(`--${name}`);
}

// NaN marks a value that was given but is not a number; validateConfig reports it
function num(raw: string | undefined, d: number): number;
function num(raw: string | undefined): number | undefined;
function num(raw: string | undefined, d?: number): number | undefined {
  if (raw === undefined || raw.trim() === '') return d;
  return Number(raw);
}

function oneOf<T extends string>(raw: string, allowed: readonly T[]): T | undefined {
  return allowed.find(a => a === raw);
}

/** CLI flags override environment; environment overrides defaults. */
export function loadConfig(argv: readonly string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): HealthCheckConfig {
  const pick = (flagName: string | null, envKey: string) => (flagName ? arg(argv, flagName) : undefined) ?? env[envKey];
  const errs: string[] = [];
  for (const [name, key] of Object.entries(VALUE_FLAGS)) {
    if (arg(argv, name) === '') errs.push(`${key}.missing`);
  }

  const weeklyRaw = pick('weekly-mode', 'WEEKLY_MODE') || DEFAULTS.weeklyMode;
  const weeklyMode = oneOf(weeklyRaw, ['rescan', 'timestamp'] as const);
  if (!weeklyMode) errs.push(`weeklyMode.invalid(${weeklyRaw})`);
  const amountsRaw = pick('amounts', 'AMOUNT_MODE') || DEFAULTS.amountMode;
  const amountMode = oneOf(amountsRaw, ['seeded', 'native-value'] as const);
  if (!amountMode) errs.push(`amountMode.invalid(${amountsRaw})`);
  if (errs.length) throw new ConfigError(errs);

  const cfg: HealthCheckConfig = {
    stakingContract: (pick('staking', 'STAKING_CONTRACT') ?? '').trim(),
    tokenContract: (pick('token', 'TOKEN_CONTRACT') ?? '').trim(),
    windowDays: num(pick('days', 'WINDOW_DAYS'), DEFAULTS.windowDays),
    totalSupply: num(pick('supply', 'TOTAL_SUPPLY')),
    decimals: num(pick('decimals', 'TOKEN_DECIMALS')),
    blocksPerDay: num(pick('blocks-per-day', 'BLOCKS_PER_DAY'), DEFAULTS.blocksPerDay),
    step: num(pick('step', 'SCAN_STEP'), DEFAULTS.step),
    weeklyStep: num(pick(null, 'WEEKLY_STEP'), DEFAULTS.weeklyStep),
    weeklyMode: weeklyMode ?? DEFAULTS.weeklyMode,
    concurrency: num(pick('concurrency', 'SCAN_CONCURRENCY'), DEFAULTS.concurrency),
    dialect: (pick('dialect', 'SELECTOR_DIALECT') || DEFAULTS.dialect).trim(),
    amountMode: amountMode ?? DEFAULTS.amountMode,
    balanceEstimate: num(pick('estimate', 'STAKED_BALANCE_ESTIMATE'), DEFAULTS.balanceEstimate),
    output: arg(argv, 'output') || undefined,
    notify: flag(argv, 'notify'),
  };
  validateConfig(cfg);
  return cfg;
}

const positiveInt = (n: number) => Number.isInteger(n) && n > 0;

export function validateConfig(c: HealthCheckConfig): void {
  const errs: string[] = [];
  if (!ADDRESS_RE.test(c.stakingContract)) errs.push('stakingContract.invalid');
  if (!ADDRESS_RE.test(c.tokenContract)) errs.push('tokenContract.invalid');
  if (!positiveInt(c.windowDays)) errs.push('windowDays.invalid');
  if (c.totalSupply !== undefined && !(Number.isFinite(c.totalSupply) && c.totalSupply > 0)) errs.push('totalSupply.invalid');
  if (c.decimals !== undefined && !(Number.isInteger(c.decimals) && c.decimals >= 0 && c.decimals <= 36)) errs.push('decimals.invalid');
  if (!positiveInt(c.blocksPerDay)) errs.push('blocksPerDay.invalid');
  if (!positiveInt(c.step)) errs.push('step.invalid');
  if (!positiveInt(c.weeklyStep)) errs.push('weeklyStep.invalid');
  if (!positiveInt(c.concurrency)) errs.push('concurrency.invalid');
  if (!c.dialect) errs.push('dialect.missing');
  if (!(Number.isFinite(c.balanceEstimate) && c.balanceEstimate > 0)) errs.push('balanceEstimate.invalid');
  if (errs.length) throw new ConfigError(errs);
}
