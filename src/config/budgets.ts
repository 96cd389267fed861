export type Budgets = {
  RPC_TIMEOUT_MS: number;
  RPC_RETRY: number;
  BACKOFF_BASE_MS: number;
  BACKOFF_MAX_MS: number;
  JITTER_PCT: number;
  BREAKER_THRESHOLD: number;
  BREAKER_COOLDOWN_MS: number;
};

export function readBudgets(env: NodeJS.ProcessEnv = process.env): Budgets {
  const num = (k: string, d: number) => {
    const n = Number(env[k] ?? d);
    return Number.isFinite(n) && n >= 0 ? n : d;
  };
  return {
    RPC_TIMEOUT_MS: num('RPC_TIMEOUT_MS', 7000),
    RPC_RETRY: Math.floor(num('RPC_RETRY', 1)),
    BACKOFF_BASE_MS: num('BACKOFF_BASE_MS', 200),
    BACKOFF_MAX_MS: num('BACKOFF_MAX_MS', 2000),
    JITTER_PCT: num('JITTER_PCT', 15),
    BREAKER_THRESHOLD: Math.max(1, Math.floor(num('BREAKER_THRESHOLD', 3))),
    BREAKER_COOLDOWN_MS: num('BREAKER_COOLDOWN_MS', 60_000),
  };
}

/** Exponential backoff for attempt n (0-based), capped, with +/- jitter. */
export function backoffMs(b: Budgets, attempt: number, rnd: () => number = Math.random): number {
  const base = Math.min(b.BACKOFF_MAX_MS, b.BACKOFF_BASE_MS * 2 ** attempt);
  const jitter = base * (b.JITTER_PCT / 100) * (rnd() * 2 - 1);
  return Math.max(0, Math.round(base + jitter));
}
