import { describe, it, expect } from 'vitest';
import { readBudgets, backoffMs } from '../src/config/budgets.js';
import { withEnv } from './helpers/mockEnv.js';

describe('transport budgets', () => {
  it('reads overrides from the environment and ignores junk', () => {
    const b = withEnv({ RPC_TIMEOUT_MS: '1500', RPC_RETRY: 'lots', BREAKER_THRESHOLD: '0' }, () => readBudgets());
    expect(b.RPC_TIMEOUT_MS).toBe(1500);
    expect(b.RPC_RETRY).toBe(1);
    expect(b.BREAKER_THRESHOLD).toBe(1);
  });

  it('falls back to defaults for unset keys', () => {
    const b = withEnv({ RPC_TIMEOUT_MS: undefined, JITTER_PCT: undefined }, () => readBudgets());
    expect(b.RPC_TIMEOUT_MS).toBe(7000);
    expect(b.JITTER_PCT).toBe(15);
  });

  it('backs off exponentially up to the cap with bounded jitter', () => {
    const b = readBudgets({});
    expect(backoffMs(b, 0, () => 0.5)).toBe(200);
    expect(backoffMs(b, 3, () => 0.5)).toBe(1600);
    expect(backoffMs(b, 10, () => 0.5)).toBe(2000);
    expect(backoffMs(b, 0, () => 1)).toBe(230);
    expect(backoffMs(b, 0, () => 0)).toBe(170);
  });
});
