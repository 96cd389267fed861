import { describe, it, expect } from 'vitest';
import { verifyBalance, probeTokenMeta, balanceOfCall } from '../src/staking/balance.js';
import { BalanceUnavailableError } from '../src/errors.js';
import { FakeLedger, STAKING, TOKEN } from './helpers/fakeLedger.js';

const E18 = 10n ** 18n;
const base = { tokenContract: TOKEN, stakingContract: STAKING, decimals: 18, totalSupply: 1_000_000_000, estimate: () => 458_000_000, now: 1_700_000_000 };

describe('balance verifier', () => {
  it('encodes balanceOf with a left-padded holder', () => {
    expect(balanceOfCall(STAKING)).toBe('0x70a08231' + '0'.repeat(24) + '1'.repeat(40));
    expect(balanceOfCall(STAKING)).toHaveLength(74);
  });

  it('uses the direct read when positive', async () => {
    const ledger = new FakeLedger(1);
    ledger.setBalance(TOKEN, STAKING, 250_000_000n * E18);
    const b = await verifyBalance(ledger, base);
    expect(b).toEqual({ rawBalance: (250_000_000n * E18).toString(), tokens: 250_000_000, percentOfSupply: 25, method: 'direct', verifiedAt: 1_700_000_000 });
  });

  it('falls back to the estimate on a zero balance', async () => {
    const ledger = new FakeLedger(1);
    ledger.setBalance(TOKEN, STAKING, 0n);
    const b = await verifyBalance(ledger, base);
    expect(b.method).toBe('estimated');
    expect(b.tokens).toBe(458_000_000);
    expect(b.percentOfSupply).toBe(45.8);
    expect(b.rawBalance).toBe('458000000' + '0'.repeat(18));
  });

  it('falls back to the estimate when the read fails', async () => {
    const ledger = new FakeLedger(1);
    ledger.setBalance(TOKEN, STAKING, new Error('execution reverted'));
    const b = await verifyBalance(ledger, { ...base, estimate: async () => 1_000 });
    expect(b).toMatchObject({ method: 'estimated', tokens: 1_000 });
  });

  it('refuses a non-positive estimate', async () => {
    const ledger = new FakeLedger(1);
    await expect(verifyBalance(ledger, { ...base, estimate: () => 0 })).rejects.toBeInstanceOf(BalanceUnavailableError);
    await expect(verifyBalance(ledger, { ...base, estimate: () => Number.NaN })).rejects.toBeInstanceOf(BalanceUnavailableError);
  });
});

describe('token metadata probe', () => {
  const word = (n: bigint) => '0x' + n.toString(16).padStart(64, '0');

  it('reads decimals and supply from the token', async () => {
    const ledger = new FakeLedger(1);
    ledger.setRead(TOKEN, '0x313ce567', word(6n));
    ledger.setRead(TOKEN, '0x18160ddd', word(5_000_000n * 10n ** 6n));
    expect(await probeTokenMeta(ledger, TOKEN, {})).toEqual({ decimals: 6, totalSupply: 5_000_000, probed: { decimals: true, totalSupply: true } });
  });

  it('keeps configured values without reading', async () => {
    const ledger = new FakeLedger(1);
    ledger.setRead(TOKEN, '0x313ce567', word(6n));
    expect(await probeTokenMeta(ledger, TOKEN, { decimals: 18, totalSupply: 42 })).toEqual({ decimals: 18, totalSupply: 42, probed: { decimals: false, totalSupply: false } });
  });

  it('defaults when the token does not answer', async () => {
    const ledger = new FakeLedger(1);
    ledger.setRead(TOKEN, '0x18160ddd', new Error('reverted'));
    expect(await probeTokenMeta(ledger, TOKEN, {})).toEqual({ decimals: 18, totalSupply: 1_000_000_000, probed: { decimals: false, totalSupply: false } });
  });
});
