import type { LedgerPort } from '../ledger/port.js';
import type { BalanceSnapshot } from './schemas.js';
import { BalanceUnavailableError } from '../errors.js';
import { hexToBigInt, toRawUnits, toTokens } from '../utils/units.js';
import { pctOf } from '../utils/pct.js';

const BALANCE_OF = '0x70a08231';
const DECIMALS = '0x313ce567';
const TOTAL_SUPPLY = '0x18160ddd';

export const DEFAULT_DECIMALS = 18;
export const DEFAULT_TOTAL_SUPPLY = 1_000_000_000;

export function balanceOfCall(holder: string): string {
  return BALANCE_OF + holder.toLowerCase().replace(/^0x/, '').padStart(64, '0');
}

export type BalanceEstimator = () => number | Promise<number>;

export type VerifyOptions = {
  tokenContract: string;
  stakingContract: string;
  decimals: number;
  totalSupply: number; // tokens
  estimate: BalanceEstimator;
  now: number; // unix seconds
};

async function readDirect(ledger: LedgerPort, o: VerifyOptions): Promise<bigint | null> {
  try {
    const raw = hexToBigInt(await ledger.contractRead(o.tokenContract, balanceOfCall(o.stakingContract)));
    return raw !== null && raw > 0n ? raw : null;
  } catch (e) {
    console.warn(`[balance] direct read failed: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

/** balanceOf(staking) on the token; falls back to the caller's estimate. */
export async function verifyBalance(ledger: LedgerPort, o: VerifyOptions): Promise<BalanceSnapshot> {
  const raw = await readDirect(ledger, o);
  if (raw !== null) {
    const tokens = toTokens(raw, o.decimals);
    return { rawBalance: raw.toString(), tokens, percentOfSupply: pctOf(tokens, o.totalSupply), method: 'direct', verifiedAt: o.now };
  }
  const tokens = await o.estimate();
  if (!Number.isFinite(tokens) || tokens <= 0) {
    throw new BalanceUnavailableError(`no direct balance and estimate is not positive (${tokens})`);
  }
  console.warn(`[balance] using estimated balance ${tokens}`);
  return {
    rawBalance: toRawUnits(tokens, o.decimals).toString(),
    tokens,
    percentOfSupply: pctOf(tokens, o.totalSupply),
    method: 'estimated',
    verifiedAt: o.now,
  };
}

export type TokenMeta = { decimals: number; totalSupply: number; probed: { decimals: boolean; totalSupply: boolean } };

async function readUint(ledger: LedgerPort, token: string, call: string): Promise<bigint | null> {
  try {
    return hexToBigInt(await ledger.contractRead(token, call));
  } catch (e) {
    console.warn(`[balance] ${call} on ${token} failed: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

/** Fills decimals / supply the caller left open from the token contract itself. */
export async function probeTokenMeta(ledger: LedgerPort, token: string, known: { decimals?: number; totalSupply?: number }): Promise<TokenMeta> {
  let decimals = known.decimals;
  let totalSupply = known.totalSupply;
  const probed = { decimals: false, totalSupply: false };
  if (decimals === undefined) {
    const d = await readUint(ledger, token, DECIMALS);
    if (d !== null && d <= 36n) { decimals = Number(d); probed.decimals = true; }
  }
  const dec = decimals ?? DEFAULT_DECIMALS;
  if (totalSupply === undefined) {
    const s = await readUint(ledger, token, TOTAL_SUPPLY);
    if (s !== null && s > 0n) { totalSupply = toTokens(s, dec); probed.totalSupply = true; }
  }
  return { decimals: dec, totalSupply: totalSupply ?? DEFAULT_TOTAL_SUPPLY, probed };
}
