import type { LedgerBlock, LedgerPort, LedgerTransaction } from './port.js';
import type { RpcClient } from '../rpc.js';
import { LedgerError } from '../errors.js';
import { hexToBigInt } from '../utils/units.js';

export type RpcCaller = Pick<RpcClient, 'call'>;

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function hexNum(v: unknown): number | null {
  if (typeof v !== 'string') return null;
  const n = hexToBigInt(v);
  return n === null ? null : Number(n);
}

function str(v: unknown): string | null {
  return typeof v === 'string' ? v : null;
}

export function parseTransaction(raw: unknown): LedgerTransaction | null {
  if (!isObject(raw)) return null;
  const hash = str(raw.hash);
  const from = str(raw.from);
  if (!hash || !from) return null;
  const to = str(raw.to);
  return {
    hash,
    from,
    to: to && to.length ? to : null,
    input: str(raw.input) ?? str(raw.data) ?? '0x',
    value: typeof raw.value === 'string' ? hexToBigInt(raw.value) ?? 0n : 0n,
  };
}

export function parseBlock(raw: unknown): LedgerBlock | null {
  if (!isObject(raw)) return null;
  const number = hexNum(raw.number);
  const timestamp = hexNum(raw.timestamp);
  if (number === null || timestamp === null) return null;
  const txs = Array.isArray(raw.transactions) ? raw.transactions : [];
  const transactions: LedgerTransaction[] = [];
  // hash-only entries and malformed objects are skipped
  for (const t of txs) {
    const tx = parseTransaction(t);
    if (tx) transactions.push(tx);
  }
  return { number, timestamp, transactions };
}

// chainTag pins the block cache namespace; otherwise it is the endpoint's eth_chainId
export type EvmLedgerOptions = { chainTag?: string; blockTtlSec?: number };

/** Ledger port over an Ethereum JSON-RPC endpoint set. */
export class EvmLedger implements LedgerPort {
  private chainTag?: Promise<string | null>;
  private readonly blockTtlSec?: number;
  constructor(private readonly rpc: RpcCaller, o: EvmLedgerOptions = {}) {
    if (o.chainTag) this.chainTag = Promise.resolve(o.chainTag);
    this.blockTtlSec = o.blockTtlSec;
  }

  // null leaves blocks uncached; a failed lookup is retried on the next block
  private async cacheTag(): Promise<string | null> {
    this.chainTag ??= this.rpc.call('eth_chainId', []).then(raw => {
      const id = hexNum(raw);
      return id === null ? null : String(id);
    });
    try {
      return await this.chainTag;
    } catch (e) {
      console.warn(`[ledger] eth_chainId failed, blocks not cached: ${e instanceof Error ? e.message : String(e)}`);
      this.chainTag = undefined;
      return null;
    }
  }

  async latestBlockNumber(): Promise<number> {
    let raw: unknown;
    try {
      raw = await this.rpc.call('eth_blockNumber', []);
    } catch (e) {
      throw new LedgerError('cannot read latest block number', e);
    }
    const n = hexNum(raw);
    if (n === null) throw new LedgerError(`unexpected eth_blockNumber result: ${String(raw)}`);
    return n;
  }

  async blockByNumber(n: number): Promise<LedgerBlock | null> {
    const tag = await this.cacheTag();
    const params = ['0x' + n.toString(16), true];
    const raw = tag === null
      ? await this.rpc.call('eth_getBlockByNumber', params)
      : await this.rpc.call('eth_getBlockByNumber', params, `block:${tag}:${n}`, this.blockTtlSec);
    return parseBlock(raw);
  }

  async contractRead(contract: string, data: string): Promise<string | null> {
    const raw = await this.rpc.call('eth_call', [{ to: contract, data }, 'latest']);
    return str(raw);
  }
}
