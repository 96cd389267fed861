import { request } from 'undici';
import { setTimeout as sleep } from 'node:timers/promises';
import { Breaker } from './circuit.js';
import type { CacheLike } from './cache.js';
import { readBudgets, backoffMs, type Budgets } from './config/budgets.js';
import { recordEndpointFailure, recordEndpointSuccess } from './metrics.js';
import { endpointLabel } from './security/log_mask.js';
import { bus, type BreachEvent } from './observability/events.js';

export interface RpcEndpoint { url: string; label: string }

export class RpcError extends Error {
  constructor(message: string, readonly code?: number) { super(message); this.name = 'RpcError'; }
}

export type RpcClientOptions = {
  budgets?: Budgets;
  cache?: CacheLike;
  sleep?: (ms: number) => Promise<unknown>;
};

type JsonRpcReply = { result?: unknown; error?: { code?: unknown; message?: unknown } };

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function parseReply(j: unknown): JsonRpcReply {
  if (!isObject(j)) throw new RpcError('malformed rpc reply');
  const err = j.error;
  return { result: j.result, error: isObject(err) ? { code: err.code, message: err.message } : undefined };
}

export class RpcClient {
  private readonly endpoints: RpcEndpoint[];
  private readonly breakers = new Map<string, Breaker>();
  private readonly budgets: Budgets;
  private readonly cache?: CacheLike;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private idx = 0;
  private seq = 0;

  constructor(urls: string[], o: RpcClientOptions = {}) {
    this.endpoints = urls.filter(Boolean).map(url => ({ url, label: endpointLabel(url) }));
    if (!this.endpoints.length) throw new RpcError('no rpc endpoints configured');
    this.budgets = o.budgets ?? readBudgets();
    this.cache = o.cache;
    this.sleep = o.sleep ?? ((ms: number) => sleep(ms));
    for (const ep of this.endpoints) {
      this.breakers.set(ep.url, new Breaker({ threshold: this.budgets.BREAKER_THRESHOLD, cooldownMs: this.budgets.BREAKER_COOLDOWN_MS }));
    }
  }

  // endpoints in rotation order starting at the current one
  private rotation(): RpcEndpoint[] {
    const n = this.endpoints.length;
    const out = Array.from({ length: n }, (_, k) => this.endpoints[(this.idx + k) % n]);
    this.idx = (this.idx + 1) % n;
    return out;
  }

  // when every breaker is open, the endpoint nearest the end of its cooldown is tried anyway
  private candidates(): RpcEndpoint[] {
    const order = this.rotation();
    const admitted = order.filter(ep => this.breakers.get(ep.url)?.allow() ?? true);
    if (admitted.length) return admitted;
    const retryAt = (ep: RpcEndpoint) => this.breakers.get(ep.url)?.retryAt() ?? 0;
    return [order.reduce((best, ep) => (retryAt(ep) < retryAt(best) ? ep : best))];
  }

  private async cacheGet(key: string): Promise<unknown> {
    if (!this.cache) return null;
    try {
      const hit = await this.cache.get(key);
      return hit === null ? null : JSON.parse(hit);
    } catch (e) {
      console.warn(`[cache] get ${key} failed: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
  }

  private async cacheSet(key: string, result: unknown, ttlSec?: number): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(key, JSON.stringify(result), ttlSec);
    } catch (e) {
      console.warn(`[cache] set ${key} failed: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  private async post(ep: RpcEndpoint, method: string, params: unknown[]): Promise<unknown> {
    const body = JSON.stringify({ jsonrpc: '2.0', id: ++this.seq, method, params });
    const ctrl = new AbortController();
    const timer = setTimeout(() => ctrl.abort(), this.budgets.RPC_TIMEOUT_MS);
    const t0 = Date.now();
    try {
      const res = await request(ep.url, { method: 'POST', headers: { 'content-type': 'application/json' }, body, signal: ctrl.signal });
      if (res.statusCode >= 400) {
        await res.body.text().catch(() => '');
        throw new RpcError(`HTTP ${res.statusCode}`);
      }
      const reply = parseReply(await res.body.json());
      if (reply.error) {
        const code = typeof reply.error.code === 'number' ? reply.error.code : undefined;
        throw new RpcError(typeof reply.error.message === 'string' ? reply.error.message : 'rpc error', code);
      }
      recordEndpointSuccess(ep.label, Date.now() - t0);
      return reply.result ?? null;
    } catch (e) {
      recordEndpointFailure(ep.label, Date.now() - t0, e);
      throw e;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * One JSON-RPC call with endpoint failover. Each attempt walks every endpoint
   * whose breaker allows it; attempts are separated by jittered backoff.
   * Cache failures fall through to the network.
   */
  async call(method: string, params: unknown[], cacheKey?: string, ttlSec?: number): Promise<unknown> {
    if (cacheKey) {
      const hit = await this.cacheGet(cacheKey);
      if (hit !== null) return hit;
    }
    let lastErr: unknown;
    for (let attempt = 0; attempt <= this.budgets.RPC_RETRY; attempt++) {
      if (attempt > 0) await this.sleep(backoffMs(this.budgets, attempt - 1));
      for (const ep of this.candidates()) {
        const br = this.breakers.get(ep.url);
        try {
          const result = await this.post(ep, method, params);
          br?.success();
          if (cacheKey && result !== null) await this.cacheSet(cacheKey, result, ttlSec);
          return result;
        } catch (e) {
          lastErr = e;
          const wasOpen = br?.state() === 'open';
          br?.fail();
          if (br && !wasOpen && br.state() === 'open') {
            const ev: BreachEvent = { type: 'breaker', note: `${ep.label} opened after ${method} failures` };
            bus.emit('breach', ev);
          }
        }
      }
    }
    throw lastErr ?? new RpcError('RPC failover exhausted');
  }

  breakerStates(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const ep of this.endpoints) out[ep.label] = this.breakers.get(ep.url)?.state() ?? 'ok';
    return out;
  }
}

export const DEFAULT_RPC_URL = 'https://mainnet.base.org';

export function rpcUrls(env: NodeJS.ProcessEnv = process.env): string[] {
  const listed = (env.RPC_URLS || '').split(',').map(s => s.trim()).filter(Boolean);
  if (listed.length) return listed;
  if (env.ALCHEMY_API_KEY) return [`https://base-mainnet.g.alchemy.com/v2/${env.ALCHEMY_API_KEY}`, DEFAULT_RPC_URL];
  return [DEFAULT_RPC_URL];
}
