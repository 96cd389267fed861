import { Redis } from 'ioredis';

export interface CacheLike {
  get(key: string): Promise<string | null>;
  set(key: string, val: string, ttlSec?: number): Promise<void>;
}

// size is counted in string length; RPC JSON is ASCII so that is bytes
export class MemoryCache implements CacheLike {
  private m = new Map<string, { ts: number; val: string; ttl: number }>();
  private used = 0;
  constructor(
    private ttlSec: number,
    private clock: () => number = Date.now,
    private maxEntries = 50_000,
    private maxBytes = 64 * 1024 * 1024,
  ) {}
  private drop(key: string) {
    const e = this.m.get(key);
    if (!e) return;
    this.used -= e.val.length;
    this.m.delete(key);
  }
  async get(key: string) {
    const e = this.m.get(key);
    if (!e) return null;
    if ((this.clock() - e.ts) / 1000 > e.ttl) { this.drop(key); return null; }
    return e.val;
  }
  async set(key: string, val: string, ttlSec?: number) {
    this.drop(key);
    if (val.length > this.maxBytes) return;
    for (const oldest of this.m.keys()) {
      if (this.m.size < this.maxEntries && this.used + val.length <= this.maxBytes) break;
      this.drop(oldest);
    }
    this.m.set(key, { ts: this.clock(), val, ttl: ttlSec ?? this.ttlSec });
    this.used += val.length;
  }
  size() { return this.m.size; }
  bytes() { return this.used; }
}

export class RedisCache implements CacheLike {
  constructor(private client: Redis, private defaultTtl: number, private prefix = 'stakewatch:') {}
  async get(key: string) {
    return this.client.get(this.prefix + key);
  }
  async set(key: string, val: string, ttl?: number) {
    await this.client.set(this.prefix + key, val, 'EX', ttl ?? this.defaultTtl);
  }
}

export function createCache(env: NodeJS.ProcessEnv = process.env): { cache: CacheLike; close: () => Promise<void> } {
  const ttl = Math.max(1, Number(env.BLOCK_CACHE_TTL_SECONDS ?? 3600) || 3600);
  const url = env.REDIS_URL || '';
  if (!url) {
    const maxMb = Math.max(1, Number(env.BLOCK_CACHE_MAX_MB ?? 64) || 64);
    return { cache: new MemoryCache(ttl, Date.now, 50_000, maxMb * 1024 * 1024), close: async () => {} };
  }
  const client = new Redis(url, { maxRetriesPerRequest: 1, lazyConnect: false });
  client.on('error', (e: Error) => console.warn(`[cache] redis error: ${e.message}`));
  return { cache: new RedisCache(client, ttl), close: async () => { await client.quit(); } };
}
