type EndpointStat = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  totalLatencyMs: number;
  count: number;
  lastError?: string;
  ring?: { lat: Float64Array; i: number; n: number };
};

export type EndpointMetrics = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  avgLatencyMs: number;
  lastError?: string;
  p50: number | null;
  p90: number | null;
  errorPct: number;
};

const stats = new Map<string, EndpointStat>();

function ensure(endpoint: string): EndpointStat {
  let s = stats.get(endpoint);
  if (!s) {
    s = { success: 0, fail: 0, lastLatencyMs: 0, totalLatencyMs: 0, count: 0 };
    stats.set(endpoint, s);
  }
  return s;
}

function push(s: EndpointStat, latencyMs: number) {
  s.count += 1;
  s.lastLatencyMs = Math.max(0, Math.round(latencyMs));
  s.totalLatencyMs += latencyMs;
  if (!s.ring) s.ring = { lat: new Float64Array(64), i: 0, n: 0 };
  s.ring.lat[s.ring.i] = latencyMs;
  s.ring.i = (s.ring.i + 1) & 63;
  s.ring.n = Math.min(s.ring.n + 1, 64);
}

export function recordEndpointSuccess(endpoint: string, latencyMs: number) {
  const s = ensure(endpoint);
  s.success += 1;
  push(s, latencyMs);
}

export function recordEndpointFailure(endpoint: string, latencyMs: number, error?: unknown) {
  const s = ensure(endpoint);
  s.fail += 1;
  push(s, latencyMs);
  s.lastError = error instanceof Error ? error.message : String(error ?? 'error');
}

export function getEndpointMetrics(): Record<string, EndpointMetrics> {
  const out: Record<string, EndpointMetrics> = {};
  for (const [k, v] of stats) {
    const avg = v.count > 0 ? Math.round(v.totalLatencyMs / v.count) : 0;
    let p50: number | null = null, p90: number | null = null;
    if (v.ring && v.ring.n > 0) {
      const ring = v.ring;
      const arr = Array.from({ length: ring.n }, (_, k2) => ring.lat[(ring.i - ring.n + k2 + 64) & 63]);
      arr.sort((a, b) => a - b);
      const q = (p: number) => arr[Math.floor((p / 100) * (arr.length - 1))];
      p50 = q(50); p90 = q(90);
    }
    const total = v.success + v.fail;
    const errorPct = total ? +(100 * v.fail / total).toFixed(2) : 0;
    out[k] = { success: v.success, fail: v.fail, lastLatencyMs: v.lastLatencyMs, avgLatencyMs: avg, lastError: v.lastError, p50, p90, errorPct };
  }
  return out;
}

export function resetEndpointMetrics() {
  stats.clear();
}
