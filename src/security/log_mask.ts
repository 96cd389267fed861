export const mask = (s: string, keep = 6) => (s && s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : s);
export const maskAddr = (s: string) => mask(s.toLowerCase(), 6);

/** Endpoint label safe for logs and metrics: host only, no path or key. */
export function endpointLabel(url: string): string {
  try {
    return new URL(url).host || 'rpc';
  } catch {
    return 'rpc';
  }
}
