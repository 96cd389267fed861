export function toTokens(raw: bigint, decimals: number): number {
  const base = 10n ** BigInt(decimals);
  return Number(raw / base) + Number(raw % base) / Number(base);
}

export function toRawUnits(tokens: number, decimals: number): bigint {
  if (!Number.isFinite(tokens) || tokens < 0) throw new RangeError(`token amount out of range: ${tokens}`);
  if (tokens >= 1e21) return BigInt(Math.round(tokens)) * 10n ** BigInt(decimals);
  const [whole, frac = ''] = tokens.toFixed(Math.min(decimals, 6)).split('.');
  return BigInt(whole + frac.padEnd(decimals, '0').slice(0, decimals));
}

export function hexToBigInt(hex: string | null | undefined): bigint | null {
  if (!hex || !/^0x[0-9a-f]*$/i.test(hex)) return null;
  return hex.length > 2 ? BigInt(hex) : 0n;
}
