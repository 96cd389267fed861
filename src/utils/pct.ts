/** part / total as a percentage, with an empty total defined as 0. */
export function share(part: number, total: number): number {
  return total === 0 ? 0 : (part * 100) / total;
}

/** value / base as a percentage; a non-positive base is a caller error. */
export function pctOf(value: number, base: number): number {
  if (!(base > 0)) throw new RangeError(`percentage base must be positive, got ${base}`);
  return (value * 100) / base;
}
