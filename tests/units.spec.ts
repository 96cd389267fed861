import { describe, it, expect } from 'vitest';
import { toTokens, toRawUnits, hexToBigInt } from '../src/utils/units.js';
import { share, pctOf } from '../src/utils/pct.js';
import { mapLimit } from '../src/utils/limit.js';

describe('units', () => {
  it('converts between base units and tokens', () => {
    expect(toTokens(1_500_000_000_000_000_000n, 18)).toBe(1.5);
    expect(toTokens(42n, 0)).toBe(42);
    expect(toRawUnits(1.5, 18)).toBe(1_500_000_000_000_000_000n);
    expect(toRawUnits(458_000_000, 18).toString()).toBe('458000000' + '0'.repeat(18));
    expect(() => toRawUnits(-1, 18)).toThrow(RangeError);
    expect(() => toRawUnits(Number.NaN, 18)).toThrow(RangeError);
  });

  it('parses hex quantities', () => {
    expect(hexToBigInt('0x')).toBe(0n);
    expect(hexToBigInt('0xff')).toBe(255n);
    expect(hexToBigInt('zz')).toBeNull();
    expect(hexToBigInt(null)).toBeNull();
  });
});

describe('percentages', () => {
  it('share of an empty total is 0', () => {
    expect(share(0, 0)).toBe(0);
    expect(share(1, 4)).toBe(25);
  });

  it('pctOf rejects a non-positive base', () => {
    expect(pctOf(5, 200)).toBe(2.5);
    expect(() => pctOf(1, 0)).toThrow(RangeError);
    expect(() => pctOf(1, -5)).toThrow(RangeError);
  });
});

describe('mapLimit', () => {
  it('keeps input order and caps in-flight calls', async () => {
    let inFlight = 0, max = 0;
    const out = await mapLimit([5, 1, 4, 2, 3], 2, async (ms, i) => {
      inFlight++; max = Math.max(max, inFlight);
      await new Promise(r => setTimeout(r, ms));
      inFlight--;
      return i * 10;
    });
    expect(out).toEqual([0, 10, 20, 30, 40]);
    expect(max).toBe(2);
  });
});
