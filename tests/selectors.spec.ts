import { describe, it, expect } from 'vitest';
import { parseDialects, loadDialect } from '../src/config/selectors.js';
import { ConfigError } from '../src/errors.js';

function configErrs(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e.errs;
    throw e;
  }
  return [];
}

describe('selector dialects', () => {
  it('loads the bundled default dialect', () => {
    const d = loadDialect('default');
    expect(d.stake).toContain('0xa694fc3a');
    expect(d.unstake).toContain('0x2e1a7d4d');
  });

  it('lists known dialects on an unknown name', () => {
    expect(() => loadDialect('nope')).toThrow(/unknown_dialect\(nope\); known: default, erc4626, masterchef/);
  });

  it('lowercases selectors', () => {
    const d = parseDialects({ x: { stake: ['0xA694FC3A'], unstake: ['0x2e1a7d4d'] } }).get('x');
    expect(d).toEqual({ name: 'x', stake: ['0xa694fc3a'], unstake: ['0x2e1a7d4d'] });
  });

  it('rejects malformed and overlapping selector sets', () => {
    expect(configErrs(() => parseDialects({ x: { stake: ['0xa694fc3a', 'abc'], unstake: ['0xa694fc3a'] } }))).toEqual([
      'selectors.x.stake[1].format',
      'selectors.x.overlap(0xa694fc3a)',
    ]);
    expect(configErrs(() => parseDialects({ y: { stake: [], unstake: ['0x2e1a7d4d'] } }))).toEqual(['selectors.y.stake.missing']);
    expect(configErrs(() => parseDialects([]))).toEqual(['selectors.not_object']);
  });

  it('reports an unreadable file as a configuration error', () => {
    expect(() => loadDialect('default', '/nonexistent/selectors.json')).toThrow(ConfigError);
  });
});
