import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigError } from '../errors.js';

export type SelectorDialect = { name: string; stake: string[]; unstake: string[] };

const SELECTOR_RE = /^0x[0-9a-f]{8}$/;

// src/config → repo root when run from sources, dist/src/config when built
const CANDIDATES = ['../../config/selectors.json', '../../../config/selectors.json'];

export function defaultSelectorsFile(): string {
  for (const rel of CANDIDATES) {
    const p = fileURLToPath(new URL(rel, import.meta.url));
    if (fs.existsSync(p)) return p;
  }
  return fileURLToPath(new URL(CANDIDATES[0], import.meta.url));
}

function readList(name: string, field: string, v: unknown, errs: string[]): string[] {
  if (!Array.isArray(v) || v.length === 0) {
    errs.push(`selectors.${name}.${field}.missing`);
    return [];
  }
  const out: string[] = [];
  for (let i = 0; i < v.length; i++) {
    const s = typeof v[i] === 'string' ? String(v[i]).toLowerCase() : '';
    if (!SELECTOR_RE.test(s)) errs.push(`selectors.${name}.${field}[${i}].format`);
    else out.push(s);
  }
  return out;
}

export function parseDialects(json: unknown): Map<string, SelectorDialect> {
  const errs: string[] = [];
  const out = new Map<string, SelectorDialect>();
  if (!json || typeof json !== 'object' || Array.isArray(json)) throw new ConfigError(['selectors.not_object']);
  for (const [name, body] of Object.entries(json)) {
    if (!body || typeof body !== 'object') { errs.push(`selectors.${name}.invalid`); continue; }
    const stake = readList(name, 'stake', Reflect.get(body, 'stake'), errs);
    const unstake = readList(name, 'unstake', Reflect.get(body, 'unstake'), errs);
    const overlap = stake.filter(s => unstake.includes(s));
    if (overlap.length) errs.push(`selectors.${name}.overlap(${overlap.join('|')})`);
    out.set(name, { name, stake, unstake });
  }
  if (errs.length) throw new ConfigError(errs);
  return out;
}

export function loadDialect(name: string, file = process.env.SELECTORS_FILE || defaultSelectorsFile()): SelectorDialect {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError([`selectors.unreadable(${file}): ${e instanceof Error ? e.message : String(e)}`]);
  }
  const dialects = parseDialects(json);
  const d = dialects.get(name);
  if (!d) throw new ConfigError([`selectors.unknown_dialect(${name}); known: ${[...dialects.keys()].join(', ')}`]);
  return d;
}
