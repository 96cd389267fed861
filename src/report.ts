import fs from 'node:fs/promises';
import type { HealthReport } from './staking/schemas.js';

export function defaultOutputName(d: Date): string {
  const p = (n: number) => String(n).padStart(2, '0');
  const stamp = `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
  return `staking_health_check_${stamp}.json`;
}

export async function writeReport(r: HealthReport, file: string): Promise<void> {
  await fs.writeFile(file, JSON.stringify(r, null, 2) + '\n', 'utf8');
}
