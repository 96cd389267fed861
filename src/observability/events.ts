import { EventEmitter } from 'node:events';

// Singleton event bus for run progress and transport alerts
export const bus = new EventEmitter();

export type BreachEvent = { type: 'breaker' | 'invariant'; note: string };
export type ScanProgressEvent = { phase: 'scan'; visited: number; total: number; events: number; pct: number };
export type PhaseEvent = { phase: string; ms: number };
