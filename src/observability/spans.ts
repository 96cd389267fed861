import { trace, SpanStatusCode, type Attributes } from '@opentelemetry/api';
import { bus, type PhaseEvent } from './events.js';

const tracer = trace.getTracer('stakewatch');

/** Runs fn inside an active span; a no-op tracer applies when no SDK is started. */
export async function withSpan<T>(name: string, attrs: Attributes, fn: () => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, { attributes: attrs }, async (span) => {
    const t0 = Date.now();
    try {
      return await fn();
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setStatus({ code: SpanStatusCode.ERROR, message: e instanceof Error ? e.message : String(e) });
      throw e;
    } finally {
      const ev: PhaseEvent = { phase: name, ms: Date.now() - t0 };
      bus.emit('phase', ev);
      span.end();
    }
  });
}
