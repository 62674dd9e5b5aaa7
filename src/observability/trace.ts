import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  traceId: string;
  turnId?: string;
  sessionId?: string;
  channel?: string;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: Record<string, string | number | boolean>;
  status: 'ok' | 'error';
}

export function createTraceContext(overrides?: Partial<Omit<TraceContext, 'spans'>>): TraceContext {
  return {
    traceId: overrides?.traceId ?? uuidv4(),
    turnId: overrides?.turnId,
    sessionId: overrides?.sessionId,
    channel: overrides?.channel,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs?: Record<string, string | number | boolean>): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

/** Close a span and return its duration in milliseconds */
export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): number {
  span.endTime = Date.now();
  span.status = status;
  return span.endTime - span.startTime;
}

/** Compact per-span timing summary for the turn log line */
export function summarizeSpans(ctx: TraceContext): Record<string, number> {
  const summary: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.endTime !== undefined) {
      summary[span.name] = span.endTime - span.startTime;
    }
  }
  return summary;
}
