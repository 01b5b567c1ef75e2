import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  userId?: string;
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
    requestId: overrides?.requestId ?? uuidv4(),
    userId: overrides?.userId,
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

export function endSpan(
  span: SpanRecord,
  status: 'ok' | 'error' = 'ok',
  attrs?: Record<string, string | number | boolean>,
): void {
  span.endTime = Date.now();
  span.status = status;
  if (attrs) Object.assign(span.attributes, attrs);
}

/** span name → duration in ms, for the request's completion log line */
export function spanDurations(ctx: TraceContext): Record<string, number> {
  const durations: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.endTime !== undefined) durations[span.name] = span.endTime - span.startTime;
  }
  return durations;
}
