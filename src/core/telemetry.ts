import { performance } from 'perf_hooks';
import type { AuditSink } from './audit.js';
import { safeWrite } from './audit.js';
import { errorMessage } from './errors.js';

export type SpanStatus = 'ok' | 'error';

/** Identifies the session and task a span belongs to. */
export interface SpanContext {
  session_id: string;
  task_id?: string;
}

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

export interface Span {
  recordException(err: unknown): void;
  /** Only the first call counts. */
  end(status?: SpanStatus): void;
}

export interface Tracer {
  startSpan(name: string, context: SpanContext, attrs?: SpanAttributes): Span;
}

export type Labels = Record<string, string>;

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

export interface Metrics {
  incCounter(name: string, value?: number, labels?: Labels): void;
  observeHistogram(name: string, value: number, labels?: Labels): void;
  snapshot(): MetricsSnapshot;
}

export interface Telemetry {
  tracer: Tracer;
  metrics: Metrics;
}

const noopSpan: Span = {
  recordException() {},
  end() {}
};

export const noopTracer: Tracer = {
  startSpan: () => noopSpan
};

export const NoopTelemetry: Telemetry = {
  tracer: noopTracer,
  metrics: {
    incCounter() {},
    observeHistogram() {},
    snapshot: () => ({ counters: {}, histograms: {} })
  }
};

/** `name{a=1,b=2}` with labels sorted by key; the bare name without labels. */
export function metricKey(name: string, labels?: Labels): string {
  if (!labels || Object.keys(labels).length === 0) return name;
  const suffix = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(',');
  return `${name}{${suffix}}`;
}

/** Counters and histogram summaries held in process; served on /v1/metrics. */
export class InMemoryMetrics implements Metrics {
  private series = new Map<string, number>();
  private summaries = new Map<string, HistogramSummary>();

  incCounter(name: string, value = 1, labels?: Labels): void {
    const key = metricKey(name, labels);
    this.series.set(key, this.counter(name, labels) + value);
  }

  observeHistogram(name: string, value: number, labels?: Labels): void {
    const key = metricKey(name, labels);
    const prev = this.summaries.get(key);
    this.summaries.set(
      key,
      prev
        ? {
            count: prev.count + 1,
            sum: prev.sum + value,
            min: Math.min(prev.min, value),
            max: Math.max(prev.max, value)
          }
        : { count: 1, sum: value, min: value, max: value }
    );
  }

  counter(name: string, labels?: Labels): number {
    return this.series.get(metricKey(name, labels)) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: Object.fromEntries(this.series),
      histograms: Object.fromEntries(
        [...this.summaries].map(([key, summary]) => [key, { ...summary }])
      )
    };
  }
}

/**
 * Records each finished span as one `trace` audit event, so task and action
 * timings land next to the task's other log lines.
 */
export class AuditTracer implements Tracer {
  constructor(private sink: AuditSink) {}

  startSpan(name: string, context: SpanContext, attrs: SpanAttributes = {}): Span {
    const started = performance.now();
    let error: string | undefined;
    let ended = false;

    return {
      recordException: err => {
        error = errorMessage(err);
      },
      end: (status = 'ok') => {
        if (ended) return;
        ended = true;
        const duration_ms = Math.round(performance.now() - started);
        safeWrite(this.sink, {
          session_id: context.session_id,
          task_id: context.task_id,
          timestamp: new Date().toISOString(),
          level: status === 'error' ? 'warn' : 'info',
          stage: 'trace',
          message: `${name} ${status} in ${duration_ms}ms`,
          data: { span: name, status, duration_ms, ...attrs, ...(error ? { error } : {}) }
        });
      }
    };
  }
}

/** Spans go to the audit sink; metrics stay in memory. */
export class AuditTelemetry implements Telemetry {
  readonly tracer: AuditTracer;
  readonly metrics = new InMemoryMetrics();

  constructor(sink: AuditSink) {
    this.tracer = new AuditTracer(sink);
  }
}

/** Metrics in memory for inspection; spans dropped unless a tracer is given. */
export class InMemoryTelemetry implements Telemetry {
  readonly metrics = new InMemoryMetrics();

  constructor(readonly tracer: Tracer = noopTracer) {}
}
