/**
 * Destination Metric Registry
 *
 * Prometheus-compatible metrics keyed by destination name (queue, routing
 * key, HTTP endpoint). Each metric family is registered once; a destination
 * gets one InstrumentSet of label-bound children, created on first use and
 * kept for the life of the registry.
 */

import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { MetricObjectWithValues, MetricValue } from 'prom-client';

/**
 * Monotonic counter bound to one destination
 */
export interface CounterHandle {
  inc(value?: number): void;
}

/**
 * Histogram bound to one destination
 */
export interface HistogramHandle {
  observe(value: number): void;
}

/**
 * Messaging instruments for one destination
 */
export interface InstrumentSet {
  readonly destination: string;
  readonly published: CounterHandle;
  readonly consumed: CounterHandle;
  /** Message body size in bytes */
  readonly messageSize: HistogramHandle;
  /** Consumer callback duration in milliseconds */
  readonly processingTime: HistogramHandle;
  /** Time between publish timestamp and delivery in milliseconds */
  readonly queueTime: HistogramHandle;
  readonly retries: CounterHandle;
}

/**
 * HTTP instruments for one (destination, method) pair
 */
export interface HttpInstrumentSet {
  readonly destination: string;
  readonly method: string;
  /** Request duration in milliseconds */
  readonly duration: HistogramHandle;
  recordError(errorKind: string): void;
}

export type MetricSnapshot = MetricObjectWithValues<MetricValue<string>>[];

export interface MetricRegistryOptions {
  /** Metric name prefix */
  prefix?: string;
  /** Registry to register into (a dedicated one by default) */
  registry?: Registry;
  /** Collect default Node.js process metrics */
  collectDefaultMetrics?: boolean;
  /** Labels applied to every series, e.g. { service: 'orders-api' } */
  defaultLabels?: Record<string, string>;
}

const SIZE_BUCKETS = [64, 256, 1024, 4096, 16384, 65536, 262144, 1048576];
const DURATION_BUCKETS_MS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

export class MetricRegistry {
  readonly registry: Registry;
  private readonly sets = new Map<string, InstrumentSet>();
  private readonly httpSets = new Map<string, HttpInstrumentSet>();

  private readonly publishedTotal: Counter<'destination'>;
  private readonly consumedTotal: Counter<'destination'>;
  private readonly messageSizeBytes: Histogram<'destination'>;
  private readonly processingDurationMs: Histogram<'destination'>;
  private readonly queueDurationMs: Histogram<'destination'>;
  private readonly retriesTotal: Counter<'destination'>;
  private readonly httpDurationMs: Histogram<'destination' | 'method'>;
  private readonly httpErrorsTotal: Counter<'destination' | 'method' | 'error_kind'>;
  private readonly spansDroppedTotal: Counter<'reason'>;
  private readonly spanExportFailuresTotal: Counter;

  constructor(options: MetricRegistryOptions = {}) {
    const prefix = options.prefix ?? 'hops_';
    this.registry = options.registry ?? new Registry();
    const registers = [this.registry];

    if (options.defaultLabels) {
      this.registry.setDefaultLabels(options.defaultLabels);
    }

    if (options.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix });
    }

    // ==========================================================================
    // Messaging
    // ==========================================================================

    this.publishedTotal = new Counter({
      name: `${prefix}messaging_published_total`,
      help: 'Messages published per destination',
      labelNames: ['destination'] as const,
      registers,
    });

    this.consumedTotal = new Counter({
      name: `${prefix}messaging_consumed_total`,
      help: 'Messages consumed per destination',
      labelNames: ['destination'] as const,
      registers,
    });

    this.messageSizeBytes = new Histogram({
      name: `${prefix}messaging_message_size_bytes`,
      help: 'Message body size in bytes',
      labelNames: ['destination'] as const,
      buckets: SIZE_BUCKETS,
      registers,
    });

    this.processingDurationMs = new Histogram({
      name: `${prefix}messaging_processing_duration_ms`,
      help: 'Time spent in the consumer callback in milliseconds',
      labelNames: ['destination'] as const,
      buckets: DURATION_BUCKETS_MS,
      registers,
    });

    this.queueDurationMs = new Histogram({
      name: `${prefix}messaging_queue_duration_ms`,
      help: 'Time between publish and delivery in milliseconds',
      labelNames: ['destination'] as const,
      buckets: DURATION_BUCKETS_MS,
      registers,
    });

    this.retriesTotal = new Counter({
      name: `${prefix}messaging_retries_total`,
      help: 'Deliveries that arrived back from the dead-letter path',
      labelNames: ['destination'] as const,
      registers,
    });

    // ==========================================================================
    // HTTP
    // ==========================================================================

    this.httpDurationMs = new Histogram({
      name: `${prefix}http_duration_ms`,
      help: 'HTTP request duration in milliseconds',
      labelNames: ['destination', 'method'] as const,
      buckets: DURATION_BUCKETS_MS,
      registers,
    });

    this.httpErrorsTotal = new Counter({
      name: `${prefix}http_errors_total`,
      help: 'HTTP requests that failed or returned a non-2xx status',
      labelNames: ['destination', 'method', 'error_kind'] as const,
      registers,
    });

    // ==========================================================================
    // Instrumentation health
    // ==========================================================================

    this.spansDroppedTotal = new Counter({
      name: `${prefix}spans_dropped_total`,
      help: 'Spans discarded before reaching the collector',
      labelNames: ['reason'] as const,
      registers,
    });

    this.spanExportFailuresTotal = new Counter({
      name: `${prefix}span_export_failures_total`,
      help: 'Failed span batch export attempts',
      registers,
    });
  }

  /**
   * Get the messaging instruments for a destination, creating them on first
   * use. The lookup and insert run without an await in between, so callers
   * racing on the same name always receive the same set.
   */
  getOrCreate(destination: string): InstrumentSet {
    const existing = this.sets.get(destination);
    if (existing) {
      return existing;
    }

    const labels = { destination };
    const set: InstrumentSet = Object.freeze({
      destination,
      published: this.publishedTotal.labels(labels),
      consumed: this.consumedTotal.labels(labels),
      messageSize: this.messageSizeBytes.labels(labels),
      processingTime: this.processingDurationMs.labels(labels),
      queueTime: this.queueDurationMs.labels(labels),
      retries: this.retriesTotal.labels(labels),
    });

    this.sets.set(destination, set);
    return set;
  }

  /**
   * Get the HTTP instruments for a destination and method
   */
  getOrCreateHttp(destination: string, method: string): HttpInstrumentSet {
    const normalizedMethod = method.toUpperCase();
    const key = `${normalizedMethod} ${destination}`;
    const existing = this.httpSets.get(key);
    if (existing) {
      return existing;
    }

    const errors = this.httpErrorsTotal;
    const set: HttpInstrumentSet = Object.freeze({
      destination,
      method: normalizedMethod,
      duration: this.httpDurationMs.labels({ destination, method: normalizedMethod }),
      recordError(errorKind: string): void {
        errors.labels({ destination, method: normalizedMethod, error_kind: errorKind }).inc();
      },
    });

    this.httpSets.set(key, set);
    return set;
  }

  /**
   * Destinations observed so far
   */
  destinations(): string[] {
    return Array.from(this.sets.keys());
  }

  recordDroppedSpans(count: number, reason: string): void {
    if (count > 0) {
      this.spansDroppedTotal.labels({ reason }).inc(count);
    }
  }

  recordExportFailure(): void {
    this.spanExportFailuresTotal.inc();
  }

  /**
   * JSON snapshot of every metric family
   */
  async snapshot(): Promise<MetricSnapshot> {
    return this.registry.getMetricsAsJSON();
  }

  /**
   * Prometheus text exposition
   */
  async metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  clear(): void {
    this.registry.resetMetrics();
  }
}
