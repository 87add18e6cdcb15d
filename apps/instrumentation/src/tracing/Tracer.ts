/**
 * Tracer Implementation
 *
 * Main tracer class for creating and managing spans.
 * Provides sampling, processor fan-out, and scoped span helpers.
 */

import pino from 'pino';
import type { TracingConfig, SpanData, SpanAttributes, TraceContext } from './types.js';
import { DEFAULT_TRACING_CONFIG, SpanStatus, AttributeKeys, TraceFlags } from './types.js';
import { Span, withSpan, withSpanAsync, type SpanOptions } from './Span.js';
import {
  getCurrentTraceContext,
  createTraceContext,
  generateSpanId,
  generateTraceId,
  getCorrelationId,
  isSampled,
  isValidTraceContext,
} from './TraceContext.js';

const logger = pino({ name: 'hops:tracer' });

/**
 * Span processor interface for custom processing
 */
export interface SpanProcessor {
  onStart(span: Readonly<SpanData>): void;
  onEnd(span: Readonly<SpanData>): void;
  forceFlush(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Decides whether a new trace is recorded
 */
export interface Sampler {
  shouldSample(traceId: string): boolean;
}

/**
 * Ratio sampler keyed on the trace id, so every process that sees the same
 * root trace id reaches the same decision.
 */
export class TraceIdRatioSampler implements Sampler {
  private readonly ratio: number;
  private readonly upperBound: number;

  constructor(ratio: number) {
    this.ratio = Number.isFinite(ratio) ? Math.min(Math.max(ratio, 0), 1) : 0;
    this.upperBound = Math.floor(this.ratio * 2 ** 32);
  }

  shouldSample(traceId: string): boolean {
    if (this.ratio >= 1) {
      return true;
    }
    if (this.ratio <= 0) {
      return false;
    }
    const value = parseInt(traceId.slice(-8), 16);
    return Number.isFinite(value) && value < this.upperBound;
  }
}

/**
 * Logs ended spans for development
 */
export class ConsoleSpanProcessor implements SpanProcessor {
  onStart(span: Readonly<SpanData>): void {
    logger.debug({ spanName: span.name, traceId: span.context.traceId }, 'Span started');
  }

  onEnd(span: Readonly<SpanData>): void {
    const duration = span.endTime !== undefined ? span.endTime - span.startTime : 0;
    logger.info(
      {
        spanName: span.name,
        traceId: span.context.traceId,
        spanId: span.context.spanId,
        parentSpanId: span.context.parentSpanId,
        duration,
        status: SpanStatus[span.status],
      },
      'Span ended'
    );
  }

  async forceFlush(): Promise<void> {}

  async shutdown(): Promise<void> {}
}

/**
 * Tracer class for creating and managing spans
 */
export class Tracer {
  private readonly config: TracingConfig;
  private readonly processors: SpanProcessor[] = [];
  private readonly sampler: Sampler;
  private readonly resourceAttributes: SpanAttributes;

  constructor(config: Partial<TracingConfig> = {}, sampler?: Sampler) {
    this.config = { ...DEFAULT_TRACING_CONFIG, ...config };
    this.sampler = sampler ?? new TraceIdRatioSampler(this.config.samplingRate);

    this.resourceAttributes = {
      [AttributeKeys.SERVICE_NAME]: this.config.serviceName,
      [AttributeKeys.SERVICE_VERSION]: this.config.serviceVersion,
      [AttributeKeys.DEPLOYMENT_ENVIRONMENT]: this.config.environment,
    };

    if (this.config.logSpans) {
      this.addProcessor(new ConsoleSpanProcessor());
    }

    logger.debug(
      {
        serviceName: this.config.serviceName,
        enabled: this.config.enabled,
        samplingRate: this.config.samplingRate,
      },
      'Tracer initialized'
    );
  }

  addProcessor(processor: SpanProcessor): void {
    this.processors.push(processor);
  }

  /**
   * Allocate the context for a new span. A sampled parent passes its trace
   * on; anything else starts a new trace with its own sampling decision.
   */
  private allocateContext(parentContext: TraceContext | undefined): TraceContext {
    if (this.config.enabled && isValidTraceContext(parentContext) && isSampled(parentContext)) {
      return createTraceContext(parentContext, true);
    }

    const traceId = generateTraceId();
    const sampled = this.config.enabled && this.shouldSample(traceId);

    return Object.freeze({
      traceId,
      spanId: generateSpanId(),
      traceFlags: sampled ? TraceFlags.SAMPLED : TraceFlags.NONE,
    });
  }

  /**
   * A failing sampler leaves the trace unsampled
   */
  private shouldSample(traceId: string): boolean {
    try {
      return this.sampler.shouldSample(traceId);
    } catch (err) {
      logger.warn({ err, samplerType: this.sampler.constructor.name }, 'Sampler failed');
      return false;
    }
  }

  /**
   * Create a new span
   */
  startSpan(name: string, options: SpanOptions = {}): Span {
    const parentContext = options.parentContext ?? getCurrentTraceContext();
    const context = this.allocateContext(parentContext);

    const span = new Span(
      name,
      {
        ...options,
        attributes: {
          ...this.resourceAttributes,
          ...options.attributes,
        },
      },
      (spanData) => this.onSpanEnd(spanData),
      context
    );

    if (span.isRecording) {
      for (const processor of this.processors) {
        try {
          processor.onStart(span.getData());
        } catch (err) {
          logger.warn({ err, processorType: processor.constructor.name }, 'Processor onStart failed');
        }
      }
    }

    return span;
  }

  /**
   * Close a span with a final status. Never throws.
   */
  endSpan(span: Span, status: SpanStatus = SpanStatus.UNSET, error?: unknown): void {
    try {
      if (error !== undefined) {
        span.recordException(error);
      } else if (status === SpanStatus.OK) {
        span.setOk();
      } else if (status === SpanStatus.ERROR) {
        span.setError();
      }
      span.end();
    } catch (err) {
      logger.warn({ err, spanName: span.name }, 'Failed to end span');
    }
  }

  private onSpanEnd(spanData: Readonly<SpanData>): void {
    for (const processor of this.processors) {
      try {
        processor.onEnd(spanData);
      } catch (err) {
        logger.warn({ err, processorType: processor.constructor.name }, 'Processor onEnd failed');
      }
    }
  }

  /**
   * Run `fn` inside a new span that is ended on every exit path
   */
  startActiveSpan<T>(name: string, fn: (span: Span) => T, options: SpanOptions = {}): T {
    const span = this.startSpan(name, options);
    return withSpan(span, () => fn(span));
  }

  /**
   * Async variant of startActiveSpan
   */
  async startActiveSpanAsync<T>(
    name: string,
    fn: (span: Span) => Promise<T>,
    options: SpanOptions = {}
  ): Promise<T> {
    const span = this.startSpan(name, options);
    return withSpanAsync(span, () => fn(span));
  }

  getCorrelationId(): string {
    return getCorrelationId();
  }

  getCurrentContext(): TraceContext | undefined {
    return getCurrentTraceContext();
  }

  /**
   * Create a new root trace context
   */
  createRootContext(): TraceContext {
    return this.allocateContext(undefined);
  }

  getConfig(): Readonly<TracingConfig> {
    return this.config;
  }

  /**
   * Export everything buffered so far
   */
  async forceFlush(): Promise<void> {
    await Promise.all(
      this.processors.map((processor) =>
        processor.forceFlush().catch((err: unknown) => {
          logger.warn({ err, processorType: processor.constructor.name }, 'Processor flush failed');
        })
      )
    );
  }

  /**
   * Shutdown the tracer and all processors
   */
  async shutdown(): Promise<void> {
    logger.debug('Shutting down tracer');

    const shutdownPromises = this.processors.map((processor) =>
      processor.shutdown().catch((err: unknown) => {
        logger.warn({ err, processorType: processor.constructor.name }, 'Processor shutdown failed');
      })
    );

    await Promise.all(shutdownPromises);
    logger.debug('Tracer shutdown complete');
  }
}
