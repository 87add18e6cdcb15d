/**
 * Span Implementation
 *
 * OpenTelemetry-compatible span for tracking operations.
 * Supports attributes, events, status, and child spans. Ending is terminal:
 * afterwards every setter is ignored and the data is handed off exactly once.
 */

import type { TraceContext, SpanData, SpanAttributes, SpanEvent, AttributeValue } from './types.js';
import { SpanKind, SpanStatus, AttributeKeys } from './types.js';
import {
  createTraceContext,
  runWithTraceContext,
  getCurrentTraceContext,
  isSampled,
  isValidTraceContext,
} from './TraceContext.js';
import { toError } from '../errors.js';

/**
 * Span options for creation
 */
export interface SpanOptions {
  kind?: SpanKind;
  attributes?: SpanAttributes;
  /** Parent context (auto-detected if not provided) */
  parentContext?: TraceContext;
  /** Start time override (defaults to now) */
  startTime?: number;
}

export type SpanEndListener = (span: Readonly<SpanData>) => void;

/**
 * Span class representing a single traced operation
 */
export class Span {
  private readonly data: SpanData;
  private ended: boolean = false;
  private readonly onEnd?: SpanEndListener;

  /**
   * @param context - Pre-allocated context; derived from the parent when omitted
   */
  constructor(name: string, options: SpanOptions = {}, onEnd?: SpanEndListener, context?: TraceContext) {
    const parentContext = options.parentContext ?? getCurrentTraceContext();

    this.data = {
      name,
      kind: options.kind ?? SpanKind.INTERNAL,
      context:
        context ?? createTraceContext(isValidTraceContext(parentContext) ? parentContext : undefined),
      startTime: options.startTime ?? Date.now(),
      status: SpanStatus.UNSET,
      attributes: { ...options.attributes },
      events: [],
    };

    this.onEnd = onEnd;
  }

  get context(): TraceContext {
    return this.data.context;
  }

  get name(): string {
    return this.data.name;
  }

  get status(): SpanStatus {
    return this.data.status;
  }

  /**
   * Whether the span belongs to a sampled trace and will be exported
   */
  get isRecording(): boolean {
    return isSampled(this.data.context);
  }

  /**
   * Get span duration in milliseconds (0 if not ended)
   */
  get duration(): number {
    if (this.data.endTime === undefined) {
      return 0;
    }
    return this.data.endTime - this.data.startTime;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  setAttribute(key: string, value: AttributeValue | undefined): this {
    if (this.ended) {
      return this;
    }
    this.data.attributes[key] = value;
    return this;
  }

  setAttributes(attributes: SpanAttributes): this {
    if (this.ended) {
      return this;
    }
    Object.assign(this.data.attributes, attributes);
    return this;
  }

  addEvent(name: string, attributes?: SpanAttributes): this {
    if (this.ended) {
      return this;
    }
    const event: SpanEvent = {
      name,
      timestamp: Date.now(),
      attributes,
    };
    this.data.events.push(event);
    return this;
  }

  setOk(): this {
    if (this.ended) {
      return this;
    }
    this.data.status = SpanStatus.OK;
    return this;
  }

  setError(message?: string): this {
    if (this.ended) {
      return this;
    }
    this.data.status = SpanStatus.ERROR;
    if (message) {
      this.data.statusMessage = message;
    }
    return this;
  }

  /**
   * Record an exception and mark the span as failed
   */
  recordException(error: unknown): this {
    if (this.ended) {
      return this;
    }

    const err = toError(error);
    this.setError(err.message);
    this.addEvent('exception', {
      [AttributeKeys.EXCEPTION_TYPE]: err.name,
      [AttributeKeys.EXCEPTION_MESSAGE]: err.message,
      // Only a thrown Error carries the stack of its throw site
      [AttributeKeys.EXCEPTION_STACKTRACE]: err === error ? err.stack : undefined,
    });

    return this;
  }

  /**
   * End the span. Only the first call has any effect.
   */
  end(endTime?: number): void {
    if (this.ended) {
      return;
    }

    this.data.endTime = endTime ?? Date.now();
    this.ended = true;
    Object.freeze(this.data.attributes);
    Object.freeze(this.data.events);
    Object.freeze(this.data);

    if (this.onEnd && this.isRecording) {
      this.onEnd(this.data);
    }
  }

  /**
   * Get span data (for export/logging)
   */
  getData(): Readonly<SpanData> {
    return this.data;
  }

  /**
   * Run a function within this span's context
   */
  run<T>(fn: () => T): T {
    return runWithTraceContext(this.context, fn);
  }

  /**
   * Create a child span
   */
  createChild(name: string, options: Omit<SpanOptions, 'parentContext'> = {}): Span {
    return new Span(
      name,
      { ...options, parentContext: this.context },
      this.onEnd,
      createTraceContext(this.context, this.isRecording)
    );
  }
}

/**
 * Utility to wrap a function with span tracking
 */
export function withSpan<T>(span: Span, fn: () => T): T {
  try {
    const result = span.run(fn);
    if (span.status === SpanStatus.UNSET) {
      span.setOk();
    }
    return result;
  } catch (error) {
    span.recordException(error);
    throw error;
  } finally {
    span.end();
  }
}

/**
 * Utility to wrap an async function with span tracking
 */
export async function withSpanAsync<T>(span: Span, fn: () => Promise<T>): Promise<T> {
  try {
    const result = await span.run(fn);
    if (span.status === SpanStatus.UNSET) {
      span.setOk();
    }
    return result;
  } catch (error) {
    span.recordException(error);
    throw error;
  } finally {
    span.end();
  }
}
