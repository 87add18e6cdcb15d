/**
 * Distributed Tracing Module
 *
 * OpenTelemetry-compatible span recording with W3C context propagation and
 * batched OTLP export.
 *
 * @example
 * ```typescript
 * const tracer = new Tracer({ serviceName: 'orders-api' });
 * tracer.addProcessor(new BatchSpanProcessor(new OTLPHttpSpanExporter(
 *   { endpoint: 'http://otel-collector:4318' },
 *   tracer.getConfig()
 * )));
 *
 * await tracer.startActiveSpanAsync('reserve-stock', async (span) => {
 *   span.setAttribute('order.id', orderId);
 *   await reserve(orderId);
 * });
 * ```
 */

// Types
export type {
  TraceContext,
  Baggage,
  Carrier,
  ExtractedContext,
  SpanData,
  SpanAttributes,
  AttributeValue,
  SpanEvent,
  TracingConfig,
} from './types.js';

export { SpanKind, SpanStatus, AttributeKeys, TraceFlags, DEFAULT_TRACING_CONFIG } from './types.js';

// Context management
export {
  INVALID_TRACE_CONTEXT,
  EMPTY_BAGGAGE,
  generateTraceId,
  generateSpanId,
  createTraceContext,
  isValidTraceContext,
  isSampled,
  getCurrentTraceContext,
  getCurrentBaggage,
  runWithTraceContext,
  setBaggageEntry,
  withBaggageEntry,
  getBaggage,
  getCorrelationId,
} from './TraceContext.js';

// Context codec
export {
  TRACEPARENT_HEADER,
  TRACESTATE_HEADER,
  BAGGAGE_HEADER,
  parseTraceparent,
  formatTraceparent,
  parseBaggage,
  formatBaggage,
  inject,
  extract,
} from './Propagation.js';

// Span
export { Span, withSpan, withSpanAsync } from './Span.js';
export type { SpanOptions, SpanEndListener } from './Span.js';

// Tracer
export { Tracer, TraceIdRatioSampler, ConsoleSpanProcessor } from './Tracer.js';
export type { SpanProcessor, Sampler } from './Tracer.js';

// Export
export { BatchSpanProcessor } from './BatchSpanProcessor.js';
export type { SpanExporter, BatchSpanProcessorOptions, DropReason } from './BatchSpanProcessor.js';
export { OTLPHttpSpanExporter, createOTLPExporter, toOTLPSpan, toOTLPSpanKind } from './OTLPExporter.js';
export type { OTLPExporterConfig, OTLPExportRequest, OTLPSpan } from './OTLPExporter.js';

// Correlation Logging
export { withTraceContext, traceContextMixin, createCorrelationLogger } from './CorrelationLogger.js';
