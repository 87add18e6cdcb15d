/**
 * Distributed Tracing Types
 *
 * Type definitions for OpenTelemetry-compatible distributed tracing.
 * Follows W3C Trace Context and W3C Baggage.
 */

/**
 * Trace context following W3C Trace Context specification
 * @see https://www.w3.org/TR/trace-context/
 */
export interface TraceContext {
  /** 32-character hex trace ID */
  readonly traceId: string;
  /** 16-character hex span ID */
  readonly spanId: string;
  /** Parent span ID (if child span) */
  readonly parentSpanId?: string;
  /** Trace flags (sampled, etc.) */
  readonly traceFlags: number;
  /** Trace state for vendor-specific data */
  readonly traceState?: string;
}

/**
 * Baggage propagated alongside the trace context. Never mutated; additions
 * produce a new map.
 */
export type Baggage = ReadonlyMap<string, string>;

/**
 * Flat key/value transport for context: HTTP headers or AMQP message headers
 */
export type Carrier = Record<string, unknown>;

/**
 * Result of reading a carrier
 */
export interface ExtractedContext {
  context: TraceContext;
  baggage: Baggage;
}

/**
 * Span kind per OpenTelemetry specification
 */
export enum SpanKind {
  INTERNAL = 0,
  SERVER = 1,
  CLIENT = 2,
  PRODUCER = 3,
  CONSUMER = 4,
}

/**
 * Span status code
 */
export enum SpanStatus {
  UNSET = 0,
  OK = 1,
  ERROR = 2,
}

export type AttributeValue = string | number | boolean | string[] | number[] | boolean[];

/**
 * Span attributes following OpenTelemetry semantic conventions
 */
export interface SpanAttributes {
  [key: string]: AttributeValue | undefined;
}

/**
 * Span event for recording point-in-time events
 */
export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: SpanAttributes;
}

/**
 * Span data structure
 */
export interface SpanData {
  name: string;
  kind: SpanKind;
  context: TraceContext;
  /** Start time in milliseconds */
  startTime: number;
  /** End time in milliseconds (set when span ends) */
  endTime?: number;
  status: SpanStatus;
  /** Status message (for errors) */
  statusMessage?: string;
  attributes: SpanAttributes;
  events: SpanEvent[];
}

/**
 * Tracing configuration
 */
export interface TracingConfig {
  serviceName: string;
  serviceVersion?: string;
  /** Environment (production, staging, development) */
  environment?: string;
  /** Enable tracing (can be disabled for performance) */
  enabled: boolean;
  /** Sampling rate for new traces (0.0 to 1.0) */
  samplingRate: number;
  /** OTLP endpoint URL (if exporting) */
  otlpEndpoint?: string;
  /** Collector health endpoint probed by the exporter */
  collectorHealthUrl?: string;
  /** Maximum spans per exported batch */
  maxExportBatchSize: number;
  /** Maximum spans held in the export buffer */
  maxQueueSize: number;
  /** Export interval in milliseconds */
  exportIntervalMs: number;
  /** Per-request export timeout in milliseconds */
  exportTimeoutMs: number;
  /** Attempts per batch before it is dropped */
  maxExportAttempts: number;
  /** Log spans through pino (for development) */
  logSpans: boolean;
}

/**
 * Default tracing configuration
 */
export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  serviceName: 'unnamed-service',
  serviceVersion: '1.0.0',
  environment: 'development',
  enabled: true,
  samplingRate: 1.0,
  maxExportBatchSize: 512,
  maxQueueSize: 2048,
  exportIntervalMs: 5000,
  exportTimeoutMs: 10000,
  maxExportAttempts: 3,
  logSpans: false,
};

/**
 * Semantic attribute keys following OpenTelemetry conventions
 */
export const AttributeKeys = {
  // Service
  SERVICE_NAME: 'service.name',
  SERVICE_VERSION: 'service.version',
  DEPLOYMENT_ENVIRONMENT: 'deployment.environment',
  // Messaging
  MESSAGING_SYSTEM: 'messaging.system',
  MESSAGING_DESTINATION: 'messaging.destination',
  MESSAGING_DESTINATION_KIND: 'messaging.destination_kind',
  MESSAGING_PROTOCOL: 'messaging.protocol',
  MESSAGING_OPERATION: 'messaging.operation',
  MESSAGING_MESSAGE_ID: 'messaging.message_id',
  MESSAGING_CORRELATION_ID: 'messaging.correlation_id',
  MESSAGING_PAYLOAD_SIZE: 'messaging.message_payload_size_bytes',
  MESSAGING_RABBITMQ_EXCHANGE: 'messaging.rabbitmq.exchange',
  MESSAGING_RABBITMQ_ROUTING_KEY: 'messaging.rabbitmq.routing_key',
  MESSAGING_RABBITMQ_REDELIVERED: 'messaging.rabbitmq.redelivered',
  MESSAGING_RABBITMQ_BUFFER_FULL: 'messaging.rabbitmq.buffer_full',
  // HTTP
  HTTP_METHOD: 'http.method',
  HTTP_URL: 'http.url',
  HTTP_ROUTE: 'http.route',
  HTTP_STATUS_CODE: 'http.status_code',
  // Error
  EXCEPTION_TYPE: 'exception.type',
  EXCEPTION_MESSAGE: 'exception.message',
  EXCEPTION_STACKTRACE: 'exception.stacktrace',
} as const;

/**
 * Trace flags
 */
export const TraceFlags = {
  NONE: 0x00,
  SAMPLED: 0x01,
} as const;
