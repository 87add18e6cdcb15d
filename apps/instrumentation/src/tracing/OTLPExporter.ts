/**
 * OTLP Trace Exporter
 *
 * Exports spans to OTLP-compatible backends (OpenTelemetry Collector, Tempo,
 * Jaeger). Uses OTLP/HTTP JSON format for compatibility. Retrying is left to
 * the BatchSpanProcessor, which requeues failed batches.
 */

import pino from 'pino';
import type { SpanData, SpanAttributes, AttributeValue, SpanEvent, TracingConfig } from './types.js';
import { SpanKind, SpanStatus, AttributeKeys } from './types.js';
import type { SpanExporter } from './BatchSpanProcessor.js';
import { ErrorCodes, ExportError } from '../errors.js';

const logger = pino({ name: 'hops:otlp' });

interface OTLPAttribute {
  key: string;
  value: OTLPAttributeValue;
}

interface OTLPAttributeValue {
  stringValue?: string;
  intValue?: string;
  doubleValue?: number;
  boolValue?: boolean;
  arrayValue?: { values: OTLPAttributeValue[] };
}

interface OTLPSpanEvent {
  timeUnixNano: string;
  name: string;
  attributes: OTLPAttribute[];
}

interface OTLPStatus {
  code: number;
  message?: string;
}

export interface OTLPSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  attributes: OTLPAttribute[];
  events: OTLPSpanEvent[];
  status: OTLPStatus;
}

interface OTLPInstrumentationScope {
  name: string;
  version: string;
}

export interface OTLPExportRequest {
  resourceSpans: Array<{
    resource: { attributes: OTLPAttribute[] };
    scopeSpans: Array<{
      scope: OTLPInstrumentationScope;
      spans: OTLPSpan[];
    }>;
  }>;
}

/**
 * Convert milliseconds to nanoseconds string
 */
function msToNanos(ms: number): string {
  return (BigInt(Math.round(ms)) * BigInt(1_000_000)).toString();
}

/**
 * Convert SpanKind to OTLP kind
 * OTLP: 0 = UNSPECIFIED, 1 = INTERNAL, 2 = SERVER, 3 = CLIENT, 4 = PRODUCER, 5 = CONSUMER
 */
export function toOTLPSpanKind(kind: SpanKind): number {
  switch (kind) {
    case SpanKind.INTERNAL:
      return 1;
    case SpanKind.SERVER:
      return 2;
    case SpanKind.CLIENT:
      return 3;
    case SpanKind.PRODUCER:
      return 4;
    case SpanKind.CONSUMER:
      return 5;
    default:
      return 0;
  }
}

function toOTLPAttributeValue(value: AttributeValue | string | number | boolean): OTLPAttributeValue {
  if (typeof value === 'string') {
    return { stringValue: value };
  }

  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return { intValue: value.toString() };
    }
    return { doubleValue: value };
  }

  if (typeof value === 'boolean') {
    return { boolValue: value };
  }

  const values: OTLPAttributeValue[] = [];
  for (const item of value) {
    values.push(toOTLPAttributeValue(item));
  }
  return { arrayValue: { values } };
}

function toOTLPAttributes(attrs: SpanAttributes): OTLPAttribute[] {
  const result: OTLPAttribute[] = [];
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) {
      result.push({ key, value: toOTLPAttributeValue(value) });
    }
  }
  return result;
}

function toOTLPEvent(event: SpanEvent): OTLPSpanEvent {
  return {
    timeUnixNano: msToNanos(event.timestamp),
    name: event.name,
    attributes: event.attributes ? toOTLPAttributes(event.attributes) : [],
  };
}

/**
 * Convert SpanData to OTLP format
 */
export function toOTLPSpan(span: Readonly<SpanData>): OTLPSpan {
  return {
    traceId: span.context.traceId,
    spanId: span.context.spanId,
    parentSpanId: span.context.parentSpanId,
    name: span.name,
    kind: toOTLPSpanKind(span.kind),
    startTimeUnixNano: msToNanos(span.startTime),
    endTimeUnixNano: msToNanos(span.endTime ?? span.startTime),
    attributes: toOTLPAttributes(span.attributes),
    events: span.events.map(toOTLPEvent),
    // OTLP status codes match SpanStatus: 0 = UNSET, 1 = OK, 2 = ERROR
    status: { code: span.status, message: span.status === SpanStatus.ERROR ? span.statusMessage : undefined },
  };
}

/**
 * OTLP Exporter configuration
 */
export interface OTLPExporterConfig {
  /** OTLP endpoint URL */
  endpoint: string;
  /** Collector health endpoint; the traces endpoint is probed when absent */
  healthUrl?: string;
  /** Optional headers for authentication */
  headers?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
  fetchImpl?: typeof fetch;
}

/**
 * OTLP/HTTP JSON span exporter
 */
export class OTLPHttpSpanExporter implements SpanExporter {
  readonly endpoint: string;
  private readonly healthUrl?: string;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;
  private readonly resourceAttributes: OTLPAttribute[];
  private readonly scope: OTLPInstrumentationScope;

  constructor(config: OTLPExporterConfig, tracingConfig: Pick<TracingConfig, 'serviceName' | 'serviceVersion' | 'environment'>) {
    const base = config.endpoint.replace(/\/+$/, '');
    this.endpoint = base.endsWith('/v1/traces') ? base : `${base}/v1/traces`;
    this.healthUrl = config.healthUrl;
    this.headers = {
      'Content-Type': 'application/json',
      ...config.headers,
    };
    this.timeout = config.timeout ?? 10000;
    this.fetchImpl = config.fetchImpl ?? fetch;

    this.resourceAttributes = [
      { key: AttributeKeys.SERVICE_NAME, value: { stringValue: tracingConfig.serviceName } },
      {
        key: AttributeKeys.SERVICE_VERSION,
        value: { stringValue: tracingConfig.serviceVersion ?? '1.0.0' },
      },
      {
        key: AttributeKeys.DEPLOYMENT_ENVIRONMENT,
        value: { stringValue: tracingConfig.environment ?? 'development' },
      },
    ];

    this.scope = {
      name: '@hops/instrumentation',
      version: '1.0.0',
    };

    logger.debug({ endpoint: this.endpoint }, 'OTLP exporter initialized');
  }

  /**
   * Build the OTLP request body for a batch
   */
  buildRequest(spans: ReadonlyArray<Readonly<SpanData>>): OTLPExportRequest {
    return {
      resourceSpans: [
        {
          resource: {
            attributes: this.resourceAttributes,
          },
          scopeSpans: [
            {
              scope: this.scope,
              spans: spans.map(toOTLPSpan),
            },
          ],
        },
      ],
    };
  }

  async export(spans: ReadonlyArray<Readonly<SpanData>>): Promise<void> {
    if (spans.length === 0) {
      return;
    }
    await this.send(this.buildRequest(spans));
  }

  private async send(request: OTLPExportRequest): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => 'unknown');
        throw new ExportError(`OTLP export failed: ${response.status} ${response.statusText} - ${body}`, {
          status: response.status,
        });
      }
    } catch (err) {
      if (err instanceof ExportError) {
        throw err;
      }
      if (controller.signal.aborted) {
        throw new ExportError(`OTLP export timed out after ${this.timeout}ms`, {
          code: ErrorCodes.EXPORT_TIMEOUT,
          cause: err,
        });
      }
      throw new ExportError('OTLP export request failed', { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Check collector reachability
   */
  async probe(): Promise<boolean> {
    try {
      if (this.healthUrl) {
        const response = await this.fetchImpl(this.healthUrl, {
          method: 'GET',
          signal: AbortSignal.timeout(this.timeout),
        });
        return response.ok;
      }
      await this.send({ resourceSpans: [] });
      return true;
    } catch (err) {
      logger.debug({ err }, 'Collector probe failed');
      return false;
    }
  }
}

/**
 * Create an OTLP exporter from tracing config
 */
export function createOTLPExporter(tracingConfig: TracingConfig): OTLPHttpSpanExporter | null {
  const endpoint = tracingConfig.otlpEndpoint;

  if (!endpoint) {
    logger.debug('No OTLP endpoint configured, skipping exporter');
    return null;
  }

  return new OTLPHttpSpanExporter(
    { endpoint, healthUrl: tracingConfig.collectorHealthUrl, timeout: tracingConfig.exportTimeoutMs },
    tracingConfig
  );
}
