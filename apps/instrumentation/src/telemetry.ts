/**
 * Telemetry Provider
 *
 * Builds the tracer, metric registry and instrumentations for one service
 * from its configuration. Nothing here is global: callers hold the returned
 * object and pass its parts where they are needed.
 */

import type { Logger } from 'pino';
import type { Config } from './config.js';
import type { TracingConfig } from './tracing/types.js';
import { DEFAULT_TRACING_CONFIG } from './tracing/types.js';
import { Tracer, type Sampler } from './tracing/Tracer.js';
import { BatchSpanProcessor, type SpanExporter } from './tracing/BatchSpanProcessor.js';
import { createOTLPExporter } from './tracing/OTLPExporter.js';
import { createCorrelationLogger } from './tracing/CorrelationLogger.js';
import { MetricRegistry } from './metrics/MetricRegistry.js';
import { MetricReader, PushgatewaySink, type MetricExportSink } from './metrics/MetricReader.js';
import { AmqpInstrumentation } from './messaging/AmqpInstrumentation.js';
import { declareRetryTopology, type RetryTopology, type TopologyChannel } from './messaging/RetryPolicy.js';
import { HttpInstrumentation } from './http/HttpInstrumentation.js';

/**
 * Replacements for the collaborators normally derived from configuration
 */
export interface TelemetryOverrides {
  /** Span exporter used instead of the OTLP exporter */
  exporter?: SpanExporter;
  /** Metric sink used instead of the Pushgateway */
  metricSink?: MetricExportSink;
  sampler?: Sampler;
  logger?: Logger;
  /** Collect default Node.js process metrics (default false) */
  collectDefaultMetrics?: boolean;
}

export interface Telemetry {
  readonly config: Config;
  readonly logger: Logger;
  readonly metrics: MetricRegistry;
  readonly tracer: Tracer;
  readonly spanProcessor: BatchSpanProcessor | null;
  readonly metricReader: MetricReader | null;
  readonly amqp: AmqpInstrumentation;
  readonly http: HttpInstrumentation;
  /** Declare a queue's retry topology with the configured delay and limit */
  declareRetryTopology(channel: TopologyChannel, queue: string): Promise<RetryTopology>;
  /** Flush spans, export metrics one last time and stop timers */
  shutdown(): Promise<void>;
}

export function toTracingConfig(config: Config): TracingConfig {
  return {
    ...DEFAULT_TRACING_CONFIG,
    serviceName: config.serviceName,
    serviceVersion: config.serviceVersion,
    environment: config.nodeEnv,
    samplingRate: config.samplingRate,
    otlpEndpoint: config.otlpEndpoint,
    collectorHealthUrl: config.collectorHealthUrl,
    maxExportBatchSize: config.maxExportBatchSize,
    maxQueueSize: config.maxQueueSize,
    exportIntervalMs: config.exportIntervalMs,
    exportTimeoutMs: config.exportTimeoutMs,
    maxExportAttempts: config.maxExportAttempts,
    logSpans: config.logSpans,
  };
}

export function createTelemetry(config: Config, overrides: TelemetryOverrides = {}): Telemetry {
  const logger = overrides.logger ?? createCorrelationLogger(config.serviceName, { level: config.logLevel });

  const metrics = new MetricRegistry({
    collectDefaultMetrics: overrides.collectDefaultMetrics ?? false,
    defaultLabels: { service: config.serviceName },
  });

  const tracingConfig = toTracingConfig(config);
  const tracer = new Tracer(tracingConfig, overrides.sampler);

  let spanProcessor: BatchSpanProcessor | null = null;
  const exporter = overrides.exporter ?? createOTLPExporter(tracingConfig);
  if (exporter) {
    spanProcessor = new BatchSpanProcessor(exporter, {
      maxExportBatchSize: config.maxExportBatchSize,
      maxQueueSize: config.maxQueueSize,
      exportIntervalMs: config.exportIntervalMs,
      maxExportAttempts: config.maxExportAttempts,
      onDrop: (count, reason) => metrics.recordDroppedSpans(count, reason),
      onExportFailure: () => metrics.recordExportFailure(),
    });
    tracer.addProcessor(spanProcessor);
  }

  let metricReader: MetricReader | null = null;
  const sink =
    overrides.metricSink ??
    (config.pushgatewayUrl ? new PushgatewaySink(config.pushgatewayUrl, config.serviceName, metrics) : null);
  if (sink) {
    metricReader = new MetricReader(metrics, sink, { exportIntervalMs: config.metricExportIntervalMs });
    metricReader.start();
  }

  const amqp = new AmqpInstrumentation(tracer, metrics, { redeliveryHeader: config.redeliveryHeader });
  const http = new HttpInstrumentation(tracer, metrics);

  logger.info(
    {
      serviceName: config.serviceName,
      spanExport: spanProcessor !== null,
      metricExport: metricReader !== null,
      samplingRate: config.samplingRate,
    },
    'Telemetry initialized'
  );

  let shutdownPromise: Promise<void> | null = null;

  return {
    config,
    logger,
    metrics,
    tracer,
    spanProcessor,
    metricReader,
    amqp,
    http,

    declareRetryTopology(channel, queue) {
      return declareRetryTopology(channel, queue, {
        delayMs: config.retryDelayMs,
        maxRetries: config.retryMaxAttempts,
      });
    },

    shutdown() {
      if (!shutdownPromise) {
        shutdownPromise = (async () => {
          await tracer.shutdown();
          if (metricReader) {
            await metricReader.shutdown();
          }
          logger.info('Telemetry shut down');
        })();
      }
      return shutdownPromise;
    },
  };
}
