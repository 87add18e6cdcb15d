import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const optionalUrl = z
  .string()
  .url()
  .optional()
  .or(z.literal('').transform(() => undefined));

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Service identity
  serviceName: z.string().min(1, 'SERVICE_NAME is required'),
  serviceVersion: z.string().default('1.0.0'),
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Span export
  otlpEndpoint: optionalUrl,
  collectorHealthUrl: optionalUrl,
  samplingRate: z.number().min(0).max(1).default(1),
  maxExportBatchSize: z.number().int().min(1).default(512),
  exportIntervalMs: z.number().int().min(1).default(5000),
  maxQueueSize: z.number().int().min(1).default(2048),
  exportTimeoutMs: z.number().int().min(1).default(10000),
  maxExportAttempts: z.number().int().min(1).default(3),
  logSpans: z.boolean().default(false),

  // Metric export
  metricExportIntervalMs: z.number().int().min(1).default(15000),
  pushgatewayUrl: optionalUrl,

  // Broker
  retryDelayMs: z.number().int().min(1).default(30000),
  retryMaxAttempts: z.number().int().min(1).default(3),
  redeliveryHeader: z.string().min(1).default('x-first-death-exchange'),
});

export type Config = z.infer<typeof configSchema>;

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === 'true' || value === '1';
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    serviceName: env.SERVICE_NAME,
    serviceVersion: env.SERVICE_VERSION || undefined,
    nodeEnv: env.NODE_ENV || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    otlpEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
    collectorHealthUrl: env.OTEL_COLLECTOR_HEALTH_URL,
    samplingRate: parseNumber(env.OTEL_TRACES_SAMPLER_ARG),
    maxExportBatchSize: parseNumber(env.OTEL_BSP_MAX_EXPORT_BATCH_SIZE),
    exportIntervalMs: parseNumber(env.OTEL_BSP_SCHEDULE_DELAY),
    maxQueueSize: parseNumber(env.OTEL_BSP_MAX_QUEUE_SIZE),
    exportTimeoutMs: parseNumber(env.OTEL_BSP_EXPORT_TIMEOUT),
    maxExportAttempts: parseNumber(env.SPAN_EXPORT_MAX_ATTEMPTS),
    logSpans: parseBoolean(env.LOG_SPANS),
    metricExportIntervalMs: parseNumber(env.METRIC_EXPORT_INTERVAL),
    pushgatewayUrl: env.PUSHGATEWAY_URL,
    retryDelayMs: parseNumber(env.RETRY_DELAY_MS),
    retryMaxAttempts: parseNumber(env.RETRY_MAX_ATTEMPTS),
    redeliveryHeader: env.REDELIVERY_HEADER || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(issues);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
