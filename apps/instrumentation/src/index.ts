/**
 * @hops/instrumentation
 *
 * Trace-context propagation, span recording and per-destination metrics for
 * services that talk over RabbitMQ and HTTP.
 *
 * @example
 * ```typescript
 * const telemetry = createTelemetry(getConfig());
 *
 * const publish = telemetry.amqp.instrumentPublish(channel.publish.bind(channel));
 * publish('orders', 'orders', Buffer.from(JSON.stringify(order)));
 *
 * await channel.consume('orders', telemetry.amqp.instrumentConsumerAsync('orders', handleOrder));
 *
 * process.on('SIGTERM', () => {
 *   telemetry.shutdown().finally(() => process.exit(0));
 * });
 * ```
 */

export * from './tracing/index.js';
export * from './metrics/index.js';
export * from './messaging/index.js';
export * from './http/index.js';

export { createTelemetry, toTracingConfig } from './telemetry.js';
export type { Telemetry, TelemetryOverrides } from './telemetry.js';

export { loadConfig, getConfig, resetConfig } from './config.js';
export type { Config } from './config.js';

export {
  ErrorCodes,
  InstrumentationError,
  ConfigurationError,
  ExportError,
  TopologyError,
  toError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
