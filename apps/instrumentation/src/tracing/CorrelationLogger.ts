/**
 * Correlation Logger
 *
 * Puts the active trace context on pino log lines so logs and spans can be
 * joined by trace id.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { getCurrentTraceContext, getCorrelationId, isValidTraceContext } from './TraceContext.js';

/**
 * Create a child logger bound to the current trace context
 */
export function withTraceContext(logger: Logger): Logger {
  const context = getCurrentTraceContext();

  if (!isValidTraceContext(context)) {
    return logger;
  }

  return logger.child({
    traceId: context.traceId,
    spanId: context.spanId,
    correlationId: getCorrelationId(),
  });
}

/**
 * Mixin function for Pino to add trace context to every log
 * Usage: pino({ mixin: traceContextMixin })
 */
export function traceContextMixin(): Record<string, unknown> {
  const context = getCurrentTraceContext();

  if (!isValidTraceContext(context)) {
    return {};
  }

  return {
    traceId: context.traceId,
    spanId: context.spanId,
    ...(context.parentSpanId && { parentSpanId: context.parentSpanId }),
    correlationId: getCorrelationId(),
  };
}

/**
 * Create a service logger whose every line carries the active trace context
 */
export function createCorrelationLogger(
  serviceName: string,
  options: pino.LoggerOptions = {}
): Logger {
  return pino({
    name: serviceName,
    mixin: traceContextMixin,
    ...options,
  });
}
