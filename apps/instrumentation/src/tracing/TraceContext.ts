/**
 * Trace Context Manager
 *
 * Manages trace context and baggage scope using AsyncLocalStorage.
 * Every request or delivery runs inside its own store, so baggage set while
 * handling one never reaches another.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';
import type { Baggage, TraceContext } from './types.js';
import { TraceFlags } from './types.js';

/**
 * Context store for async operations
 */
interface ContextStore {
  trace: TraceContext;
  baggage: Baggage;
}

const asyncLocalStorage = new AsyncLocalStorage<ContextStore>();

export const INVALID_TRACE_ID = '0'.repeat(32);
export const INVALID_SPAN_ID = '0'.repeat(16);

/**
 * Context used when a carrier holds no usable parent
 */
export const INVALID_TRACE_CONTEXT: TraceContext = Object.freeze({
  traceId: INVALID_TRACE_ID,
  spanId: INVALID_SPAN_ID,
  traceFlags: TraceFlags.NONE,
});

export const EMPTY_BAGGAGE: Baggage = new Map<string, string>();

/**
 * Generate a random trace ID (32 hex characters)
 */
export function generateTraceId(): string {
  return randomBytes(16).toString('hex');
}

/**
 * Generate a random span ID (16 hex characters)
 */
export function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

/**
 * Create a new trace context, a child of `parentContext` when given
 */
export function createTraceContext(
  parentContext?: TraceContext,
  sampled: boolean = true
): TraceContext {
  return Object.freeze({
    traceId: parentContext?.traceId ?? generateTraceId(),
    spanId: generateSpanId(),
    parentSpanId: parentContext?.spanId,
    traceFlags: sampled ? TraceFlags.SAMPLED : TraceFlags.NONE,
    traceState: parentContext?.traceState,
  });
}

export function isValidTraceContext(context: TraceContext | undefined): context is TraceContext {
  return (
    context !== undefined &&
    /^[0-9a-f]{32}$/.test(context.traceId) &&
    context.traceId !== INVALID_TRACE_ID &&
    /^[0-9a-f]{16}$/.test(context.spanId) &&
    context.spanId !== INVALID_SPAN_ID
  );
}

export function isSampled(context: TraceContext): boolean {
  return (context.traceFlags & TraceFlags.SAMPLED) === TraceFlags.SAMPLED;
}

/**
 * Get current trace context from async local storage
 */
export function getCurrentTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore()?.trace;
}

/**
 * Get the baggage visible in the current scope
 */
export function getCurrentBaggage(): Baggage {
  return asyncLocalStorage.getStore()?.baggage ?? EMPTY_BAGGAGE;
}

/**
 * Run a function with a specific trace context. Baggage defaults to the
 * baggage of the enclosing scope.
 */
export function runWithTraceContext<T>(
  context: TraceContext,
  fn: () => T,
  baggage: Baggage = getCurrentBaggage()
): T {
  return asyncLocalStorage.run({ trace: context, baggage }, fn);
}

/**
 * Return a copy of `baggage` with one entry added or replaced
 */
export function setBaggageEntry(baggage: Baggage, key: string, value: string): Baggage {
  const next = new Map(baggage);
  next.set(key, value);
  return next;
}

/**
 * Run `fn` with an extra baggage entry. The enclosing scope keeps its own
 * snapshot.
 */
export function withBaggageEntry<T>(key: string, value: string, fn: () => T): T {
  const store = asyncLocalStorage.getStore();
  const baggage = setBaggageEntry(store?.baggage ?? EMPTY_BAGGAGE, key, value);
  const trace = store?.trace ?? INVALID_TRACE_CONTEXT;
  return asyncLocalStorage.run({ trace, baggage }, fn);
}

/**
 * Get baggage value from current context
 */
export function getBaggage(key: string): string | undefined {
  return getCurrentBaggage().get(key);
}

/**
 * Create a correlation ID from trace context
 * Format: {traceId}-{spanId} (shortened for logging)
 */
export function getCorrelationId(): string {
  const context = getCurrentTraceContext();
  if (!isValidTraceContext(context)) {
    return `orphan-${generateSpanId()}`;
  }
  return `${context.traceId.slice(0, 8)}-${context.spanId.slice(0, 8)}`;
}
