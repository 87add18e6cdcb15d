/**
 * W3C Context Codec
 *
 * Reads and writes `traceparent`, `tracestate` and `baggage` on a flat
 * carrier (HTTP headers or AMQP message headers). Extraction never throws:
 * anything missing or malformed degrades to the invalid, unsampled context.
 *
 * @see https://www.w3.org/TR/trace-context/
 * @see https://www.w3.org/TR/baggage/
 */

import pino from 'pino';
import type { Baggage, Carrier, ExtractedContext, TraceContext } from './types.js';
import {
  EMPTY_BAGGAGE,
  INVALID_SPAN_ID,
  INVALID_TRACE_CONTEXT,
  INVALID_TRACE_ID,
  isValidTraceContext,
} from './TraceContext.js';

const logger = pino({ name: 'hops:propagation' });

export const TRACEPARENT_HEADER = 'traceparent';
export const TRACESTATE_HEADER = 'tracestate';
export const BAGGAGE_HEADER = 'baggage';

const MAX_BAGGAGE_MEMBERS = 180;
const BAGGAGE_KEY = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Percent-encode a baggage key into the token characters a header key allows
 */
function encodeBaggageKey(key: string): string {
  return encodeURIComponent(key).replace(/[()]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Parse W3C Traceparent header
 * Format: {version}-{traceId}-{spanId}-{traceFlags}
 */
export function parseTraceparent(header: string): TraceContext | null {
  const parts = header.trim().split('-');
  if (parts.length < 4) {
    return null;
  }

  const [version, traceId, spanId, flagsHex] = parts;

  if (!/^[0-9a-f]{2}$/.test(version) || version === 'ff') {
    return null;
  }

  // Version 00 has exactly four fields; later versions may append more
  if (version === '00' && parts.length !== 4) {
    return null;
  }

  if (!/^[0-9a-f]{32}$/.test(traceId) || traceId === INVALID_TRACE_ID) {
    return null;
  }

  if (!/^[0-9a-f]{16}$/.test(spanId) || spanId === INVALID_SPAN_ID) {
    return null;
  }

  if (!/^[0-9a-f]{2}$/.test(flagsHex)) {
    return null;
  }

  return {
    traceId,
    spanId,
    traceFlags: parseInt(flagsHex, 16),
  };
}

/**
 * Format trace context as W3C Traceparent header
 */
export function formatTraceparent(context: TraceContext): string {
  const flags = (context.traceFlags & 0xff).toString(16).padStart(2, '0');
  return `00-${context.traceId}-${context.spanId}-${flags}`;
}

/**
 * Parse W3C Baggage header. Malformed members are skipped one by one.
 */
export function parseBaggage(header: string): Baggage {
  const baggage = new Map<string, string>();

  for (const rawMember of header.split(',')) {
    if (baggage.size >= MAX_BAGGAGE_MEMBERS) {
      break;
    }

    // Member properties (after ';') are not propagated
    const member = rawMember.split(';')[0].trim();
    const separator = member.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    const rawKey = member.slice(0, separator).trim();
    if (!BAGGAGE_KEY.test(rawKey)) {
      continue;
    }

    try {
      baggage.set(decodeURIComponent(rawKey), decodeURIComponent(member.slice(separator + 1).trim()));
    } catch (err) {
      logger.debug({ err, key: rawKey }, 'Skipping baggage member with invalid encoding');
    }
  }

  return baggage;
}

/**
 * Format baggage as a W3C Baggage header value. Keys and values are both
 * percent-encoded so any string survives parseBaggage.
 */
export function formatBaggage(baggage: Baggage): string {
  return Array.from(baggage.entries())
    .slice(0, MAX_BAGGAGE_MEMBERS)
    .map(([key, value]) => `${encodeBaggageKey(key)}=${encodeURIComponent(value)}`)
    .join(',');
}

/**
 * Read a carrier value as a string. Node's IncomingHttpHeaders hands out
 * arrays for repeated headers, amqplib hands out Buffers for binary headers.
 */
function readValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf-8');
  }
  if (Array.isArray(value) && value.length > 0) {
    return readValue(value[0]);
  }
  return undefined;
}

function getCarrierValue(carrier: Carrier, key: string): string | undefined {
  if (key in carrier) {
    return readValue(carrier[key]);
  }
  const match = Object.keys(carrier).find((candidate) => candidate.toLowerCase() === key);
  return match === undefined ? undefined : readValue(carrier[match]);
}

/**
 * Remove every casing of `key` so a later write replaces rather than duplicates
 */
function deleteCarrierKey(carrier: Carrier, key: string): void {
  for (const candidate of Object.keys(carrier)) {
    if (candidate.toLowerCase() === key) {
      delete carrier[candidate];
    }
  }
}

/**
 * Write context and baggage into an existing carrier. Unrelated keys are left
 * alone; injecting again overwrites the previous values.
 */
export function inject(context: TraceContext, baggage: Baggage, carrier: Carrier): Carrier {
  deleteCarrierKey(carrier, TRACEPARENT_HEADER);
  deleteCarrierKey(carrier, TRACESTATE_HEADER);
  deleteCarrierKey(carrier, BAGGAGE_HEADER);

  if (isValidTraceContext(context)) {
    carrier[TRACEPARENT_HEADER] = formatTraceparent(context);
    if (context.traceState) {
      carrier[TRACESTATE_HEADER] = context.traceState;
    }
  }

  if (baggage.size > 0) {
    carrier[BAGGAGE_HEADER] = formatBaggage(baggage);
  }

  return carrier;
}

/**
 * Read context and baggage from a carrier
 */
export function extract(carrier: Carrier | undefined | null): ExtractedContext {
  if (!carrier) {
    return { context: INVALID_TRACE_CONTEXT, baggage: EMPTY_BAGGAGE };
  }

  const baggageHeader = getCarrierValue(carrier, BAGGAGE_HEADER);
  const baggage = baggageHeader ? parseBaggage(baggageHeader) : EMPTY_BAGGAGE;

  const traceparent = getCarrierValue(carrier, TRACEPARENT_HEADER);
  if (!traceparent) {
    return { context: INVALID_TRACE_CONTEXT, baggage };
  }

  const parsed = parseTraceparent(traceparent);
  if (!parsed) {
    logger.debug({ traceparent }, 'Ignoring malformed traceparent');
    return { context: INVALID_TRACE_CONTEXT, baggage };
  }

  const traceState = getCarrierValue(carrier, TRACESTATE_HEADER)?.trim();

  return {
    context: Object.freeze(traceState ? { ...parsed, traceState } : parsed),
    baggage,
  };
}
