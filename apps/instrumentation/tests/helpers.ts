/**
 * Shared test doubles
 */

import type { ConsumeMessage, MessagePropertyHeaders } from 'amqplib';
import type { SpanData } from '../src/tracing/types.js';
import type { SpanProcessor } from '../src/tracing/Tracer.js';
import type { MetricRegistry } from '../src/metrics/MetricRegistry.js';

/**
 * Keeps every started and ended span in memory
 */
export class InMemorySpanProcessor implements SpanProcessor {
  readonly started: Readonly<SpanData>[] = [];
  readonly ended: Readonly<SpanData>[] = [];

  onStart(span: Readonly<SpanData>): void {
    this.started.push(span);
  }

  onEnd(span: Readonly<SpanData>): void {
    this.ended.push(span);
  }

  async forceFlush(): Promise<void> {}

  async shutdown(): Promise<void> {}

  byName(name: string): Readonly<SpanData> | undefined {
    return this.ended.find((span) => span.name === name);
  }
}

/**
 * Read one series from the registry. `series` selects a histogram's
 * `_count`, `_sum` or `_bucket` line; it defaults to the family name.
 */
export async function metricValue(
  metrics: MetricRegistry,
  name: string,
  labels: Record<string, string>,
  series: string = name
): Promise<number | undefined> {
  const snapshot = await metrics.snapshot();
  const family = snapshot.find((metric) => metric.name === name);
  if (!family) {
    return undefined;
  }

  const match = family.values.find((value) => {
    const metricName = 'metricName' in value ? value.metricName : undefined;
    if ((metricName ?? name) !== series) {
      return false;
    }
    // Bucket bounds come back as numbers
    return Object.entries(labels).every(([key, expected]) => String(value.labels[key]) === expected);
  });

  return match?.value;
}

export const TRACE_ID = '0af7651916cd43dd8448eb211c80319c';
export const SPAN_ID = 'b7ad6b7169203331';
export const TRACEPARENT = `00-${TRACE_ID}-${SPAN_ID}-01`;

export interface MessageOptions {
  content?: Buffer;
  headers?: MessagePropertyHeaders;
  timestamp?: number;
  messageId?: string;
  correlationId?: string;
  redelivered?: boolean;
}

/**
 * A delivery as amqplib hands it to a consumer callback
 */
export function consumeMessage(options: MessageOptions = {}): ConsumeMessage {
  return {
    content: options.content ?? Buffer.from('{"orderId":"o-1"}'),
    fields: {
      deliveryTag: 1,
      redelivered: options.redelivered ?? false,
      exchange: 'orders.events',
      routingKey: 'orders',
      consumerTag: 'ctag-1',
    },
    properties: {
      contentType: 'application/json',
      contentEncoding: undefined,
      headers: options.headers,
      deliveryMode: 2,
      priority: undefined,
      correlationId: options.correlationId,
      replyTo: undefined,
      expiration: undefined,
      messageId: options.messageId,
      timestamp: options.timestamp,
      type: undefined,
      userId: undefined,
      appId: undefined,
      clusterId: undefined,
    },
  };
}
