/**
 * Retry / Dead-Letter Policy
 *
 * Declares the broker topology for delayed redelivery of failed messages:
 *
 *   <queue> --nack--> <queue>.dlx --<queue>--> <queue>.dlq --TTL--> '' --<queue>--> <queue>
 *                                  \--<queue>.parking--> <queue>.parking
 *
 * The broker enforces the cycle. A consumer that rejects a delivery without
 * requeue sends it to the delay queue; when the TTL expires it is routed back
 * to the primary queue. Once `maxRetries` is reached the consumer parks the
 * message instead.
 */

import pino from 'pino';
import type { Channel, ConsumeMessage, Options } from 'amqplib';
import { TopologyError } from '../errors.js';
import { isRecord, stringOrUndefined, toHeaderRecord } from './headers.js';

const logger = pino({ name: 'hops:retry-policy' });

export const DEFAULT_RETRY_DELAY_MS = 30000;
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Channel operations needed to declare the topology
 */
export type TopologyChannel = Pick<Channel, 'assertExchange' | 'assertQueue' | 'bindQueue'>;

/**
 * Channel operations needed to park a message
 */
export type ParkingChannel = Pick<Channel, 'publish'>;

export interface RetryPolicyOptions {
  /** Time a rejected message waits in the delay queue */
  delayMs?: number;
  /** Rejections allowed before the message is parked */
  maxRetries?: number;
  /** Durable queues and exchanges (default true) */
  durable?: boolean;
}

export interface RetryTopology {
  readonly queue: string;
  readonly deadLetterExchange: string;
  readonly delayQueue: string;
  readonly parkingQueue: string;
  readonly parkingRoutingKey: string;
  readonly delayMs: number;
  readonly maxRetries: number;
}

/**
 * Build the names and limits for a queue's retry topology without touching
 * the broker
 */
export function retryTopologyFor(queue: string, options: RetryPolicyOptions = {}): RetryTopology {
  const delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  if (queue.trim() === '') {
    throw new TopologyError('Queue name must not be empty');
  }
  if (!Number.isInteger(delayMs) || delayMs < 0) {
    throw new TopologyError(`delayMs must be a non-negative integer, got ${delayMs}`);
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new TopologyError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }

  return Object.freeze({
    queue,
    deadLetterExchange: `${queue}.dlx`,
    delayQueue: `${queue}.dlq`,
    parkingQueue: `${queue}.parking`,
    parkingRoutingKey: `${queue}.parking`,
    delayMs,
    maxRetries,
  });
}

/**
 * Declare the dead-letter exchange, delay queue, parking queue and the
 * primary queue wired to them. Idempotent as long as the arguments match
 * what the broker already has.
 */
export async function declareRetryTopology(
  channel: TopologyChannel,
  queue: string,
  options: RetryPolicyOptions = {}
): Promise<RetryTopology> {
  const topology = retryTopologyFor(queue, options);
  const durable = options.durable ?? true;

  await channel.assertExchange(topology.deadLetterExchange, 'direct', { durable });

  await channel.assertQueue(topology.delayQueue, {
    durable,
    messageTtl: topology.delayMs,
    deadLetterExchange: '',
    deadLetterRoutingKey: queue,
  });
  await channel.bindQueue(topology.delayQueue, topology.deadLetterExchange, queue);

  await channel.assertQueue(topology.parkingQueue, { durable });
  await channel.bindQueue(topology.parkingQueue, topology.deadLetterExchange, topology.parkingRoutingKey);

  await channel.assertQueue(queue, {
    durable,
    deadLetterExchange: topology.deadLetterExchange,
    deadLetterRoutingKey: queue,
  });

  logger.info(
    {
      queue,
      deadLetterExchange: topology.deadLetterExchange,
      delayQueue: topology.delayQueue,
      parkingQueue: topology.parkingQueue,
      delayMs: topology.delayMs,
      maxRetries: topology.maxRetries,
    },
    'Retry topology declared'
  );

  return topology;
}

/**
 * Number of times the message was rejected from `queue`, according to the
 * broker's `x-death` header
 */
export function deliveryAttempts(message: ConsumeMessage, queue: string): number {
  const deaths = toHeaderRecord(message.properties.headers)['x-death'];
  if (!Array.isArray(deaths)) {
    return 0;
  }

  let attempts = 0;
  for (const death of deaths) {
    if (!isRecord(death) || death.queue !== queue || death.reason !== 'rejected') {
      continue;
    }
    // amqplib decodes AMQP long values as numbers
    if (typeof death.count === 'number' && Number.isFinite(death.count)) {
      attempts += death.count;
    }
  }
  return attempts;
}

export function isRetryExhausted(message: ConsumeMessage, topology: RetryTopology): boolean {
  return deliveryAttempts(message, topology.queue) >= topology.maxRetries;
}

/**
 * Republish a message to the parking queue with its properties and headers.
 * The caller still acks the original delivery.
 */
export function parkMessage(
  channel: ParkingChannel,
  topology: RetryTopology,
  message: ConsumeMessage
): boolean {
  const { properties } = message;
  const options: Options.Publish = {
    headers: toHeaderRecord(properties.headers),
    contentType: stringOrUndefined(properties.contentType),
    contentEncoding: stringOrUndefined(properties.contentEncoding),
    correlationId: stringOrUndefined(properties.correlationId),
    messageId: stringOrUndefined(properties.messageId),
    replyTo: stringOrUndefined(properties.replyTo),
    type: stringOrUndefined(properties.type),
    appId: stringOrUndefined(properties.appId),
    timestamp: typeof properties.timestamp === 'number' ? properties.timestamp : undefined,
    persistent: true,
  };

  logger.warn(
    {
      queue: topology.queue,
      parkingQueue: topology.parkingQueue,
      messageId: options.messageId,
      attempts: deliveryAttempts(message, topology.queue),
    },
    'Retries exhausted, parking message'
  );

  return channel.publish(topology.deadLetterExchange, topology.parkingRoutingKey, message.content, options);
}
