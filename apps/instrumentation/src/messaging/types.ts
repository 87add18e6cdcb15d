/**
 * Messaging Types
 *
 * Function shapes the AMQP instrumentation wraps. They mirror amqplib's
 * `channel.publish` and consume callbacks so wrapped and unwrapped operations
 * are interchangeable.
 */

import type { ConsumeMessage, Options } from 'amqplib';

/**
 * A publish call: amqplib `Channel#publish`, or a confirm-aware variant that
 * resolves once the broker acknowledges.
 */
export type PublishOperation<R> = (
  exchange: string,
  routingKey: string,
  content: Buffer,
  options?: Options.Publish
) => R;

export type AsyncPublishOperation<R> = PublishOperation<Promise<R>>;

/**
 * Per-delivery consumer callback
 */
export type ConsumeHandler<R> = (msg: ConsumeMessage) => R;

export type AsyncConsumeHandler<R> = ConsumeHandler<Promise<R>>;

/**
 * What amqplib's `channel.consume` receives; `null` means the broker
 * cancelled the consumer.
 */
export type DeliveryCallback<R> = (msg: ConsumeMessage | null) => R | undefined;

/**
 * Decides whether a delivery came back through the dead-letter path
 */
export type RedeliveryPredicate = (headers: Record<string, unknown>, msg: ConsumeMessage) => boolean;

export interface AmqpInstrumentationOptions {
  /**
   * Header the broker sets when a message is dead-lettered. RabbitMQ uses
   * `x-first-death-exchange`.
   */
  redeliveryHeader?: string;
  /** Replaces the header check entirely */
  isRedelivery?: RedeliveryPredicate;
}
