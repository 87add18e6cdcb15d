/**
 * AMQP Instrumentation
 *
 * Wraps RabbitMQ publish operations and consumer callbacks with PRODUCER and
 * CONSUMER spans, W3C context propagation through message headers, and
 * per-destination metrics. The wrapped operation's outcome is never changed:
 * its result is returned as-is and its errors are re-thrown unchanged after
 * being recorded. Acking and redelivery stay with the caller and the broker.
 */

import { performance } from 'node:perf_hooks';
import pino from 'pino';
import type { ConsumeMessage, Options } from 'amqplib';
import type { Baggage, SpanAttributes } from '../tracing/types.js';
import { AttributeKeys, SpanKind, SpanStatus } from '../tracing/types.js';
import type { Span } from '../tracing/Span.js';
import type { Tracer } from '../tracing/Tracer.js';
import { extract, inject } from '../tracing/Propagation.js';
import { getCurrentBaggage, runWithTraceContext } from '../tracing/TraceContext.js';
import type { InstrumentSet, MetricRegistry } from '../metrics/MetricRegistry.js';
import type {
  AmqpInstrumentationOptions,
  AsyncConsumeHandler,
  AsyncPublishOperation,
  ConsumeHandler,
  DeliveryCallback,
  PublishOperation,
  RedeliveryPredicate,
} from './types.js';
import { stringOrUndefined, timestampToMs, toHeaderRecord } from './headers.js';

const logger = pino({ name: 'hops:amqp' });

export const DEFAULT_REDELIVERY_HEADER = 'x-first-death-exchange';

interface PublishScope {
  span: Span;
  options: Options.Publish;
}

interface ConsumeScope {
  consumerSpan: Span;
  processSpan: Span;
  baggage: Baggage;
  startedAt: number;
}

export class AmqpInstrumentation {
  private readonly isRedelivery: RedeliveryPredicate;

  constructor(
    private readonly tracer: Tracer,
    private readonly metrics: MetricRegistry,
    options: AmqpInstrumentationOptions = {}
  ) {
    const header = options.redeliveryHeader ?? DEFAULT_REDELIVERY_HEADER;
    this.isRedelivery = options.isRedelivery ?? ((headers) => headers[header] !== undefined);
  }

  // ==========================================================================
  // Publish path
  // ==========================================================================

  /**
   * Wrap a synchronous publish, such as amqplib `channel.publish`
   */
  instrumentPublish<R>(publish: PublishOperation<R>): PublishOperation<R> {
    return (exchange, routingKey, content, options) => {
      const scope = this.safely('start publish span', () => this.beginPublish(exchange, routingKey, options));
      if (!scope) {
        return publish(exchange, routingKey, content, options);
      }

      let result: R;
      try {
        result = scope.span.run(() => publish(exchange, routingKey, content, scope.options));
      } catch (error) {
        this.tracer.endSpan(scope.span, SpanStatus.ERROR, error);
        throw error;
      }

      if (result === false) {
        // Write buffer full: the message is queued client-side, not lost
        scope.span.setAttribute(AttributeKeys.MESSAGING_RABBITMQ_BUFFER_FULL, true);
      }
      this.completePublish(scope.span, routingKey, content);
      return result;
    };
  }

  /**
   * Wrap a publish that resolves on broker confirmation
   */
  instrumentPublishAsync<R>(publish: AsyncPublishOperation<R>): AsyncPublishOperation<R> {
    return async (exchange, routingKey, content, options) => {
      const scope = this.safely('start publish span', () => this.beginPublish(exchange, routingKey, options));
      if (!scope) {
        return publish(exchange, routingKey, content, options);
      }

      let result: R;
      try {
        result = await scope.span.run(() => publish(exchange, routingKey, content, scope.options));
      } catch (error) {
        this.tracer.endSpan(scope.span, SpanStatus.ERROR, error);
        throw error;
      }

      this.completePublish(scope.span, routingKey, content);
      return result;
    };
  }

  private beginPublish(
    exchange: string,
    routingKey: string,
    options: Options.Publish | undefined
  ): PublishScope {
    // Copy so the caller's options object is never mutated
    const headers = toHeaderRecord(options?.headers);
    const publishOptions: Options.Publish = { ...options, headers };

    const span = this.tracer.startSpan(`publish ${routingKey}`, {
      kind: SpanKind.PRODUCER,
      attributes: this.messagingAttributes(routingKey, {
        [AttributeKeys.MESSAGING_OPERATION]: 'publish',
        [AttributeKeys.MESSAGING_RABBITMQ_EXCHANGE]: exchange,
        [AttributeKeys.MESSAGING_RABBITMQ_ROUTING_KEY]: routingKey,
        [AttributeKeys.MESSAGING_MESSAGE_ID]: options?.messageId,
      }),
    });

    this.safely('inject publish context', () => {
      inject(span.context, getCurrentBaggage(), headers);
      if (!publishOptions.correlationId) {
        publishOptions.correlationId = span.context.spanId;
      }
      span.setAttribute(AttributeKeys.MESSAGING_CORRELATION_ID, publishOptions.correlationId);
    });

    return { span, options: publishOptions };
  }

  private completePublish(span: Span, routingKey: string, content: Buffer): void {
    this.safely('record publish metrics', () => {
      const instruments = this.metrics.getOrCreate(routingKey);
      instruments.published.inc();
      instruments.messageSize.observe(content.length);
      span.setAttribute(AttributeKeys.MESSAGING_PAYLOAD_SIZE, content.length);
    });
    this.tracer.endSpan(span, SpanStatus.OK);
  }

  // ==========================================================================
  // Consume path
  // ==========================================================================

  /**
   * Wrap a synchronous consumer callback for `channel.consume(queue, ...)`
   */
  instrumentConsumer<R>(queue: string, handler: ConsumeHandler<R>): DeliveryCallback<R> {
    return (msg) => {
      if (msg === null) {
        logger.debug({ queue }, 'Consumer cancelled by broker');
        return undefined;
      }

      const scope = this.safely('start consume spans', () => this.beginConsume(queue, msg));
      if (!scope) {
        return handler(msg);
      }

      let result: R;
      try {
        result = runWithTraceContext(scope.processSpan.context, () => handler(msg), scope.baggage);
      } catch (error) {
        this.failConsume(queue, scope, error);
        throw error;
      }
      this.completeConsume(queue, scope);
      return result;
    };
  }

  /**
   * Wrap an async consumer callback; the returned promise rejects with the
   * handler's own error.
   */
  instrumentConsumerAsync<R>(
    queue: string,
    handler: AsyncConsumeHandler<R>
  ): DeliveryCallback<Promise<R | undefined>> {
    return async (msg) => {
      if (msg === null) {
        logger.debug({ queue }, 'Consumer cancelled by broker');
        return undefined;
      }

      const scope = this.safely('start consume spans', () => this.beginConsume(queue, msg));
      if (!scope) {
        return handler(msg);
      }

      let result: R;
      try {
        result = await runWithTraceContext(scope.processSpan.context, () => handler(msg), scope.baggage);
      } catch (error) {
        this.failConsume(queue, scope, error);
        throw error;
      }
      this.completeConsume(queue, scope);
      return result;
    };
  }

  private beginConsume(queue: string, msg: ConsumeMessage): ConsumeScope {
    const headers = toHeaderRecord(msg.properties.headers);
    const { context: parentContext, baggage } = extract(headers);

    const consumerSpan = this.tracer.startSpan(`consume ${queue}`, {
      kind: SpanKind.CONSUMER,
      parentContext,
      attributes: this.messagingAttributes(queue, {
        [AttributeKeys.MESSAGING_OPERATION]: 'receive',
        [AttributeKeys.MESSAGING_RABBITMQ_EXCHANGE]: msg.fields.exchange,
        [AttributeKeys.MESSAGING_RABBITMQ_ROUTING_KEY]: msg.fields.routingKey,
        [AttributeKeys.MESSAGING_MESSAGE_ID]: stringOrUndefined(msg.properties.messageId),
        [AttributeKeys.MESSAGING_CORRELATION_ID]: stringOrUndefined(msg.properties.correlationId),
        [AttributeKeys.MESSAGING_PAYLOAD_SIZE]: msg.content.length,
      }),
    });

    this.safely('record consume metrics', () => {
      const instruments = this.metrics.getOrCreate(queue);
      instruments.consumed.inc();
      instruments.messageSize.observe(msg.content.length);
      this.recordQueueTime(instruments, msg);

      if (this.isRedelivery(headers, msg)) {
        instruments.retries.inc();
        consumerSpan.setAttribute(AttributeKeys.MESSAGING_RABBITMQ_REDELIVERED, true);
      }
    });

    const processSpan = this.tracer.startSpan(`process ${queue}`, {
      kind: SpanKind.INTERNAL,
      parentContext: consumerSpan.context,
      attributes: { [AttributeKeys.MESSAGING_OPERATION]: 'process' },
    });

    return { consumerSpan, processSpan, baggage, startedAt: performance.now() };
  }

  private recordQueueTime(instruments: InstrumentSet, msg: ConsumeMessage): void {
    const publishedAt = timestampToMs(msg.properties.timestamp);
    if (publishedAt === undefined) {
      return;
    }
    const waited = Date.now() - publishedAt;
    if (waited >= 0) {
      instruments.queueTime.observe(waited);
    }
  }

  private completeConsume(queue: string, scope: ConsumeScope): void {
    this.recordProcessingTime(queue, scope);
    this.tracer.endSpan(scope.processSpan, SpanStatus.OK);
    this.tracer.endSpan(scope.consumerSpan, SpanStatus.OK);
  }

  private failConsume(queue: string, scope: ConsumeScope, error: unknown): void {
    this.recordProcessingTime(queue, scope);
    this.tracer.endSpan(scope.processSpan, SpanStatus.ERROR, error);
    this.tracer.endSpan(scope.consumerSpan, SpanStatus.ERROR, error);
  }

  private recordProcessingTime(queue: string, scope: ConsumeScope): void {
    this.safely('record processing time', () => {
      this.metrics.getOrCreate(queue).processingTime.observe(performance.now() - scope.startedAt);
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private messagingAttributes(destination: string, extra: SpanAttributes): SpanAttributes {
    return {
      [AttributeKeys.MESSAGING_SYSTEM]: 'rabbitmq',
      [AttributeKeys.MESSAGING_DESTINATION]: destination,
      [AttributeKeys.MESSAGING_DESTINATION_KIND]: 'queue',
      [AttributeKeys.MESSAGING_PROTOCOL]: 'AMQP',
      ...extra,
    };
  }

  /**
   * Run instrumentation bookkeeping; its failures are logged, never raised.
   * Returns undefined when `fn` threw.
   */
  private safely<T>(operation: string, fn: () => T): T | undefined {
    try {
      return fn();
    } catch (err) {
      logger.warn({ err, operation }, 'Instrumentation bookkeeping failed');
      return undefined;
    }
  }
}
