/**
 * RabbitMQ instrumentation, retry topology and an instrumented publisher
 */

export { AmqpInstrumentation, DEFAULT_REDELIVERY_HEADER } from './AmqpInstrumentation.js';
export type {
  AmqpInstrumentationOptions,
  AsyncConsumeHandler,
  AsyncPublishOperation,
  ConsumeHandler,
  DeliveryCallback,
  PublishOperation,
  RedeliveryPredicate,
} from './types.js';

export {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  declareRetryTopology,
  deliveryAttempts,
  isRetryExhausted,
  parkMessage,
  retryTopologyFor,
} from './RetryPolicy.js';
export type { ParkingChannel, RetryPolicyOptions, RetryTopology, TopologyChannel } from './RetryPolicy.js';

export { Publisher, maskUrl } from './Publisher.js';
export type { PublisherOptions, PublishMessageOptions, PublisherStatus } from './Publisher.js';
