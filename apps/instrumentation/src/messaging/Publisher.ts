import amqp, { type ConfirmChannel, type Options } from 'amqplib';
import pino, { type Logger } from 'pino';
import type { AmqpInstrumentation } from './AmqpInstrumentation.js';
import type { AsyncPublishOperation } from './types.js';

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

export interface PublisherOptions {
  url: string;
  exchange: string;
  exchangeType?: 'topic' | 'direct' | 'fanout' | 'headers';
  /** Heartbeat interval in seconds */
  heartbeat?: number;
  maxReconnectAttempts?: number;
  /** Base delay, doubled on every failed attempt */
  reconnectDelayMs?: number;
}

export interface PublishMessageOptions {
  messageId?: string;
  correlationId?: string;
  priority?: number;
  headers?: Record<string, unknown>;
}

export interface PublisherStatus {
  connected: boolean;
  channelOpen: boolean;
  lastPublishTime?: number;
  publishCount: number;
  errorCount: number;
}

/**
 * Mask the password of a broker URL for logging
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return '***masked***';
  }
}

/**
 * RabbitMQ publisher on a confirm channel
 * Every publish goes through the AMQP instrumentation, so messages carry the
 * active trace context and are counted per routing key.
 */
export class Publisher {
  private connection: AmqpConnection | null = null;
  private channel: ConfirmChannel | null = null;
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private isShuttingDown = false;
  private publishCount = 0;
  private errorCount = 0;
  private lastPublishTime?: number;

  private readonly exchangeType: NonNullable<PublisherOptions['exchangeType']>;
  private readonly heartbeat: number;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectDelayMs: number;
  private readonly confirmedPublish: AsyncPublishOperation<void>;

  constructor(
    private readonly options: PublisherOptions,
    instrumentation: AmqpInstrumentation,
    private readonly logger: Logger = pino({ name: 'hops:publisher' })
  ) {
    this.exchangeType = options.exchangeType ?? 'topic';
    this.heartbeat = options.heartbeat ?? 30;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 10;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 5000;
    this.confirmedPublish = instrumentation.instrumentPublishAsync((exchange, routingKey, content, publishOptions) =>
      this.publishWithConfirm(exchange, routingKey, content, publishOptions)
    );
  }

  /**
   * Connect to RabbitMQ and create a confirm channel
   */
  async connect(): Promise<void> {
    if (this.isShuttingDown) {
      throw new Error('Publisher is shutting down');
    }

    try {
      this.logger.info({ url: maskUrl(this.options.url) }, 'Connecting to RabbitMQ...');

      const connection = await amqp.connect(this.options.url, { heartbeat: this.heartbeat });
      this.connection = connection;

      connection.on('error', (err: Error) => {
        this.logger.error({ error: err.message }, 'RabbitMQ connection error');
        this.scheduleReconnect();
      });

      connection.on('close', () => {
        if (!this.isShuttingDown) {
          this.logger.warn('RabbitMQ connection closed unexpectedly');
          this.connection = null;
          this.channel = null;
          this.scheduleReconnect();
        }
      });

      const channel = await connection.createConfirmChannel();
      this.channel = channel;

      channel.on('error', (err: Error) => {
        this.logger.error({ error: err.message }, 'RabbitMQ channel error');
        this.channel = null;
      });

      channel.on('close', () => {
        if (!this.isShuttingDown) {
          this.logger.warn('RabbitMQ channel closed unexpectedly');
          this.channel = null;
        }
      });

      await channel.assertExchange(this.options.exchange, this.exchangeType, { durable: true });

      this.reconnectAttempts = 0;
      this.logger.info('Connected to RabbitMQ successfully');
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : 'Unknown error' },
        'Failed to connect to RabbitMQ'
      );
      throw error;
    }
  }

  /**
   * Publish a JSON payload and wait for the broker's confirmation
   */
  async publish(routingKey: string, payload: unknown, options: PublishMessageOptions = {}): Promise<void> {
    const content = Buffer.from(JSON.stringify(payload));

    try {
      await this.confirmedPublish(this.options.exchange, routingKey, content, {
        persistent: true,
        contentType: 'application/json',
        timestamp: Date.now(),
        messageId: options.messageId,
        correlationId: options.correlationId,
        priority: options.priority,
        headers: options.headers,
      });

      this.publishCount++;
      this.lastPublishTime = Date.now();

      this.logger.debug({ routingKey, messageId: options.messageId, bytes: content.length }, 'Message published');
    } catch (error) {
      this.errorCount++;
      this.logger.error(
        {
          routingKey,
          messageId: options.messageId,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
        'Failed to publish message'
      );
      throw error;
    }
  }

  private publishWithConfirm(
    exchange: string,
    routingKey: string,
    content: Buffer,
    publishOptions: Options.Publish | undefined
  ): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      return Promise.reject(new Error('RabbitMQ channel not available'));
    }

    return new Promise<void>((resolve, reject) => {
      const written = channel.publish(exchange, routingKey, content, publishOptions, (err: unknown) => {
        if (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
        } else {
          resolve();
        }
      });

      if (!written) {
        // Still queued client-side; the confirm callback settles the promise
        this.logger.debug({ routingKey }, 'Channel write buffer full');
      }
    });
  }

  isHealthy(): boolean {
    return this.connection !== null && this.channel !== null && !this.isShuttingDown;
  }

  getStatus(): PublisherStatus {
    return {
      connected: this.connection !== null,
      channelOpen: this.channel !== null,
      lastPublishTime: this.lastPublishTime,
      publishCount: this.publishCount,
      errorCount: this.errorCount,
    };
  }

  /**
   * Close channel and connection
   */
  async close(): Promise<void> {
    this.isShuttingDown = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.logger.info('Closing RabbitMQ connection...');

    try {
      if (this.channel) {
        await this.channel.close();
        this.channel = null;
      }
      if (this.connection) {
        await this.connection.close();
        this.connection = null;
      }
      this.logger.info('RabbitMQ connection closed');
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : 'Unknown error' },
        'Error closing RabbitMQ connection'
      );
    }
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown || this.reconnectTimer) {
      return;
    }
    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.logger.error('Max reconnection attempts reached');
      return;
    }

    this.reconnectAttempts++;
    const delay = this.reconnectDelayMs * Math.pow(2, this.reconnectAttempts - 1);

    this.logger.info(
      { attempt: this.reconnectAttempts, maxAttempts: this.maxReconnectAttempts, delayMs: delay },
      'Scheduling RabbitMQ reconnection'
    );

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((error: unknown) => {
        this.logger.error(
          { error: error instanceof Error ? error.message : 'Unknown error' },
          'Reconnection failed'
        );
        this.scheduleReconnect();
      });
    }, delay);
    this.reconnectTimer.unref();
  }
}
