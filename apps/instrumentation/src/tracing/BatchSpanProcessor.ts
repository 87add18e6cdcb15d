/**
 * Batch Span Processor
 *
 * Buffers ended spans and hands them to an exporter in batches, either when a
 * batch fills up or on a fixed schedule. A batch that fails to export goes
 * back to the head of the queue and is retried on later flushes; after
 * `maxExportAttempts` failures it is dropped and counted.
 */

import pino from 'pino';
import type { SpanData } from './types.js';
import type { SpanProcessor } from './Tracer.js';

const logger = pino({ name: 'hops:batch-processor' });

/**
 * Destination for finished span batches
 */
export interface SpanExporter {
  export(spans: ReadonlyArray<Readonly<SpanData>>): Promise<void>;
  /** Report whether the collector is reachable */
  probe?(): Promise<boolean>;
  shutdown?(): Promise<void>;
}

export type DropReason = 'queue_full' | 'export_failed';

export interface BatchSpanProcessorOptions {
  /** Maximum spans per exported batch */
  maxExportBatchSize?: number;
  /** Maximum spans held (buffered plus awaiting retry) */
  maxQueueSize?: number;
  /** Schedule for background flushes */
  exportIntervalMs?: number;
  /** Attempts per batch before it is dropped */
  maxExportAttempts?: number;
  /** Called with the number of spans lost */
  onDrop?: (count: number, reason: DropReason) => void;
  /** Called after every failed export attempt */
  onExportFailure?: (error: unknown) => void;
}

interface PendingBatch {
  spans: Readonly<SpanData>[];
  attempts: number;
}

export class BatchSpanProcessor implements SpanProcessor {
  private buffer: Readonly<SpanData>[] = [];
  private retryQueue: PendingBatch[] = [];
  private flushInterval: ReturnType<typeof setInterval> | null = null;
  private flushing: Promise<void> | null = null;
  private isShuttingDown: boolean = false;
  private lastExportSucceeded: boolean | null = null;
  private readonly maxExportBatchSize: number;
  private readonly maxQueueSize: number;
  private readonly exportIntervalMs: number;
  private readonly maxExportAttempts: number;
  private readonly onDrop?: BatchSpanProcessorOptions['onDrop'];
  private readonly onExportFailure?: BatchSpanProcessorOptions['onExportFailure'];

  constructor(
    private readonly exporter: SpanExporter,
    options: BatchSpanProcessorOptions = {}
  ) {
    this.maxExportBatchSize = options.maxExportBatchSize ?? 512;
    this.maxQueueSize = Math.max(options.maxQueueSize ?? 2048, this.maxExportBatchSize);
    this.exportIntervalMs = options.exportIntervalMs ?? 5000;
    this.maxExportAttempts = options.maxExportAttempts ?? 3;
    this.onDrop = options.onDrop;
    this.onExportFailure = options.onExportFailure;
    this.startFlushInterval();
  }

  private startFlushInterval(): void {
    this.flushInterval = setInterval(() => {
      this.forceFlush().catch((err: unknown) => {
        logger.warn({ err }, 'Scheduled span flush failed');
      });
    }, this.exportIntervalMs);

    // Don't block process exit
    this.flushInterval.unref();
  }

  /**
   * Spans waiting for export, including batches awaiting retry
   */
  get pendingCount(): number {
    return this.retryQueue.reduce((total, batch) => total + batch.spans.length, this.buffer.length);
  }

  /**
   * Result of the most recent export attempt (null before the first)
   */
  get lastExportHealthy(): boolean | null {
    return this.lastExportSucceeded;
  }

  onStart(_span: Readonly<SpanData>): void {
    // Batching only acts on ended spans
  }

  onEnd(span: Readonly<SpanData>): void {
    if (this.isShuttingDown) {
      return;
    }

    if (this.pendingCount >= this.maxQueueSize) {
      this.recordDrop(1, 'queue_full');
      return;
    }

    this.buffer.push(span);

    if (this.buffer.length >= this.maxExportBatchSize && !this.flushing) {
      this.forceFlush().catch((err: unknown) => {
        logger.warn({ err }, 'Span flush on full batch failed');
      });
    }
  }

  /**
   * Export everything pending. Concurrent calls run one after another.
   */
  async forceFlush(): Promise<void> {
    while (this.flushing) {
      await this.flushing;
    }

    this.flushing = this.drain().finally(() => {
      this.flushing = null;
    });

    return this.flushing;
  }

  private takeBatches(): PendingBatch[] {
    const batches = this.retryQueue;
    this.retryQueue = [];

    const spans = this.buffer;
    this.buffer = [];

    for (let i = 0; i < spans.length; i += this.maxExportBatchSize) {
      batches.push({ spans: spans.slice(i, i + this.maxExportBatchSize), attempts: 0 });
    }

    return batches;
  }

  private async drain(): Promise<void> {
    const batches = this.takeBatches();

    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i];

      try {
        await this.exporter.export(batch.spans);
        this.lastExportSucceeded = true;
        logger.debug({ count: batch.spans.length }, 'Exported span batch');
      } catch (err) {
        this.lastExportSucceeded = false;
        batch.attempts++;
        this.notifyExportFailure(err);

        const untried = batches.slice(i + 1);

        if (batch.attempts >= this.maxExportAttempts) {
          logger.error(
            { err, count: batch.spans.length, attempts: batch.attempts },
            'Dropping span batch after repeated export failures'
          );
          this.recordDrop(batch.spans.length, 'export_failed');
          this.retryQueue = [...untried, ...this.retryQueue];
        } else {
          logger.warn(
            { err, count: batch.spans.length, attempts: batch.attempts },
            'Span export failed, batch requeued'
          );
          this.retryQueue = [batch, ...untried, ...this.retryQueue];
        }

        // Collector is likely unavailable; leave the rest for the next flush
        return;
      }
    }
  }

  private notifyExportFailure(err: unknown): void {
    try {
      this.onExportFailure?.(err);
    } catch (hookErr) {
      logger.warn({ err: hookErr }, 'Export failure hook threw');
    }
  }

  private recordDrop(count: number, reason: DropReason): void {
    try {
      this.onDrop?.(count, reason);
    } catch (err) {
      logger.warn({ err }, 'Drop hook threw');
    }
  }

  /**
   * Probe the collector through the exporter, when it supports probing
   */
  async isCollectorHealthy(): Promise<boolean> {
    if (this.exporter.probe) {
      return this.exporter.probe();
    }
    return this.lastExportSucceeded !== false;
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }

    // Each failed pass spends one attempt, so this ends once every batch is
    // exported or dropped
    while (this.pendingCount > 0) {
      await this.forceFlush();
    }

    if (this.exporter.shutdown) {
      await this.exporter.shutdown();
    }
  }
}
