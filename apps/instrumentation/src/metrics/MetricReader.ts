/**
 * Periodic Metric Reader
 *
 * Takes a snapshot of the registry on a fixed cadence and hands it to a sink,
 * off the hot path. Export failures are logged and the next tick tries again.
 */

import pino from 'pino';
import { Pushgateway } from 'prom-client';
import type { PrometheusContentType } from 'prom-client';
import type { MetricRegistry, MetricSnapshot } from './MetricRegistry.js';

const logger = pino({ name: 'hops:metric-reader' });

/**
 * Destination for metric snapshots
 */
export interface MetricExportSink {
  /** False when the sink reads the registry itself and ignores the snapshot */
  readonly needsSnapshot?: boolean;
  export(snapshot: MetricSnapshot): Promise<void>;
}

/**
 * Pushes the registry to a Prometheus Pushgateway under one job name
 */
export class PushgatewaySink implements MetricExportSink {
  readonly needsSnapshot = false;
  private readonly gateway: Pushgateway<PrometheusContentType>;

  constructor(
    url: string,
    private readonly jobName: string,
    metrics: MetricRegistry
  ) {
    this.gateway = new Pushgateway(url, {}, metrics.registry);
  }

  async export(_snapshot: MetricSnapshot): Promise<void> {
    await this.gateway.pushAdd({ jobName: this.jobName });
  }
}

export interface MetricReaderOptions {
  exportIntervalMs?: number;
}

export class MetricReader {
  private timer: ReturnType<typeof setInterval> | null = null;
  private exporting: Promise<void> | null = null;
  private readonly exportIntervalMs: number;
  private exportCount = 0;
  private failureCount = 0;

  constructor(
    private readonly metrics: MetricRegistry,
    private readonly sink: MetricExportSink,
    options: MetricReaderOptions = {}
  ) {
    this.exportIntervalMs = options.exportIntervalMs ?? 15000;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      // A slow sink must not pile up overlapping exports
      if (this.exporting) {
        return;
      }
      this.collect().catch((err: unknown) => {
        logger.warn({ err }, 'Metric export tick failed');
      });
    }, this.exportIntervalMs);

    this.timer.unref();
  }

  /**
   * Snapshot and export once
   */
  async collect(): Promise<void> {
    const run = async (): Promise<void> => {
      try {
        const snapshot = this.sink.needsSnapshot === false ? [] : await this.metrics.snapshot();
        await this.sink.export(snapshot);
        this.exportCount++;
        logger.debug({ families: snapshot.length, sink: this.sink.constructor.name }, 'Exported metrics');
      } catch (err) {
        this.failureCount++;
        logger.warn({ err }, 'Failed to export metrics');
      }
    };

    this.exporting = run().finally(() => {
      this.exporting = null;
    });
    return this.exporting;
  }

  getStatus(): { running: boolean; exportCount: number; failureCount: number } {
    return {
      running: this.timer !== null,
      exportCount: this.exportCount,
      failureCount: this.failureCount,
    };
  }

  /**
   * Stop the schedule and export one final snapshot
   */
  async shutdown(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.exporting) {
      await this.exporting;
    }
    await this.collect();
  }
}
