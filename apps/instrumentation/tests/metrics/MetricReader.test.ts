import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Pushgateway } from 'prom-client';
import { MetricReader, PushgatewaySink } from '../../src/metrics/MetricReader.js';
import type { MetricExportSink } from '../../src/metrics/MetricReader.js';
import { MetricRegistry } from '../../src/metrics/MetricRegistry.js';
import type { MetricSnapshot } from '../../src/metrics/MetricRegistry.js';

function createSink() {
  const exportFn = vi.fn(async (_snapshot: MetricSnapshot) => {});
  const sink: MetricExportSink = { export: exportFn };
  return { sink, exportFn };
}

describe('MetricReader', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should hand a snapshot to the sink', async () => {
    const metrics = new MetricRegistry();
    metrics.getOrCreate('orders').published.inc();
    const { sink, exportFn } = createSink();
    const reader = new MetricReader(metrics, sink);

    await reader.collect();

    const snapshot = exportFn.mock.calls[0][0];
    expect(snapshot.map((family) => family.name)).toContain('hops_messaging_published_total');
    expect(reader.getStatus()).toEqual({ running: false, exportCount: 1, failureCount: 0 });
  });

  it('should count failed exports without throwing', async () => {
    const { sink, exportFn } = createSink();
    exportFn.mockRejectedValue(new Error('gateway down'));
    const reader = new MetricReader(new MetricRegistry(), sink);

    await expect(reader.collect()).resolves.toBeUndefined();

    expect(reader.getStatus().failureCount).toBe(1);
    expect(reader.getStatus().exportCount).toBe(0);
  });

  it('should export on the interval', async () => {
    const { sink, exportFn } = createSink();
    const reader = new MetricReader(new MetricRegistry(), sink, { exportIntervalMs: 15000 });

    reader.start();
    reader.start();
    await vi.advanceTimersByTimeAsync(15000);
    expect(exportFn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(15000);
    expect(exportFn).toHaveBeenCalledTimes(2);
    expect(reader.getStatus().running).toBe(true);

    await reader.shutdown();
  });

  it('should skip a tick while the previous export is still running', async () => {
    let release: () => void = () => {};
    const { sink, exportFn } = createSink();
    exportFn.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const reader = new MetricReader(new MetricRegistry(), sink, { exportIntervalMs: 1000 });

    reader.start();
    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(exportFn).toHaveBeenCalledTimes(1);

    release();
    await vi.advanceTimersByTimeAsync(1000);
    expect(exportFn).toHaveBeenCalledTimes(2);

    await reader.shutdown();
  });

  it('should export once more and stop on shutdown', async () => {
    const { sink, exportFn } = createSink();
    const reader = new MetricReader(new MetricRegistry(), sink, { exportIntervalMs: 1000 });
    reader.start();

    await reader.shutdown();
    expect(exportFn).toHaveBeenCalledTimes(1);
    expect(reader.getStatus().running).toBe(false);

    await vi.advanceTimersByTimeAsync(5000);
    expect(exportFn).toHaveBeenCalledTimes(1);
  });
});

describe('PushgatewaySink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should push the registry under the job name', async () => {
    const pushAdd = vi.spyOn(Pushgateway.prototype, 'pushAdd').mockResolvedValue({});
    const sink = new PushgatewaySink('http://pushgateway:9091', 'orders-api', new MetricRegistry());

    await sink.export([]);

    expect(pushAdd).toHaveBeenCalledWith({ jobName: 'orders-api' });
  });

  it('should push without building a snapshot on each tick', async () => {
    const pushAdd = vi.spyOn(Pushgateway.prototype, 'pushAdd').mockResolvedValue({});
    const metrics = new MetricRegistry();
    const snapshot = vi.spyOn(metrics, 'snapshot');
    const reader = new MetricReader(metrics, new PushgatewaySink('http://pushgateway:9091', 'orders-api', metrics));

    await reader.collect();

    expect(snapshot).not.toHaveBeenCalled();
    expect(pushAdd).toHaveBeenCalledTimes(1);
    expect(reader.getStatus().exportCount).toBe(1);
  });
});
