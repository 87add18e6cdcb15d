import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BatchSpanProcessor } from '../../src/tracing/BatchSpanProcessor.js';
import type { SpanExporter } from '../../src/tracing/BatchSpanProcessor.js';
import { SpanKind, SpanStatus } from '../../src/tracing/types.js';
import type { SpanData } from '../../src/tracing/types.js';
import { createTraceContext } from '../../src/tracing/TraceContext.js';

function spanData(name: string): SpanData {
  return {
    name,
    kind: SpanKind.INTERNAL,
    context: createTraceContext(),
    startTime: 1000,
    endTime: 1010,
    status: SpanStatus.OK,
    attributes: {},
    events: [],
  };
}

function createExporter() {
  const exported: string[][] = [];
  const exportFn = vi.fn(async (spans: ReadonlyArray<Readonly<SpanData>>) => {
    exported.push(spans.map((span) => span.name));
  });
  const exporter: SpanExporter = { export: exportFn };
  return { exporter, exportFn, exported };
}

describe('BatchSpanProcessor', () => {
  const processors: BatchSpanProcessor[] = [];

  function track(processor: BatchSpanProcessor): BatchSpanProcessor {
    processors.push(processor);
    return processor;
  }

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(async () => {
    await Promise.all(processors.splice(0).map((processor) => processor.shutdown()));
    vi.useRealTimers();
  });

  it('should export as soon as a batch fills', async () => {
    const { exporter, exported } = createExporter();
    const processor = track(new BatchSpanProcessor(exporter, { maxExportBatchSize: 2 }));

    processor.onEnd(spanData('a'));
    processor.onEnd(spanData('b'));
    await processor.forceFlush();

    expect(exported).toEqual([['a', 'b']]);
    expect(processor.pendingCount).toBe(0);
  });

  it('should export on the schedule', async () => {
    const { exporter, exported } = createExporter();
    const processor = track(new BatchSpanProcessor(exporter, { exportIntervalMs: 1000 }));

    processor.onEnd(spanData('a'));
    expect(exported).toEqual([]);

    await vi.advanceTimersByTimeAsync(1000);

    expect(exported).toEqual([['a']]);
  });

  it('should split large buffers into batches', async () => {
    const { exporter, exported } = createExporter();
    const processor = track(new BatchSpanProcessor(exporter, { maxExportBatchSize: 2, maxQueueSize: 10 }));

    // Fill past one batch while a flush is already running
    processor.onEnd(spanData('a'));
    processor.onEnd(spanData('b'));
    processor.onEnd(spanData('c'));
    await processor.forceFlush();

    expect(exported).toEqual([['a', 'b'], ['c']]);
  });

  it('should requeue a failed batch ahead of newer spans', async () => {
    const { exporter, exportFn, exported } = createExporter();
    exportFn.mockRejectedValueOnce(new Error('collector down'));
    const onExportFailure = vi.fn();
    const processor = track(new BatchSpanProcessor(exporter, { onExportFailure }));

    processor.onEnd(spanData('a'));
    await processor.forceFlush();

    expect(processor.pendingCount).toBe(1);
    expect(processor.lastExportHealthy).toBe(false);
    expect(onExportFailure).toHaveBeenCalledTimes(1);

    processor.onEnd(spanData('b'));
    await processor.forceFlush();

    expect(exported).toEqual([['a'], ['b']]);
    expect(processor.pendingCount).toBe(0);
    expect(processor.lastExportHealthy).toBe(true);
  });

  it('should drop a batch after the last attempt', async () => {
    const { exporter, exportFn } = createExporter();
    exportFn.mockRejectedValue(new Error('collector down'));
    const onDrop = vi.fn();
    const onExportFailure = vi.fn();
    const processor = track(
      new BatchSpanProcessor(exporter, { maxExportAttempts: 2, onDrop, onExportFailure })
    );

    processor.onEnd(spanData('a'));
    processor.onEnd(spanData('b'));
    await processor.forceFlush();
    expect(onDrop).not.toHaveBeenCalled();

    await processor.forceFlush();

    expect(onDrop).toHaveBeenCalledWith(2, 'export_failed');
    expect(onExportFailure).toHaveBeenCalledTimes(2);
    expect(processor.pendingCount).toBe(0);
  });

  it('should drop new spans when the queue is full', async () => {
    const { exporter, exportFn } = createExporter();
    exportFn.mockRejectedValue(new Error('collector down'));
    const onDrop = vi.fn();
    const processor = track(
      new BatchSpanProcessor(exporter, {
        maxExportBatchSize: 2,
        maxQueueSize: 2,
        maxExportAttempts: 5,
        onDrop,
      })
    );

    processor.onEnd(spanData('a'));
    processor.onEnd(spanData('b'));
    await processor.forceFlush();
    expect(processor.pendingCount).toBe(2);

    processor.onEnd(spanData('c'));

    expect(onDrop).toHaveBeenCalledWith(1, 'queue_full');
    expect(processor.pendingCount).toBe(2);
  });

  it('should not let a throwing drop hook escape', async () => {
    const { exporter, exportFn } = createExporter();
    exportFn.mockRejectedValue(new Error('collector down'));
    const processor = track(
      new BatchSpanProcessor(exporter, {
        maxExportAttempts: 1,
        onDrop: () => {
          throw new Error('hook failed');
        },
      })
    );

    processor.onEnd(spanData('a'));

    await expect(processor.forceFlush()).resolves.toBeUndefined();
  });

  describe('shutdown', () => {
    it('should export what is pending and shut the exporter down', async () => {
      const { exporter, exported } = createExporter();
      const shutdown = vi.fn(async () => {});
      const processor = new BatchSpanProcessor({ ...exporter, shutdown });

      processor.onEnd(spanData('a'));
      await processor.shutdown();

      expect(exported).toEqual([['a']]);
      expect(shutdown).toHaveBeenCalledTimes(1);
    });

    it('should stop once failing batches are dropped', async () => {
      const { exporter, exportFn } = createExporter();
      exportFn.mockRejectedValue(new Error('collector down'));
      const onDrop = vi.fn();
      const processor = new BatchSpanProcessor(exporter, { maxExportAttempts: 3, onDrop });

      processor.onEnd(spanData('a'));
      await processor.shutdown();

      expect(exportFn).toHaveBeenCalledTimes(3);
      expect(onDrop).toHaveBeenCalledWith(1, 'export_failed');
    });

    it('should ignore spans ended after shutdown', async () => {
      const { exporter, exportFn } = createExporter();
      const processor = new BatchSpanProcessor(exporter);
      await processor.shutdown();

      processor.onEnd(spanData('late'));
      await processor.forceFlush();

      expect(exportFn).not.toHaveBeenCalled();
    });
  });

  describe('isCollectorHealthy', () => {
    it('should use the exporter probe', async () => {
      const { exporter } = createExporter();
      const probe = vi.fn(async () => false);
      const processor = track(new BatchSpanProcessor({ ...exporter, probe }));

      await expect(processor.isCollectorHealthy()).resolves.toBe(false);
      expect(probe).toHaveBeenCalledTimes(1);
    });

    it('should fall back to the last export result', async () => {
      const { exporter, exportFn } = createExporter();
      exportFn.mockRejectedValueOnce(new Error('collector down'));
      const processor = track(new BatchSpanProcessor(exporter));

      await expect(processor.isCollectorHealthy()).resolves.toBe(true);

      processor.onEnd(spanData('a'));
      await processor.forceFlush();

      await expect(processor.isCollectorHealthy()).resolves.toBe(false);
    });
  });
});
