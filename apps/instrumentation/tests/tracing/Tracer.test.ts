import { describe, it, expect, vi } from 'vitest';
import { Tracer, TraceIdRatioSampler, ConsoleSpanProcessor } from '../../src/tracing/Tracer.js';
import type { SpanProcessor } from '../../src/tracing/Tracer.js';
import { SpanKind, SpanStatus, AttributeKeys } from '../../src/tracing/types.js';
import { INVALID_TRACE_CONTEXT, runWithTraceContext, getCurrentTraceContext } from '../../src/tracing/TraceContext.js';
import { InMemorySpanProcessor, SPAN_ID, TRACE_ID } from '../helpers.js';

function tracerWithProcessor(config: ConstructorParameters<typeof Tracer>[0] = {}) {
  const tracer = new Tracer({ serviceName: 'orders-api', ...config });
  const processor = new InMemorySpanProcessor();
  tracer.addProcessor(processor);
  return { tracer, processor };
}

describe('Tracer', () => {
  describe('constructor', () => {
    it('should initialize with default config', () => {
      const config = new Tracer().getConfig();

      expect(config.serviceName).toBe('unnamed-service');
      expect(config.enabled).toBe(true);
      expect(config.samplingRate).toBe(1.0);
    });

    it('should merge custom config', () => {
      const config = new Tracer({ serviceName: 'custom-service', samplingRate: 0.5 }).getConfig();

      expect(config.serviceName).toBe('custom-service');
      expect(config.samplingRate).toBe(0.5);
      expect(config.maxExportBatchSize).toBe(512);
    });

    it('should accept a console processor when logSpans is true', () => {
      const tracer = new Tracer({ logSpans: true });

      expect(() => tracer.startSpan('test').end()).not.toThrow();
    });
  });

  describe('startSpan', () => {
    it('should add resource attributes', () => {
      const tracer = new Tracer({ serviceName: 'test-service', serviceVersion: '2.0.0', environment: 'test' });

      const data = tracer.startSpan('test').getData();

      expect(data.attributes[AttributeKeys.SERVICE_NAME]).toBe('test-service');
      expect(data.attributes[AttributeKeys.SERVICE_VERSION]).toBe('2.0.0');
      expect(data.attributes[AttributeKeys.DEPLOYMENT_ENVIRONMENT]).toBe('test');
    });

    it('should notify processors on start and end', () => {
      const { tracer, processor } = tracerWithProcessor();

      const span = tracer.startSpan('op', { kind: SpanKind.PRODUCER });
      tracer.endSpan(span, SpanStatus.OK);

      expect(processor.started).toHaveLength(1);
      expect(processor.ended).toHaveLength(1);
      expect(processor.ended[0].kind).toBe(SpanKind.PRODUCER);
      expect(processor.ended[0].status).toBe(SpanStatus.OK);
    });

    it('should parent on the active context', () => {
      const { tracer } = tracerWithProcessor();

      const [outer, inner] = tracer.startActiveSpan('outer', (span) => [span, tracer.startSpan('inner')]);

      expect(inner.context.traceId).toBe(outer.context.traceId);
      expect(inner.context.parentSpanId).toBe(outer.context.spanId);
    });

    it('should continue an explicit sampled parent', () => {
      const { tracer } = tracerWithProcessor();

      const span = tracer.startSpan('child', {
        parentContext: { traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 1 },
      });

      expect(span.context.traceId).toBe(TRACE_ID);
      expect(span.context.parentSpanId).toBe(SPAN_ID);
      expect(span.isRecording).toBe(true);
    });

    it('should start a new trace below an unsampled parent', () => {
      const { tracer } = tracerWithProcessor();

      const span = tracer.startSpan('child', {
        parentContext: { traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 0 },
      });

      expect(span.context.traceId).not.toBe(TRACE_ID);
      expect(span.context.parentSpanId).toBeUndefined();
      expect(span.isRecording).toBe(true);
    });

    it('should start a root span for the invalid context, ignoring the active one', () => {
      const { tracer } = tracerWithProcessor();
      const active = { traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 1 };

      const span = runWithTraceContext(active, () =>
        tracer.startSpan('root', { parentContext: INVALID_TRACE_CONTEXT })
      );

      expect(span.context.traceId).not.toBe(TRACE_ID);
      expect(span.context.parentSpanId).toBeUndefined();
    });

    it('should give unsampled spans a real context without recording them', () => {
      const { tracer, processor } = tracerWithProcessor({ samplingRate: 0 });

      const span = tracer.startSpan('dropped');
      tracer.endSpan(span, SpanStatus.OK);

      expect(span.context.traceId).toMatch(/^[0-9a-f]{32}$/);
      expect(span.isRecording).toBe(false);
      expect(processor.started).toHaveLength(0);
      expect(processor.ended).toHaveLength(0);
    });

    it('should record nothing when disabled', () => {
      const { tracer, processor } = tracerWithProcessor({ enabled: false });

      tracer.endSpan(tracer.startSpan('op'));

      expect(processor.ended).toHaveLength(0);
    });

    it('should survive a failing processor', () => {
      const { tracer, processor } = tracerWithProcessor();
      const failing: SpanProcessor = {
        onStart: () => {
          throw new Error('start hook');
        },
        onEnd: () => {
          throw new Error('end hook');
        },
        forceFlush: async () => {},
        shutdown: async () => {},
      };
      tracer.addProcessor(failing);

      expect(() => tracer.endSpan(tracer.startSpan('op'), SpanStatus.OK)).not.toThrow();
      expect(processor.ended).toHaveLength(1);
    });

    it('should leave the trace unsampled when the sampler throws', () => {
      const tracer = new Tracer({ serviceName: 'orders-api' }, {
        shouldSample: () => {
          throw new Error('sampler bug');
        },
      });
      const processor = new InMemorySpanProcessor();
      tracer.addProcessor(processor);

      const span = tracer.startSpan('op');
      tracer.endSpan(span, SpanStatus.OK);

      expect(span.context.traceId).toMatch(/^[0-9a-f]{32}$/);
      expect(span.context.traceFlags).toBe(0);
      expect(processor.ended).toHaveLength(0);
    });
  });

  describe('endSpan', () => {
    it('should record the exception with ERROR status', () => {
      const { tracer, processor } = tracerWithProcessor();

      tracer.endSpan(tracer.startSpan('op'), SpanStatus.ERROR, new Error('broker down'));

      expect(processor.ended[0].status).toBe(SpanStatus.ERROR);
      expect(processor.ended[0].statusMessage).toBe('broker down');
      expect(processor.ended[0].events[0].name).toBe('exception');
    });

    it('should keep a status set before ending', () => {
      const { tracer, processor } = tracerWithProcessor();
      const span = tracer.startSpan('op');
      span.setError('HTTP 503');

      tracer.endSpan(span);

      expect(processor.ended[0].status).toBe(SpanStatus.ERROR);
    });
  });

  describe('startActiveSpan', () => {
    it('should run the callback inside the span', () => {
      const { tracer, processor } = tracerWithProcessor();

      const seen = tracer.startActiveSpan('op', (span) => getCurrentTraceContext() === span.context);

      expect(seen).toBe(true);
      expect(processor.ended[0].status).toBe(SpanStatus.OK);
    });

    it('should end the span ERROR and rethrow on failure', async () => {
      const { tracer, processor } = tracerWithProcessor();
      const error = new Error('reserve failed');

      await expect(
        tracer.startActiveSpanAsync('reserve', async () => {
          throw error;
        })
      ).rejects.toBe(error);

      expect(processor.byName('reserve')?.status).toBe(SpanStatus.ERROR);
    });
  });

  describe('lifecycle', () => {
    it('should flush and shut down every processor', async () => {
      const tracer = new Tracer();
      const processor = new InMemorySpanProcessor();
      const flush = vi.spyOn(processor, 'forceFlush');
      const shutdown = vi.spyOn(processor, 'shutdown');
      tracer.addProcessor(processor);

      await tracer.forceFlush();
      await tracer.shutdown();

      expect(flush).toHaveBeenCalledTimes(1);
      expect(shutdown).toHaveBeenCalledTimes(1);
    });

    it('should not reject when a processor fails to shut down', async () => {
      const tracer = new Tracer();
      const processor = new ConsoleSpanProcessor();
      vi.spyOn(processor, 'shutdown').mockRejectedValue(new Error('stuck'));
      tracer.addProcessor(processor);

      await expect(tracer.shutdown()).resolves.toBeUndefined();
    });
  });

  it('should create valid root contexts', () => {
    const context = new Tracer().createRootContext();

    expect(context.traceId).toMatch(/^[0-9a-f]{32}$/);
    expect(context.parentSpanId).toBeUndefined();
  });
});

describe('TraceIdRatioSampler', () => {
  it('should decide on the low 32 bits of the trace id', () => {
    const sampler = new TraceIdRatioSampler(0.5);

    expect(sampler.shouldSample(`${'a'.repeat(24)}00000000`)).toBe(true);
    expect(sampler.shouldSample(`${'a'.repeat(24)}7fffffff`)).toBe(true);
    expect(sampler.shouldSample(`${'a'.repeat(24)}80000000`)).toBe(false);
    expect(sampler.shouldSample(`${'a'.repeat(24)}ffffffff`)).toBe(false);
  });

  it('should be deterministic for the same trace id', () => {
    const sampler = new TraceIdRatioSampler(0.3);

    expect(sampler.shouldSample(TRACE_ID)).toBe(sampler.shouldSample(TRACE_ID));
  });

  it('should clamp the ratio', () => {
    expect(new TraceIdRatioSampler(2).shouldSample(`${'f'.repeat(32)}`)).toBe(true);
    expect(new TraceIdRatioSampler(-1).shouldSample(`${'0'.repeat(31)}1`)).toBe(false);
    expect(new TraceIdRatioSampler(Number.NaN).shouldSample(TRACE_ID)).toBe(false);
  });
});
