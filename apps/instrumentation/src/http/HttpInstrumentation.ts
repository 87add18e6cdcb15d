/**
 * HTTP Instrumentation
 *
 * Client side: a `fetch` wrapper that opens a CLIENT span and injects the
 * context into the outgoing headers. Server side: express middleware that
 * continues the caller's trace in a SERVER span for the rest of the chain.
 */

import { performance } from 'node:perf_hooks';
import pino from 'pino';
import type { Request as ExpressRequest, RequestHandler, Response as ExpressResponse } from 'express';
import type { Carrier } from '../tracing/types.js';
import { AttributeKeys, SpanKind, SpanStatus } from '../tracing/types.js';
import type { Tracer } from '../tracing/Tracer.js';
import type { Span } from '../tracing/Span.js';
import { extract, inject } from '../tracing/Propagation.js';
import { getCurrentBaggage, runWithTraceContext } from '../tracing/TraceContext.js';
import type { MetricRegistry } from '../metrics/MetricRegistry.js';

const logger = pino({ name: 'hops:http' });

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function errorKind(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

/**
 * Resolve the URL and metric destination (origin + path, no query string)
 */
function describeTarget(input: string | URL | Request): { url: string; destination: string } {
  const raw = input instanceof Request ? input.url : input.toString();
  try {
    const parsed = new URL(raw);
    return { url: parsed.toString(), destination: `${parsed.origin}${parsed.pathname}` };
  } catch {
    return { url: raw, destination: raw.split('?')[0] };
  }
}

interface ClientScope {
  span: Span;
  method: string;
  destination: string;
  headers: Headers;
}

export class HttpInstrumentation {
  constructor(
    private readonly tracer: Tracer,
    private readonly metrics: MetricRegistry
  ) {}

  /**
   * Wrap `fetch` so every request carries the active trace context
   */
  createTracedFetch(fetchImpl: FetchLike = fetch): FetchLike {
    return async (input, init) => {
      const scope = this.safely('start client span', () => this.beginClientRequest(input, init));
      if (!scope) {
        return fetchImpl(input, init);
      }
      const { span, method, destination, headers } = scope;

      const startedAt = performance.now();
      let response: Response;
      try {
        response = await span.run(() => fetchImpl(input, { ...init, headers }));
      } catch (error) {
        this.recordOutcome(destination, method, startedAt, errorKind(error));
        this.tracer.endSpan(span, SpanStatus.ERROR, error);
        throw error;
      }

      span.setAttribute(AttributeKeys.HTTP_STATUS_CODE, response.status);
      if (isSuccessStatus(response.status)) {
        this.recordOutcome(destination, method, startedAt);
        this.tracer.endSpan(span, SpanStatus.OK);
      } else {
        this.recordOutcome(destination, method, startedAt, `http_${response.status}`);
        span.setError(`HTTP ${response.status}`);
        this.tracer.endSpan(span);
      }

      return response;
    };
  }

  private beginClientRequest(input: string | URL | Request, init: RequestInit | undefined): ClientScope {
    const request = input instanceof Request ? input : undefined;
    const method = (init?.method ?? request?.method ?? 'GET').toUpperCase();
    const { url, destination } = describeTarget(input);

    const span = this.tracer.startSpan(`HTTP ${method}`, {
      kind: SpanKind.CLIENT,
      attributes: {
        [AttributeKeys.HTTP_METHOD]: method,
        [AttributeKeys.HTTP_URL]: url,
      },
    });

    const headers = new Headers(init?.headers ?? request?.headers);
    this.safely('inject request context', () => {
      const carrier: Carrier = {};
      inject(span.context, getCurrentBaggage(), carrier);
      for (const [key, value] of Object.entries(carrier)) {
        headers.set(key, String(value));
      }
    });

    return { span, method, destination, headers };
  }

  /**
   * Express middleware continuing the caller's trace. Mount it before the
   * routes it should cover.
   */
  tracingMiddleware(): RequestHandler {
    return (req, res, next) => {
      const method = req.method.toUpperCase();
      const scope = this.safely('start server span', () => {
        const { context: parentContext, baggage } = extract(req.headers);
        const span = this.tracer.startSpan(`${method} ${req.path}`, {
          kind: SpanKind.SERVER,
          parentContext,
          attributes: {
            [AttributeKeys.HTTP_METHOD]: method,
            [AttributeKeys.HTTP_URL]: req.originalUrl,
          },
        });
        return { span, baggage };
      });
      if (!scope) {
        next();
        return;
      }
      const { span, baggage } = scope;

      const startedAt = performance.now();
      let finished = false;
      const finish = (): void => {
        if (finished) {
          return;
        }
        finished = true;
        this.finishServerSpan(span, req, res, method, startedAt);
      };

      res.on('finish', finish);
      res.on('close', finish);

      runWithTraceContext(span.context, () => next(), baggage);
    };
  }

  private finishServerSpan(
    span: Span,
    req: ExpressRequest,
    res: ExpressResponse,
    method: string,
    startedAt: number
  ): void {
    const route = routeOf(req);
    span.setAttribute(AttributeKeys.HTTP_ROUTE, route);

    // 'close' without 'finish' means the client went away mid-response
    if (!res.writableFinished) {
      this.recordOutcome(route, method, startedAt, 'aborted');
      span.setError('Connection closed before response completed');
      this.tracer.endSpan(span);
      return;
    }

    span.setAttribute(AttributeKeys.HTTP_STATUS_CODE, res.statusCode);
    if (isSuccessStatus(res.statusCode)) {
      this.recordOutcome(route, method, startedAt);
      this.tracer.endSpan(span, SpanStatus.OK);
    } else {
      this.recordOutcome(route, method, startedAt, `http_${res.statusCode}`);
      span.setError(`HTTP ${res.statusCode}`);
      this.tracer.endSpan(span);
    }
  }

  private recordOutcome(destination: string, method: string, startedAt: number, failure?: string): void {
    this.safely('record http metrics', () => {
      const instruments = this.metrics.getOrCreateHttp(destination, method);
      instruments.duration.observe(performance.now() - startedAt);
      if (failure !== undefined) {
        instruments.recordError(failure);
      }
    });
  }

  private safely<T>(operation: string, fn: () => T): T | undefined {
    try {
      return fn();
    } catch (err) {
      logger.warn({ err, operation }, 'Instrumentation bookkeeping failed');
      return undefined;
    }
  }
}

/**
 * Matched route pattern (`/orders/:id`) when express resolved one, so metric
 * labels stay bounded; the raw path otherwise
 */
function routeOf(req: ExpressRequest): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return req.path;
}
