/**
 * Prometheus metrics for the HTTP surface and the upstream completion calls.
 */

import client from 'prom-client';
import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';
import type { CompletionErrorKind } from '../errors.js';

const register = new client.Registry();

client.collectDefaultMetrics({ register });

const httpRequestDuration = new client.Histogram({
  name: 'askllm_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

const httpRequestTotal = new client.Counter({
  name: 'askllm_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

const providerLatency = new client.Histogram({
  name: 'askllm_provider_latency_seconds',
  help: 'Duration of upstream completion requests in seconds',
  labelNames: ['provider', 'model', 'status'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

const tokensUsed = new client.Counter({
  name: 'askllm_tokens_total',
  help: 'Total tokens reported by the upstream provider',
  labelNames: ['provider', 'model', 'type'],
  registers: [register],
});

const completionFailures = new client.Counter({
  name: 'askllm_completion_failures_total',
  help: 'Failed completion attempts by failure kind',
  labelNames: ['kind'],
  registers: [register],
});

const emptyAnswers = new client.Counter({
  name: 'askllm_empty_answers_total',
  help: 'Successful completions that carried no usable answer text',
  labelNames: ['provider'],
  registers: [register],
});

export function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = Date.now();

  reply.raw.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const labels = {
      method: request.method,
      route: request.routeOptions?.url ?? 'unmatched',
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, duration);
    httpRequestTotal.inc(labels);
  });

  done();
}

export function trackLLMRequest(
  provider: string,
  model: string,
  status: 'success' | 'error',
  durationSeconds: number
): void {
  providerLatency.observe({ provider, model, status }, durationSeconds);
}

export function trackTokens(
  provider: string,
  model: string,
  promptTokens: number,
  completionTokens: number
): void {
  tokensUsed.inc({ provider, model, type: 'prompt' }, promptTokens);
  tokensUsed.inc({ provider, model, type: 'completion' }, completionTokens);
}

export function trackCompletionFailure(kind: CompletionErrorKind): void {
  completionFailures.inc({ kind });
}

export function trackEmptyAnswer(provider: string): void {
  emptyAnswers.inc({ provider });
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export { register };
