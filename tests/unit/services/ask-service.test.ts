import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AskService } from '../../../src/services/ask-service.js';
import { CompletionError } from '../../../src/errors.js';
import { getMetrics, register } from '../../../src/middleware/metrics.js';
import { NO_ANSWER_TEXT } from '../../../src/providers/chutes.js';
import type { CompletionProvider, ProviderResult } from '../../../src/providers/base.js';

function stubProvider(result: ProviderResult) {
  const complete = vi.fn<CompletionProvider['complete']>().mockResolvedValue(result);
  const provider: CompletionProvider = { name: 'stub', model: 'stub-model', complete };
  return { provider, complete };
}

describe('AskService', () => {
  beforeEach(() => {
    register.resetMetrics();
  });

  it('returns the answer and passes the signal through', async () => {
    const { provider, complete } = stubProvider({
      success: true,
      data: {
        id: 'cmpl-1',
        model: 'stub-model',
        answer: 'Paris',
        generated: true,
        finishReason: 'stop',
        usage: { promptTokens: 3, completionTokens: 1, totalTokens: 4 },
      },
    });
    const controller = new AbortController();

    const answer = await new AskService(provider).ask('Capital of France?', {
      requestId: 'req-1',
      signal: controller.signal,
    });

    expect(answer).toBe('Paris');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith('Capital of France?', { signal: controller.signal });
  });

  it('records latency and token usage', async () => {
    const { provider } = stubProvider({
      success: true,
      data: {
        id: 'cmpl-1',
        model: 'stub-model',
        answer: 'Paris',
        generated: true,
        finishReason: 'stop',
        usage: { promptTokens: 3, completionTokens: 1, totalTokens: 4 },
      },
    });

    await new AskService(provider).ask('Capital of France?');

    const metrics = await getMetrics();
    expect(metrics).toContain(
      'askllm_provider_latency_seconds_count{provider="stub",model="stub-model",status="success"} 1'
    );
    expect(metrics).toContain('askllm_tokens_total{provider="stub",model="stub-model",type="prompt"} 3');
    expect(metrics).toContain('askllm_tokens_total{provider="stub",model="stub-model",type="completion"} 1');
  });

  it('counts fallback answers', async () => {
    const { provider } = stubProvider({
      success: true,
      data: {
        id: 'cmpl-2',
        model: 'stub-model',
        answer: NO_ANSWER_TEXT,
        generated: false,
        finishReason: null,
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      },
    });

    expect(await new AskService(provider).ask('Hello')).toBe(NO_ANSWER_TEXT);
    expect(await getMetrics()).toContain('askllm_empty_answers_total{provider="stub"} 1');
  });

  it('throws the provider error once, without retrying', async () => {
    const failure = new CompletionError('upstream-error', 'Upstream responded with status 500', { status: 500 });
    const { provider, complete } = stubProvider({ success: false, error: failure });

    await expect(new AskService(provider).ask('Hello')).rejects.toBe(failure);
    expect(complete).toHaveBeenCalledTimes(1);

    const metrics = await getMetrics();
    expect(metrics).toContain('askllm_completion_failures_total{kind="upstream-error"} 1');
    expect(metrics).toContain(
      'askllm_provider_latency_seconds_count{provider="stub",model="stub-model",status="error"} 1'
    );
  });
});
