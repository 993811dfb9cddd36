import { logger } from '../middleware/logger.js';
import {
  trackLLMRequest,
  trackTokens,
  trackCompletionFailure,
  trackEmptyAnswer,
} from '../middleware/metrics.js';
import type { CompletionOptions, CompletionProvider } from '../providers/base.js';

export interface AskOptions extends CompletionOptions {
  requestId?: string;
}

export class AskService {
  private provider: CompletionProvider;

  constructor(provider: CompletionProvider) {
    this.provider = provider;
  }

  /** Resolves with the answer text, or rejects with the provider's CompletionError. */
  async ask(query: string, options: AskOptions = {}): Promise<string> {
    const { requestId, signal } = options;
    const startTime = Date.now();

    const result = await this.provider.complete(query, { signal });
    const durationSeconds = (Date.now() - startTime) / 1000;

    if (!result.success) {
      const { error } = result;
      trackLLMRequest(this.provider.name, this.provider.model, 'error', durationSeconds);
      trackCompletionFailure(error.kind);

      logger.error({
        requestId,
        provider: this.provider.name,
        kind: error.kind,
        status: error.status,
        upstreamBody: error.upstreamBody,
        error: error.message,
      }, 'Completion failed');

      throw error;
    }

    const completion = result.data;
    trackLLMRequest(this.provider.name, completion.model, 'success', durationSeconds);
    trackTokens(
      this.provider.name,
      completion.model,
      completion.usage.promptTokens,
      completion.usage.completionTokens
    );

    if (!completion.generated) {
      trackEmptyAnswer(this.provider.name);
      logger.warn({ requestId, completionId: completion.id }, 'Upstream returned no usable answer');
    }

    logger.debug({
      requestId,
      completionId: completion.id,
      finishReason: completion.finishReason,
      tokens: completion.usage.totalTokens,
      durationSeconds,
    }, 'Completion success');

    return completion.answer;
  }
}
