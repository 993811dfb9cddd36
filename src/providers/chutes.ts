import OpenAI from 'openai';
import { CompletionError } from '../errors.js';
import {
  CompletionRequestSchema,
  CompletionResponseSchema,
  type CompletionRequest,
  type CompletionResponse,
} from '../schemas/completion.js';
import type { UpstreamConfig } from '../config.js';
import type { Completion, CompletionOptions, CompletionProvider, ProviderResult } from './base.js';

export const MAX_TOKENS = 1024;
export const TEMPERATURE = 0.7;
export const NO_ANSWER_TEXT = 'DeepSeek LLM could not generate a response to your query.';

export interface ChutesProviderOptions extends UpstreamConfig {
  /** Replaces the global fetch used by the SDK client. */
  fetch?: typeof fetch;
}

export function buildCompletionRequest(query: string, model: string): CompletionRequest {
  return CompletionRequestSchema.parse({
    model,
    messages: [{ role: 'user', content: query }],
    stream: false,
    max_tokens: MAX_TOKENS,
    temperature: TEMPERATURE,
  });
}

export function extractCompletion(response: CompletionResponse): Completion {
  const first = response.choices[0];
  const content = first?.message.content ?? '';
  const generated = content.length > 0;

  return {
    id: response.id,
    model: response.model,
    answer: generated ? content : NO_ANSWER_TEXT,
    generated,
    finishReason: first?.finish_reason ?? null,
    usage: {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    },
  };
}

/**
 * Chat-completion client for the Chutes OpenAI-compatible endpoint.
 * One attempt per call: the SDK's own retries are disabled.
 */
export class ChutesProvider implements CompletionProvider {
  name = 'chutes';
  readonly model: string;
  private client: OpenAI;
  private timeoutMs: number;

  constructor(options: ChutesProviderOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
      fetch: options.fetch,
    });
  }

  async complete(query: string, options: CompletionOptions = {}): Promise<ProviderResult> {
    let request: CompletionRequest;
    try {
      request = buildCompletionRequest(query, this.model);
    } catch (error) {
      return {
        success: false,
        error: new CompletionError('local-encode-failure', 'Could not encode completion request', { cause: error }),
      };
    }

    // The SDK's own timeout stops at the response headers; this deadline also covers the body.
    const deadline = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([deadline, options.signal]) : deadline;

    let body: unknown;
    try {
      body = await this.client.chat.completions.create(request, { signal });
    } catch (error) {
      return { success: false, error: this.classify(error, deadline, options.signal) };
    }

    const parsed = CompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      return {
        success: false,
        error: new CompletionError(
          'malformed-upstream-response',
          `Unexpected completion response shape: ${parsed.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ')}`,
          { cause: parsed.error, upstreamBody: body }
        ),
      };
    }

    return { success: true, data: extractCompletion(parsed.data) };
  }

  private classify(error: unknown, deadline: AbortSignal, callerSignal?: AbortSignal): CompletionError {
    // An abort can surface as the SDK's abort error or as a raw body-read error, so check the signals first.
    if (callerSignal?.aborted) {
      return new CompletionError('upstream-unreachable', 'Upstream request aborted by caller', { cause: error });
    }
    // Subclasses before APIError: every connection error is also an APIError.
    if (deadline.aborted || error instanceof OpenAI.APIConnectionTimeoutError) {
      return new CompletionError('upstream-unreachable', `Upstream request timed out after ${this.timeoutMs}ms`, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new CompletionError('upstream-unreachable', `Could not reach upstream: ${error.message}`, { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
      return new CompletionError('upstream-error', `Upstream responded with status ${error.status}`, {
        cause: error,
        status: error.status,
        upstreamBody: error.error ?? error.message,
      });
    }
    // The SDK decodes 2xx JSON bodies itself, so a body that is not JSON surfaces here.
    const message = error instanceof Error ? error.message : String(error);
    return new CompletionError('malformed-upstream-response', `Could not decode upstream response: ${message}`, { cause: error });
  }
}
