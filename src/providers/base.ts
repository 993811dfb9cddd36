import type { CompletionError } from '../errors.js';

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Completion {
  id: string;
  model: string;
  answer: string;
  /** False when the upstream gave no usable text and the fallback answer was substituted. */
  generated: boolean;
  finishReason: string | null;
  usage: Usage;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

export type ProviderResult =
  | { success: true; data: Completion }
  | { success: false; error: CompletionError };

export interface CompletionProvider {
  name: string;
  model: string;
  complete(query: string, options?: CompletionOptions): Promise<ProviderResult>;
}
