import { ChutesProvider } from './chutes.js';

export { ChutesProvider };
export type { CompletionProvider, Completion, CompletionOptions, ProviderResult, Usage } from './base.js';
