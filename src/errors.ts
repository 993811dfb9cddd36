export type CompletionErrorKind =
  | 'local-encode-failure'
  | 'upstream-unreachable'
  | 'upstream-error'
  | 'malformed-upstream-response';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error.';

const PUBLIC_MESSAGES: Record<CompletionErrorKind, string> = {
  'local-encode-failure': INTERNAL_ERROR_MESSAGE,
  'upstream-unreachable': 'Failed to contact DeepSeek LLM. Please try again later.',
  'upstream-error': 'Error from DeepSeek LLM. Please try again later.',
  'malformed-upstream-response': 'Internal server error: invalid response format from DeepSeek LLM.',
};

export interface CompletionErrorOptions {
  cause?: unknown;
  status?: number;
  upstreamBody?: unknown;
}

/**
 * A failed completion attempt. `message`, `status` and `upstreamBody` are
 * diagnostics for the server log; callers only ever see `publicMessage`.
 */
export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;
  readonly status?: number;
  readonly upstreamBody?: unknown;

  constructor(kind: CompletionErrorKind, message: string, options: CompletionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'CompletionError';
    this.kind = kind;
    this.status = options.status;
    this.upstreamBody = options.upstreamBody;
  }

  get publicMessage(): string {
    return PUBLIC_MESSAGES[this.kind];
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
