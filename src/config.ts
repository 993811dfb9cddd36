import { z } from 'zod';
import { ConfigError } from './errors.js';

const EnvSchema = z.object({
  CHUTES_API_TOKEN: z
    .string({ required_error: 'CHUTES_API_TOKEN environment variable is not set.' })
    .min(1, 'CHUTES_API_TOKEN environment variable is not set.'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  UPSTREAM_BASE_URL: z.string().url().default('https://llm.chutes.ai/v1'),
  UPSTREAM_MODEL: z.string().min(1).default('deepseek-ai/DeepSeek-R1'),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface UpstreamConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  upstream: UpstreamConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue =>
        issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    upstream: {
      apiKey: parsed.CHUTES_API_TOKEN,
      baseURL: parsed.UPSTREAM_BASE_URL,
      model: parsed.UPSTREAM_MODEL,
      timeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
    },
  };
}
