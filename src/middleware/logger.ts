import pino from 'pino';

// Starts at info; main() applies the validated LOG_LEVEL once config has loaded.
export const logger = pino({
  level: 'info',
  base: { service: 'askllm-gateway' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
