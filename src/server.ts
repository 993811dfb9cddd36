import Fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { logger } from './middleware/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { opsRoutes } from './routes/ops.js';
import { askRoutes } from './routes/ask.js';
import { ChutesProvider, type CompletionProvider } from './providers/index.js';
import { AskService } from './services/ask-service.js';
import { loadConfig, type AppConfig } from './config.js';
import { ConfigError, INTERNAL_ERROR_MESSAGE } from './errors.js';

export interface BuildServerOptions {
  config: AppConfig;
  /** Defaults to a ChutesProvider built from `config.upstream`. */
  provider?: CompletionProvider;
}

async function buildServer(options: BuildServerOptions) {
  const server = Fastify({
    logger: false,
    disableRequestLogging: true,
  });

  await server.register(cors, { methods: ['GET'] });

  server.setErrorHandler<FastifyError>((error, request, reply) => {
    logger.error({
      requestId: request.id,
      error: error.message,
      stack: error.stack,
    }, 'Request error');

    const status = error.statusCode !== undefined && error.statusCode < 500 ? error.statusCode : 500;
    reply
      .code(status)
      .type('text/plain; charset=utf-8')
      .send(status === 500 ? INTERNAL_ERROR_MESSAGE : error.message);
  });

  server.addHook('onRequest', requestIdMiddleware);
  server.addHook('onRequest', metricsMiddleware);

  await server.register(opsRoutes);

  const provider = options.provider ?? new ChutesProvider(options.config.upstream);
  const askService = new AskService(provider);

  await server.register((instance) => askRoutes(instance, askService));

  return server;
}

async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, err.message);
      process.exit(1);
    }
    throw err;
  }

  logger.level = config.logLevel;

  const server = await buildServer({ config });

  logger.info({
    port: config.port,
    model: config.upstream.model,
    upstream: config.upstream.baseURL,
  }, 'Starting server');

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.error({ error: err }, 'Server failed to start');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err: unknown) => {
    logger.fatal({ error: err }, 'Unhandled startup error');
    process.exit(1);
  });
}

export { buildServer };
