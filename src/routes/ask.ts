import type { FastifyInstance } from 'fastify';
import { AskQuerySchema } from '../schemas/completion.js';
import { AskService } from '../services/ask-service.js';
import { CompletionError } from '../errors.js';
import { logger } from '../middleware/logger.js';

export const MISSING_QUERY_MESSAGE = "Please provide a query with the 'q' parameter. Example: /?q=Hello";

const TEXT_PLAIN = 'text/plain; charset=utf-8';

export async function askRoutes(fastify: FastifyInstance, askService: AskService) {
  fastify.get('/', async (request, reply) => {
    const parsed = AskQuerySchema.safeParse(request.query);
    const query = parsed.success ? parsed.data.q : undefined;

    if (!query) {
      return reply.code(400).type(TEXT_PLAIN).send(MISSING_QUERY_MESSAGE);
    }

    logger.info({ requestId: request.id, query }, 'Received query');

    // Abort the upstream call if the caller goes away before we answer.
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    };
    reply.raw.once('close', onClose);

    try {
      const answer = await askService.ask(query, {
        requestId: request.id,
        signal: controller.signal,
      });

      logger.info({ requestId: request.id, answer }, 'Answered query');
      return reply.code(200).type(TEXT_PLAIN).send(answer);
    } catch (error) {
      if (error instanceof CompletionError) {
        logger.info({ requestId: request.id, kind: error.kind }, 'Query failed');
        return reply.code(500).type(TEXT_PLAIN).send(error.publicMessage);
      }
      throw error;
    } finally {
      reply.raw.off('close', onClose);
    }
  });
}
