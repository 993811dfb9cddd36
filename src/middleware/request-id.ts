import type { FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

export async function requestIdMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
) {
  const header = request.headers[REQUEST_ID_HEADER];
  const id = typeof header === 'string' && header.length > 0 ? header : randomUUID();
  request.id = id;
  reply.header(REQUEST_ID_HEADER, id);
}
