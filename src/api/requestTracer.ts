import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import type { FastifyInstance } from 'fastify';
import { isUnclassifiedError } from './errorMapper.js';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Reuse the caller's request id verbatim when one is supplied, otherwise mint
 * a UUID. Used as Fastify's `genReqId`, so the result becomes `request.id`.
 */
export function resolveRequestId(headers: IncomingHttpHeaders): string {
  const raw = headers[REQUEST_ID_HEADER];
  const supplied = Array.isArray(raw) ? raw.find((value) => value !== '') : raw;
  return supplied ? supplied : randomUUID();
}

export function pathOf(url: string): string {
  return url.split('?', 1)[0] ?? url;
}

/**
 * Logs the lifecycle of every request and stamps its id on the response.
 * The header is set before dispatch so error replies carry it as well.
 */
export function registerRequestTracer(app: FastifyInstance): void {
  app.addHook('onRequest', async (request, reply) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    request.log.info({ method: request.method, path: pathOf(request.url) }, 'request_started');
  });

  app.addHook('onError', async (request, _reply, error) => {
    if (isUnclassifiedError(error)) {
      request.log.error(
        { method: request.method, path: pathOf(request.url), err: error },
        'request_failed',
      );
    }
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        method: request.method,
        path: pathOf(request.url),
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'request_finished',
    );
  });
}
