import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { TextInference } from '../services/textInference.js';
import { httpErrorResponse, mapErrorToResponse } from './errorMapper.js';
import { pathOf, registerRequestTracer, resolveRequestId } from './requestTracer.js';
import { registerHealthRoute } from './routes/health.js';
import { registerGenerateRoute } from './routes/generate.js';
import { registerEncodeRoute } from './routes/encode.js';
import { registerDecodeRoute } from './routes/decode.js';

export interface ApiServerDeps {
  inference: TextInference;
  logger: FastifyBaseLogger;
}

/**
 * Creates a Fastify server with the health route and the 3 inference routes.
 * Does NOT call listen() — caller must do that (or use server.inject() in tests).
 */
export function createApiServer(deps: ApiServerDeps): FastifyInstance {
  const app = Fastify({
    loggerInstance: deps.logger,
    disableRequestLogging: true,
    requestIdHeader: false,
    requestIdLogLabel: 'requestId',
    genReqId: (req) => resolveRequestId(req.headers),
  });

  // Methods registered per path; lets an unmatched request tell 404 from 405.
  const routeMethods = new Map<string, Set<string>>();
  app.addHook('onRoute', (route) => {
    const methods = routeMethods.get(route.url) ?? new Set<string>();
    for (const method of [route.method].flat()) methods.add(method);
    routeMethods.set(route.url, methods);
  });

  registerRequestTracer(app);

  app.setErrorHandler((error, _request, reply) => {
    const { statusCode, body } = mapErrorToResponse(error);
    return reply.status(statusCode).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    const allowed = routeMethods.get(pathOf(request.url));
    if (allowed !== undefined) {
      reply.header('allow', [...allowed].join(', '));
    }
    const { statusCode, body } = httpErrorResponse(allowed === undefined ? 404 : 405);
    return reply.status(statusCode).send(body);
  });

  registerHealthRoute(app);
  registerGenerateRoute(app, deps.inference);
  registerEncodeRoute(app, deps.inference);
  registerDecodeRoute(app, deps.inference);

  return app;
}
