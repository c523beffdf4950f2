import type { FastifyInstance } from 'fastify';
import type { TextInference } from '../../services/textInference.js';
import { EncodeRequestSchema, parseBody, type EncodeResponse } from '../schemas.js';

export function registerEncodeRoute(app: FastifyInstance, inference: TextInference): void {
  app.post<{ Reply: EncodeResponse }>('/encode', async (req, reply) => {
    const { text } = parseBody(EncodeRequestSchema, req.body);
    const tokens = await inference.encode(text);
    return reply.send({ tokens });
  });
}
