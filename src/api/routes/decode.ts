import type { FastifyInstance } from 'fastify';
import type { TextInference } from '../../services/textInference.js';
import { DecodeRequestSchema, parseBody, type DecodeResponse } from '../schemas.js';

export function registerDecodeRoute(app: FastifyInstance, inference: TextInference): void {
  app.post<{ Reply: DecodeResponse }>('/decode', async (req, reply) => {
    const { tokens } = parseBody(DecodeRequestSchema, req.body);
    const text = await inference.decode(tokens);
    return reply.send({ text });
  });
}
