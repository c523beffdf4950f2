import type { FastifyInstance } from 'fastify';
import type { TextInference } from '../../services/textInference.js';
import { GenerateRequestSchema, parseBody, type GenerateResponse } from '../schemas.js';

export function registerGenerateRoute(app: FastifyInstance, inference: TextInference): void {
  app.post<{ Reply: GenerateResponse }>('/generate', async (req, reply) => {
    const { prompt, max_tokens } = parseBody(GenerateRequestSchema, req.body);
    const text = await inference.generate(prompt, max_tokens);
    return reply.send({ text });
  });
}
