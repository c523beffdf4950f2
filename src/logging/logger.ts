import { pino, type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from '../types/config.types.js';

export const LOGGER_NAME = 'llm-api';

/**
 * Root structured logger. Fastify and the inference service both log through
 * children of this instance, so request ids and module bindings end up on the
 * same JSON lines.
 */
export function createLogger(level: LogLevel = 'info', destination?: DestinationStream): Logger {
  const options = {
    name: LOGGER_NAME,
    level,
    // Request payloads may carry user prompts; keep them out of serialized errors and bindings.
    redact: ['prompt', 'text', 'tokens', 'req.body'],
  };
  return destination ? pino(options, destination) : pino(options);
}
