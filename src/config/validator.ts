import { LOG_LEVELS, type AppConfig, type LogLevel } from '../types/config.types.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function validateConfig(config: AppConfig): void {
  if (config.model.id.trim() === '') {
    throw new ConfigValidationError('model.id must not be empty. Set MODEL_NAME or provide it in config.');
  }

  const { port } = config.api;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigValidationError(`API port must be between 1 and 65535, got ${port}.`);
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigValidationError(
      `logLevel must be one of ${LOG_LEVELS.join(', ')}, got "${String(config.logLevel)}".`,
    );
  }
}
