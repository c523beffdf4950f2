export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ModelConfig {
  /** Hugging Face model identifier, resolved by the transformers backend. */
  id: string;
}

export interface ApiConfig {
  port: number;
  host: string;
}

export interface AppConfig {
  model: ModelConfig;
  api: ApiConfig;
  logLevel: LogLevel;
}
