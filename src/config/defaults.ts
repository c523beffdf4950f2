import type { AppConfig } from '../types/config.types.js';

export const DEFAULT_MODEL_ID = 'Xenova/gpt2';

export const DEFAULT_CONFIG: AppConfig = {
  model: {
    id: DEFAULT_MODEL_ID,
  },
  api: {
    port: 8000,
    host: '0.0.0.0',
  },
  logLevel: 'info',
};
