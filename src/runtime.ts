import type { DestinationStream, Logger } from 'pino';
import { loadConfig } from './config/loader.js';
import { validateConfig } from './config/validator.js';
import { createLogger } from './logging/logger.js';
import { TransformersBackend } from './backends/transformersBackend.js';
import type { ModelBackend } from './backends/modelBackend.js';
import { InferenceService } from './services/inferenceService.js';
import type { AppConfig } from './types/config.types.js';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  inference: InferenceService;
}

export interface RuntimeOptions {
  /** Model id taking precedence over config files and MODEL_NAME. */
  modelId?: string;
  /** Listen address overrides, validated with the rest of the config. */
  port?: number;
  host?: string;
  destination?: DestinationStream;
  backend?: ModelBackend;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve config, build the root logger and load the model. Rejects with
 * ModelLoadError when the model cannot be loaded; callers must not serve.
 */
export async function loadRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const loaded = loadConfig(options.cwd, options.env);
  const config: AppConfig = {
    ...loaded,
    model: { id: options.modelId ?? loaded.model.id },
    api: {
      port: options.port ?? loaded.api.port,
      host: options.host ?? loaded.api.host,
    },
  };
  validateConfig(config);

  const logger = createLogger(config.logLevel, options.destination);
  const inference = await InferenceService.load({
    modelId: config.model.id,
    backend: options.backend ?? new TransformersBackend(),
    logger,
  });
  return { config, logger, inference };
}
