// Public API — explicit named exports only (no re-export *)

export type { TextInference } from './services/textInference.js';
export type {
  ModelBackend,
  Tokenizer,
  CausalLanguageModel,
  EncodeOptions,
  DecodeOptions,
  GenerateOptions,
} from './backends/modelBackend.js';
export type { AppConfig, LogLevel } from './types/config.types.js';
export type {
  GenerateRequest,
  GenerateResponse,
  EncodeRequest,
  EncodeResponse,
  DecodeRequest,
  DecodeResponse,
  HealthResponse,
} from './api/schemas.js';
export type { ErrorBody, ErrorResponse } from './api/errorMapper.js';
export type { FieldViolation } from './errors/validation.js';

export { InferenceService } from './services/inferenceService.js';
export { SerialQueue } from './services/serialQueue.js';
export { TransformersBackend } from './backends/transformersBackend.js';
export { LLMError } from './errors/base.js';
export { ModelLoadError, TokenizationError, GenerationError } from './errors/inference.js';
export { RequestValidationError } from './errors/validation.js';
export { createApiServer } from './api/server.js';
export { mapErrorToResponse } from './api/errorMapper.js';
export { REQUEST_ID_HEADER } from './api/requestTracer.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { createLogger } from './logging/logger.js';
export { loadRuntime } from './runtime.js';
