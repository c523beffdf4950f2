import { LLMError } from './base.js';

/** The model or tokenizer could not be loaded. Fatal at startup. */
export class ModelLoadError extends LLMError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MODEL_LOAD_FAILED', cause);
  }
}

/** Text could not be encoded, or token ids could not be decoded. */
export class TokenizationError extends LLMError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TOKENIZATION_FAILED', cause);
  }
}

export class GenerationError extends LLMError {
  constructor(message: string, cause?: unknown) {
    super(message, 'GENERATION_FAILED', cause);
  }
}
