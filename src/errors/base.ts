export type LLMErrorCode = 'MODEL_LOAD_FAILED' | 'TOKENIZATION_FAILED' | 'GENERATION_FAILED';

/**
 * Root of the inference error taxonomy. Catch sites that only care that
 * "the model failed" can match on this and still read `code`.
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly code: LLMErrorCode,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
