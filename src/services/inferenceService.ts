import type { Logger } from 'pino';
import type { CausalLanguageModel, ModelBackend, Tokenizer } from '../backends/modelBackend.js';
import { GenerationError, ModelLoadError, TokenizationError } from '../errors/inference.js';
import { SerialQueue } from './serialQueue.js';
import type { TextInference } from './textInference.js';

export interface LoadInferenceServiceOptions {
  modelId: string;
  backend: ModelBackend;
  logger: Logger;
}

/**
 * Owns one loaded tokenizer/model pair for the lifetime of the process.
 *
 * Instances only exist in the ready state: {@link InferenceService.load} either
 * resolves with a usable service or rejects with {@link ModelLoadError}.
 * Every collaborator call is funneled through a single {@link SerialQueue},
 * since the underlying runtime is not safe for concurrent inference.
 *
 * Prompts and token ids are user content and are never logged.
 */
export class InferenceService implements TextInference {
  private readonly queue = new SerialQueue();

  private constructor(
    readonly modelId: string,
    private readonly tokenizer: Tokenizer,
    private readonly model: CausalLanguageModel,
    private readonly logger: Logger,
  ) {}

  static async load(options: LoadInferenceServiceOptions): Promise<InferenceService> {
    const { modelId, backend } = options;
    const logger = options.logger.child({ module: 'inference', modelId });

    logger.info('Loading model');
    let tokenizer: Tokenizer;
    let model: CausalLanguageModel;
    try {
      tokenizer = await backend.loadTokenizer(modelId);
      model = await backend.loadModel(modelId);
    } catch (err) {
      logger.error({ err }, 'Model load failed');
      throw new ModelLoadError(`Failed to load model '${modelId}'`, err);
    }
    logger.info('Model loaded');

    return new InferenceService(modelId, tokenizer, model, logger);
  }

  /**
   * Continue `prompt` by up to `maxTokens` sampled tokens. The result is the
   * decoded full sequence (prompt included) with special tokens removed.
   */
  generate(prompt: string, maxTokens: number): Promise<string> {
    this.logger.debug({ maxTokens, promptLength: prompt.length }, 'Generate called');
    return this.queue.run(async () => {
      try {
        const inputIds = this.tokenizer.encode(prompt, { addSpecialTokens: true });
        const output = await this.model.generate(inputIds, {
          maxNewTokens: maxTokens,
          doSample: true,
        });
        return this.tokenizer.decode(output, { skipSpecialTokens: true });
      } catch (err) {
        throw new GenerationError('Text generation failed', err);
      }
    });
  }

  /** Tokenize without control tokens, so the ids round-trip through {@link decode}. */
  encode(text: string): Promise<number[]> {
    this.logger.debug({ textLength: text.length }, 'Encode called');
    return this.queue.run(() => {
      try {
        return this.tokenizer.encode(text, { addSpecialTokens: false });
      } catch (err) {
        throw new TokenizationError('Failed to encode text', err);
      }
    });
  }

  decode(tokens: readonly number[]): Promise<string> {
    this.logger.debug({ tokenCount: tokens.length }, 'Decode called');
    return this.queue.run(() => {
      try {
        return this.tokenizer.decode(tokens, { skipSpecialTokens: true });
      } catch (err) {
        throw new TokenizationError('Failed to decode tokens', err);
      }
    });
  }
}
