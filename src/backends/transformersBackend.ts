import type { CausalLanguageModel, ModelBackend, Tokenizer } from './modelBackend.js';

export const TRANSFORMERS_MODULE = '@xenova/transformers';

interface TransformersTensor {
  readonly dims: number[];
}

interface TransformersTokenizer {
  encode(
    text: string,
    textPair?: string | null,
    options?: { add_special_tokens?: boolean },
  ): number[];
  decode(tokenIds: number[], options?: { skip_special_tokens?: boolean }): string;
}

interface TransformersCausalLM {
  generate(
    inputs: TransformersTensor,
    config: { max_new_tokens: number; do_sample: boolean },
  ): Promise<ArrayLike<ArrayLike<number | bigint>>>;
}

/** The slice of `@xenova/transformers` this backend relies on. */
export interface TransformersModule {
  AutoTokenizer: { from_pretrained(modelId: string): Promise<TransformersTokenizer> };
  AutoModelForCausalLM: { from_pretrained(modelId: string): Promise<TransformersCausalLM> };
  Tensor: new (type: 'int64', data: BigInt64Array, dims: number[]) => TransformersTensor;
}

export type TransformersModuleLoader = () => Promise<TransformersModule>;

async function importTransformers(): Promise<TransformersModule> {
  // Optional peer dependency: resolved at runtime so the package builds without it.
  const specifier: string = TRANSFORMERS_MODULE;
  return (await import(specifier)) as TransformersModule;
}

/**
 * Runs models locally through transformers.js (ONNX weights fetched from the
 * Hugging Face hub on first use and cached afterwards).
 */
export class TransformersBackend implements ModelBackend {
  private module: Promise<TransformersModule> | null = null;

  constructor(private readonly loadModule: TransformersModuleLoader = importTransformers) {}

  async loadTokenizer(modelId: string): Promise<Tokenizer> {
    const { AutoTokenizer } = await this.getModule();
    const tokenizer = await AutoTokenizer.from_pretrained(modelId);
    return {
      encode: (text, { addSpecialTokens }) =>
        tokenizer.encode(text, null, { add_special_tokens: addSpecialTokens }),
      decode: (tokens, { skipSpecialTokens }) =>
        tokenizer.decode([...tokens], { skip_special_tokens: skipSpecialTokens }),
    };
  }

  async loadModel(modelId: string): Promise<CausalLanguageModel> {
    const { AutoModelForCausalLM, Tensor } = await this.getModule();
    const model = await AutoModelForCausalLM.from_pretrained(modelId);
    return {
      generate: async (inputIds, { maxNewTokens, doSample }) => {
        const input = new Tensor(
          'int64',
          BigInt64Array.from(inputIds, (id) => BigInt(id)),
          [1, inputIds.length],
        );
        const output = await model.generate(input, {
          max_new_tokens: maxNewTokens,
          do_sample: doSample,
        });
        const sequence = output[0];
        if (!sequence) {
          throw new Error('Model returned no output sequence');
        }
        return Array.from(sequence, (id) => Number(id));
      },
    };
  }

  private getModule(): Promise<TransformersModule> {
    if (!this.module) {
      this.module = this.loadModule().catch((err: unknown) => {
        this.module = null;
        throw err;
      });
    }
    return this.module;
  }
}
