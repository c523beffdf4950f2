export interface EncodeOptions {
  /** Insert model control tokens (BOS/EOS and friends) around the text. */
  addSpecialTokens: boolean;
}

export interface DecodeOptions {
  skipSpecialTokens: boolean;
}

export interface GenerateOptions {
  maxNewTokens: number;
  /** Sample from the next-token distribution instead of taking the argmax. */
  doSample: boolean;
}

export interface Tokenizer {
  encode(text: string, options: EncodeOptions): number[];
  decode(tokens: readonly number[], options: DecodeOptions): string;
}

export interface CausalLanguageModel {
  /** Returns the full output sequence: the input ids followed by the new ones. */
  generate(inputIds: readonly number[], options: GenerateOptions): Promise<number[]>;
}

export interface ModelBackend {
  loadTokenizer(modelId: string): Promise<Tokenizer>;
  loadModel(modelId: string): Promise<CausalLanguageModel>;
}
