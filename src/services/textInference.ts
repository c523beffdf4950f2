/** What the HTTP layer needs from the model: the three inference operations. */
export interface TextInference {
  generate(prompt: string, maxTokens: number): Promise<string>;
  encode(text: string): Promise<number[]>;
  decode(tokens: readonly number[]): Promise<string>;
}
