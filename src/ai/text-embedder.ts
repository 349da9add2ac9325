export interface TextEmbedder {
  readonly modelName: string;
  embed(text: string): Promise<number[]>;
}
