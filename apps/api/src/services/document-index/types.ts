export interface EmbeddingProvider {
  /** One vector per input text, in input order */
  embedTexts(texts: string[]): Promise<number[][]>;
}

export interface ScoredIndex {
  index: number;
  score: number;
}
