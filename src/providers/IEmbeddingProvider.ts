/**
 * Embedding provider interface.
 * Used by the statistical classifier and by the semantic-opposition conflict check.
 */

export interface EmbeddingOptions {
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  readonly dimensions: number;

  generate(text: string, options?: EmbeddingOptions): Promise<number[]>;

  /** Embeddings in input order. */
  generateBatch(texts: string[], options?: EmbeddingOptions): Promise<number[][]>;
}
