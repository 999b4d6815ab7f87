/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small (1536 dimensions).
 */

import OpenAI from 'openai';
import type { EmbeddingOptions, IEmbeddingProvider } from './IEmbeddingProvider.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;
/** OpenAI's per-request input limit. */
const MAX_BATCH_SIZE = 2048;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  private model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string, options?: EmbeddingOptions): Promise<number[]> {
    const [embedding] = await this.generateBatch([text], options);
    return embedding;
  }

  async generateBatch(texts: string[], options?: EmbeddingOptions): Promise<number[][]> {
    if (texts.length === 0) return [];

    const out: number[][] = [];
    for (let start = 0; start < texts.length; start += MAX_BATCH_SIZE) {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts.slice(start, start + MAX_BATCH_SIZE),
          dimensions: this.dimensions,
        },
        { signal: options?.signal }
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const d of ordered) {
        out.push(d.embedding);
      }
    }
    return out;
  }
}
