/**
 * Statistical signal source.
 * Scores each domain by cosine similarity between the query embedding and an
 * embedding of the domain's descriptor, bounded to [0, 1].
 * Descriptor embeddings are cached until the descriptor text changes.
 */

import type { ClassificationResult, DomainDescriptor } from '../types/models.js';
import type { ClassifyOptions, IDomainSignalSource } from './IDomainSignalSource.js';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import { cosineSimilarity } from '../utils/text.js';

export class EmbeddingSignalSource implements IDomainSignalSource {
  readonly name = 'embedding';

  private descriptorCache = new Map<string, { text: string; embedding: number[] }>();

  constructor(private readonly embeddingProvider: IEmbeddingProvider) {}

  async classify(
    queryText: string,
    domains: DomainDescriptor[],
    options?: ClassifyOptions
  ): Promise<ClassificationResult> {
    if (domains.length === 0) return { signals: [], rewrites: {} };

    const missing = domains.filter((d) => {
      const cached = this.descriptorCache.get(d.domainId);
      return !cached || cached.text !== descriptorText(d);
    });

    const texts = [queryText, ...missing.map(descriptorText)];
    const vectors = await this.embeddingProvider.generateBatch(texts, { signal: options?.signal });
    if (vectors.length !== texts.length) {
      throw new Error(`Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`);
    }
    const [queryEmbedding, ...fresh] = vectors;

    missing.forEach((d, i) => {
      this.descriptorCache.set(d.domainId, { text: descriptorText(d), embedding: fresh[i] });
    });

    const signals = domains.map((d) => {
      const cached = this.descriptorCache.get(d.domainId);
      const similarity = cached ? cosineSimilarity(queryEmbedding, cached.embedding) : 0;
      return { domainId: d.domainId, score: Math.min(1, Math.max(0, similarity)), keywords: [] };
    });

    return { signals, rewrites: {} };
  }
}

function descriptorText(d: DomainDescriptor): string {
  const keywords = d.keywords.length > 0 ? `\nKeywords: ${d.keywords.join(', ')}` : '';
  return `${d.name}: ${d.description}${keywords}`;
}
