/**
 * Domain signal source.
 * Given query text and the registered domains, returns a relevance signal per
 * domain and, where the backend supports it, a per-domain rewritten query.
 * One implementation is chosen at startup (rule-based, statistical or generative).
 */

import type { ClassificationResult, DomainDescriptor } from '../types/models.js';

export interface ClassifyOptions {
  /** Aborted when the classification budget runs out. */
  signal?: AbortSignal;
}

export interface IDomainSignalSource {
  readonly name: string;

  classify(
    queryText: string,
    domains: DomainDescriptor[],
    options?: ClassifyOptions
  ): Promise<ClassificationResult>;
}
