/**
 * Rule-based signal source.
 * Scores each domain by how many of its descriptor keywords appear in the query.
 * A domain saturates at 1.0 once `saturation` keywords match (or all of them, if it has fewer).
 */

import type { ClassificationResult, DomainDescriptor, DomainSignal } from '../types/models.js';
import type { IDomainSignalSource } from './IDomainSignalSource.js';
import { containsPhrase, normalizeText } from '../utils/text.js';

const DEFAULT_SATURATION = 3;

export class KeywordSignalSource implements IDomainSignalSource {
  readonly name = 'keyword';

  constructor(private readonly saturation = DEFAULT_SATURATION) {}

  async classify(queryText: string, domains: DomainDescriptor[]): Promise<ClassificationResult> {
    const haystack = normalizeText(queryText);
    const signals: DomainSignal[] = domains.map((domain) => {
      const matched = domain.keywords.filter((kw) => containsPhrase(haystack, kw));
      const denominator = Math.min(this.saturation, domain.keywords.length);
      const score = denominator === 0 ? 0 : Math.min(1, matched.length / denominator);
      return { domainId: domain.domainId, score, keywords: matched };
    });

    return { signals, rewrites: {} };
  }
}
