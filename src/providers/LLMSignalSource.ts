/**
 * Generative signal source.
 * Asks an OpenAI chat model to score every domain and to propose a
 * domain-specific rewrite of the query. The model answers in JSON.
 * Scores are passed through as returned; range checking happens in routing.
 */

import OpenAI from 'openai';
import type { ClassificationResult, DomainDescriptor, DomainSignal } from '../types/models.js';
import type { ClassifyOptions, IDomainSignalSource } from './IDomainSignalSource.js';
import { isFiniteNumber, isNonEmptyString, isRecord, isStringArray } from '../utils/guards.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

const SYSTEM_PROMPT = `You route questions to knowledge domains.
For every domain listed, return a relevance score between 0 and 1 and the query words that support it.
When a domain would be better served by different wording, return a rewritten query for that domain.
Respond with JSON only:
{"signals":[{"domain_id":"...","score":0.0,"keywords":["..."]}],"rewrites":{"<domain_id>":"..."}}`;

export class LLMSignalSource implements IDomainSignalSource {
  readonly name = 'llm';

  private client: OpenAI;
  private model: string;

  constructor(opts?: { apiKey?: string; model?: string; client?: OpenAI }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
  }

  async classify(
    queryText: string,
    domains: DomainDescriptor[],
    options?: ClassifyOptions
  ): Promise<ClassificationResult> {
    if (domains.length === 0) return { signals: [], rewrites: {} };

    const domainList = domains
      .map((d) => `- ${d.domainId}: ${d.name}. ${d.description}`)
      .join('\n');

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `Domains:\n${domainList}\n\nQuery: ${queryText}` },
        ],
      },
      { signal: options?.signal }
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Classifier returned an empty completion');
    }

    return parseClassification(JSON.parse(content));
  }
}

export function parseClassification(raw: unknown): ClassificationResult {
  if (!isRecord(raw) || !Array.isArray(raw.signals)) {
    throw new Error('Classifier response is missing a signals array');
  }

  const signals: DomainSignal[] = [];
  for (const entry of raw.signals) {
    if (!isRecord(entry) || !isNonEmptyString(entry.domain_id) || !isFiniteNumber(entry.score)) {
      throw new Error(`Malformed classifier signal: ${JSON.stringify(entry)}`);
    }
    signals.push({
      domainId: entry.domain_id,
      score: entry.score,
      keywords: isStringArray(entry.keywords) ? entry.keywords : [],
    });
  }

  const rewrites: Record<string, string> = {};
  if (isRecord(raw.rewrites)) {
    for (const [domainId, text] of Object.entries(raw.rewrites)) {
      if (typeof text === 'string') rewrites[domainId] = text;
    }
  }

  return { signals, rewrites };
}
