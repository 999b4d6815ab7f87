/**
 * Production container: Supabase registry, HTTP agents, OpenAI and Kafka.
 * Refuses to start without the registry credentials.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { ConfigError } from './errors.js';
import { getSupabaseClient } from './db.js';
import { SupabaseDomainRepository } from './repositories/SupabaseDomainRepository.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { HttpAgentClient } from './providers/HttpAgentClient.js';
import { KafkaEventPublisher } from './providers/KafkaEventPublisher.js';
import { KeywordSignalSource } from './providers/KeywordSignalSource.js';
import { EmbeddingSignalSource } from './providers/EmbeddingSignalSource.js';
import { LLMSignalSource } from './providers/LLMSignalSource.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { OpenAISynthesisProvider } from './providers/OpenAISynthesisProvider.js';
import type { IDomainSignalSource } from './providers/IDomainSignalSource.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';

let cached: Container | null = null;

export function getProductionContainer(config: AppConfig = loadConfig()): Container {
  if (cached) return cached;

  if (!config.supabase) {
    throw new ConfigError(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }
  if (config.classifierBackend !== 'keyword' && !config.openaiApiKey) {
    throw new ConfigError(
      `CLASSIFIER_BACKEND=${config.classifierBackend} requires OPENAI_API_KEY`
    );
  }

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  // Axiom logging: uses AxiomLogProvider when configured, falls back to console.
  const base: ILogProvider = config.axiom
    ? new AxiomLogProvider({
        apiToken: config.axiom.apiToken,
        dataset: config.axiom.dataset,
        minLevel: config.logLevel,
      })
    : new ConsoleLogProvider({
        outputToConsole: true,
        minLevel: config.logLevel,
        bufferEvents: false,
      });
  const logProvider = base.child({ service: 'query-mesh' });

  const embeddingProvider: IEmbeddingProvider | undefined = config.openaiApiKey
    ? new OpenAIEmbeddingProvider({ apiKey: config.openaiApiKey })
    : undefined;

  cached = createContainer({
    domainRepo: new SupabaseDomainRepository(db),
    signalSource: selectSignalSource(config, embeddingProvider),
    agentClient: new HttpAgentClient(),
    eventPublisher: new KafkaEventPublisher({ brokers: config.kafkaBrokers }, logProvider),
    logProvider,
    synthesisProvider: config.openaiApiKey
      ? new OpenAISynthesisProvider({ apiKey: config.openaiApiKey })
      : undefined,
    embeddingProvider,
    config: {
      routing: config.routing,
      fanOut: config.fanOut,
      fusion: config.fusion,
      registryTtlMs: config.registryTtlMs,
    },
  });

  return cached;
}

function selectSignalSource(
  config: AppConfig,
  embeddingProvider: IEmbeddingProvider | undefined
): IDomainSignalSource {
  switch (config.classifierBackend) {
    case 'keyword':
      return new KeywordSignalSource();
    case 'embedding':
      if (!embeddingProvider) {
        throw new ConfigError('CLASSIFIER_BACKEND=embedding requires OPENAI_API_KEY');
      }
      return new EmbeddingSignalSource(embeddingProvider);
    case 'llm':
      return new LLMSignalSource({ apiKey: config.openaiApiKey ?? undefined });
  }
}
