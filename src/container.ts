/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes Supabase, HTTP and OpenAI implementations
 * (container.production.ts); tests pass in-memory mocks.
 */

import type { IDomainRepository } from './repositories/IDomainRepository.js';
import type { IAgentClient } from './providers/IAgentClient.js';
import type { IDomainSignalSource } from './providers/IDomainSignalSource.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IEventPublisher } from './providers/IEventPublisher.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ISynthesisProvider } from './providers/ISynthesisProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import {
  DEFAULT_FAN_OUT_CONFIG,
  DEFAULT_FUSION_CONFIG,
  DEFAULT_ROUTING_CONFIG,
  type FanOutConfig,
  type FusionConfig,
  type RoutingConfig,
} from './config.js';
import { DomainRegistryCache } from './stores/DomainRegistryCache.js';
import { RoutingService } from './services/RoutingService.js';
import { FanOutService } from './services/FanOutService.js';
import { FusionService } from './services/FusionService.js';
import { QueryService } from './services/QueryService.js';
import { DomainService } from './services/DomainService.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export const DEFAULT_REGISTRY_TTL_MS = 30_000;

export interface ContainerConfig {
  routing: RoutingConfig;
  fanOut: FanOutConfig;
  fusion: FusionConfig;
  registryTtlMs: number;
}

export interface Container {
  config: ContainerConfig;
  registry: DomainRegistryCache;
  routingService: RoutingService;
  fanOutService: FanOutService;
  fusionService: FusionService;
  queryService: QueryService;
  domainService: DomainService;
  eventPublisher: IEventPublisher;
  logProvider: ILogProvider;
  logging: Middleware;
  errors: Middleware;
  clock: () => Date;
  startedAt: Date;
}

export function createContainer(deps: {
  domainRepo: IDomainRepository;
  signalSource: IDomainSignalSource;
  agentClient: IAgentClient;
  eventPublisher: IEventPublisher;
  logProvider: ILogProvider;
  synthesisProvider?: ISynthesisProvider;
  embeddingProvider?: IEmbeddingProvider;
  config?: Partial<ContainerConfig>;
  clock?: () => Date;
}): Container {
  const config: ContainerConfig = {
    routing: deps.config?.routing ?? DEFAULT_ROUTING_CONFIG,
    fanOut: deps.config?.fanOut ?? DEFAULT_FAN_OUT_CONFIG,
    fusion: deps.config?.fusion ?? DEFAULT_FUSION_CONFIG,
    registryTtlMs: deps.config?.registryTtlMs ?? DEFAULT_REGISTRY_TTL_MS,
  };
  const clock = deps.clock ?? (() => new Date());

  const registry = new DomainRegistryCache(deps.domainRepo, deps.logProvider, {
    ttlMs: config.registryTtlMs,
    clock: () => clock().getTime(),
  });
  const routingService = new RoutingService(
    registry,
    deps.signalSource,
    config.routing,
    deps.logProvider,
    clock
  );
  const fanOutService = new FanOutService(deps.agentClient, deps.logProvider);
  const fusionService = new FusionService(
    config.fusion,
    deps.logProvider,
    deps.synthesisProvider ?? null,
    deps.embeddingProvider ?? null,
    clock
  );
  const queryService = new QueryService(
    routingService,
    fanOutService,
    fusionService,
    deps.eventPublisher,
    { fanOut: config.fanOut, synthesis: config.fusion.synthesis },
    deps.logProvider
  );
  const domainService = new DomainService(registry);
  const logging = createLoggingMiddleware(deps.logProvider);
  const errors = createErrorHandler(deps.logProvider);

  return {
    config,
    registry,
    routingService,
    fanOutService,
    fusionService,
    queryService,
    domainService,
    eventPublisher: deps.eventPublisher,
    logProvider: deps.logProvider,
    logging,
    errors,
    clock,
    startedAt: clock(),
  };
}
