/**
 * Application error hierarchy.
 * AppError subclasses carry an HTTP status and a machine-readable code;
 * the error handler middleware turns them into structured JSON responses.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed request, query over its length budget, bad parameter. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

/** The caller named a domain that is not currently registered. */
export class UnknownDomainError extends AppError {
  constructor(readonly domainIds: string[]) {
    super(
      'UNKNOWN_DOMAIN',
      `Unknown domain${domainIds.length === 1 ? '' : 's'}: ${domainIds.join(', ')}`,
      400,
      { domains: domainIds }
    );
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

/** The registry has never been loaded, so no routing decision is possible. */
export class RegistryUnavailableError extends AppError {
  constructor(message = 'Domain registry is not available') {
    super('REGISTRY_UNAVAILABLE', message, 503);
  }
}

export type FusionStage =
  | 'collect'
  | 'normalize'
  | 'deduplicate'
  | 'resolve-conflicts'
  | 'rank'
  | 'synthesize';

/**
 * An invariant violation inside the fusion pipeline.
 * The only error class that fails a query outright.
 */
export class FusionPipelineError extends AppError {
  constructor(
    readonly stage: FusionStage,
    message: string,
    details?: Record<string, unknown>
  ) {
    super('FUSION_FAILED', `Fusion failed at ${stage}: ${message}`, 500, {
      stage,
      ...details,
    });
  }
}

export type AgentCallFailure = 'transport' | 'status' | 'malformed';

/** A recall call that did not produce a usable response. Always becomes a coverage gap. */
export class AgentCallError extends Error {
  constructor(
    readonly failure: AgentCallFailure,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'AgentCallError';
  }
}

/** Invalid startup configuration. Never reaches HTTP. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
