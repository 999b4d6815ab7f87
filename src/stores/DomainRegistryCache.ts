/**
 * Process-scoped, TTL-cached registry.
 * Explicit lifecycle: initialize() before serving, start()/stop() for the
 * periodic refresh task. The handle is passed to whoever routes; there is
 * no module-level instance.
 *
 * Staleness up to the TTL is accepted. A failed refresh keeps serving the
 * last good snapshot.
 */

import type { IDomainRepository } from '../repositories/IDomainRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { DomainRegistrySnapshot } from './DomainRegistrySnapshot.js';
import { RegistryUnavailableError } from '../errors.js';

export interface DomainRegistryCacheOptions {
  ttlMs: number;
  clock?: () => number;
}

export class DomainRegistryCache {
  private current: DomainRegistrySnapshot | null = null;
  private inflight: Promise<DomainRegistrySnapshot> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly ttlMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly repo: IDomainRepository,
    private readonly logger: ILogProvider,
    options: DomainRegistryCacheOptions
  ) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  /** First load. Throws if the registry cannot be read. */
  async initialize(): Promise<DomainRegistrySnapshot> {
    return this.refresh();
  }

  /** Last loaded snapshot, without refreshing. */
  peek(): DomainRegistrySnapshot | null {
    return this.current;
  }

  /**
   * A snapshot no older than the TTL when the registry is reachable,
   * otherwise the last good one.
   */
  async snapshot(): Promise<DomainRegistrySnapshot> {
    const current = this.current;
    if (current && this.clock() - current.refreshedAt.getTime() < this.ttlMs) {
      return current;
    }

    try {
      return await this.refresh();
    } catch (err) {
      if (current) {
        this.logger.warn('Registry refresh failed; serving stale snapshot', {
          error: err instanceof Error ? err.message : String(err),
          ageMs: this.clock() - current.refreshedAt.getTime(),
        });
        return current;
      }
      throw new RegistryUnavailableError();
    }
  }

  /** Reload from the repository. Concurrent callers share one request. */
  refresh(): Promise<DomainRegistrySnapshot> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.refresh().catch((err: unknown) => {
        this.logger.error('Periodic registry refresh failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }, this.ttlMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async load(): Promise<DomainRegistrySnapshot> {
    const rows = await this.repo.listAgents();
    const snapshot = DomainRegistrySnapshot.fromRows(rows, new Date(this.clock()));
    this.current = snapshot;
    this.logger.debug('Registry refreshed', {
      agents: rows.length,
      routableDomains: snapshot.size,
    });
    return snapshot;
  }
}
