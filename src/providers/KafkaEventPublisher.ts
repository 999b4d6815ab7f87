/**
 * Fire-and-forget Kafka producer for routing feedback events.
 *
 * The producer connects lazily on first publish. Without brokers every
 * publish is a no-op; connection and send failures are logged, never thrown.
 */

import { Kafka, type Producer } from 'kafkajs';
import type { ILogProvider } from './ILogProvider.js';
import type { IEventPublisher, RoutingFeedbackEvent } from './IEventPublisher.js';

export const ROUTING_FEEDBACK_TOPIC = 'query-mesh.routing.feedback';

export interface KafkaEventPublisherOptions {
  brokers: string[];
  clientId?: string;
}

export class KafkaEventPublisher implements IEventPublisher {
  private producer: Producer | null = null;
  private connecting: Promise<Producer | null> | null = null;

  constructor(
    private readonly options: KafkaEventPublisherOptions,
    private readonly logger: ILogProvider
  ) {}

  async publish(event: RoutingFeedbackEvent): Promise<void> {
    try {
      const producer = await this.ensureConnected();
      if (!producer) return;

      await producer.send({
        topic: ROUTING_FEEDBACK_TOPIC,
        messages: [
          {
            key: event.queryId,
            value: JSON.stringify({
              event_id: event.eventId,
              query_id: event.queryId,
              trace_id: event.traceId,
              routing_mode: event.routingMode,
              queried_domains: event.queriedDomains,
              contributing_domains: event.contributingDomains,
              gap_domains: event.gapDomains,
              emitted_at: event.emittedAt.toISOString(),
            }),
          },
        ],
      });
    } catch (err) {
      this.logger.warn('Failed to publish routing feedback', {
        queryId: event.queryId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async disconnect(): Promise<void> {
    const producer = this.producer;
    this.producer = null;
    this.connecting = null;
    if (!producer) return;
    try {
      await producer.disconnect();
    } catch (err) {
      this.logger.warn('Kafka disconnect failed', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private ensureConnected(): Promise<Producer | null> {
    if (this.producer) return Promise.resolve(this.producer);
    if (this.options.brokers.length === 0) return Promise.resolve(null);
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<Producer | null> {
    const kafka = new Kafka({
      brokers: this.options.brokers,
      clientId: this.options.clientId ?? 'query-mesh-router',
      connectionTimeout: 3000,
      requestTimeout: 5000,
    });
    const producer = kafka.producer({ allowAutoTopicCreation: true });
    try {
      await producer.connect();
    } catch (err) {
      this.logger.warn('Failed to connect to Kafka; routing feedback skipped', {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
    this.producer = producer;
    return producer;
  }
}
