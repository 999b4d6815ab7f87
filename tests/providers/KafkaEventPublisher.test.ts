import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockConnect, mockDisconnect, mockSend, mockKafka } = vi.hoisted(() => {
  const mockConnect = vi.fn();
  const mockDisconnect = vi.fn();
  const mockSend = vi.fn();
  const mockKafka = vi.fn(function () {
    return {
      producer: vi.fn(() => ({ connect: mockConnect, disconnect: mockDisconnect, send: mockSend })),
    };
  });
  return { mockConnect, mockDisconnect, mockSend, mockKafka };
});

// Mock kafkajs module
vi.mock('kafkajs', () => ({ Kafka: mockKafka }));

import { KafkaEventPublisher, ROUTING_FEEDBACK_TOPIC } from '../../src/providers/KafkaEventPublisher.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { RoutingFeedbackEvent } from '../../src/providers/IEventPublisher.js';
import { NOW } from '../fixtures.js';

const event: RoutingFeedbackEvent = {
  eventId: 'evt-1',
  queryId: 'q-1',
  traceId: 'trace-1',
  routingMode: 'classified',
  queriedDomains: ['code', 'docs'],
  contributingDomains: ['code'],
  gapDomains: ['docs'],
  emittedAt: NOW,
};

describe('KafkaEventPublisher', () => {
  let logger: ConsoleLogProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    mockConnect.mockResolvedValue(undefined);
    mockSend.mockResolvedValue([]);
    mockDisconnect.mockResolvedValue(undefined);
    logger = new ConsoleLogProvider();
  });

  it('does nothing without brokers', async () => {
    const publisher = new KafkaEventPublisher({ brokers: [] }, logger);

    await publisher.publish(event);

    expect(mockKafka).not.toHaveBeenCalled();
    expect(mockSend).not.toHaveBeenCalled();
  });

  it('sends a snake_case message keyed by query id', async () => {
    const publisher = new KafkaEventPublisher({ brokers: ['kafka-1:9092'] }, logger);

    await publisher.publish(event);

    expect(mockSend).toHaveBeenCalledTimes(1);
    const [record] = mockSend.mock.calls[0];
    expect(record.topic).toBe(ROUTING_FEEDBACK_TOPIC);
    expect(record.messages[0].key).toBe('q-1');
    expect(JSON.parse(record.messages[0].value)).toEqual({
      event_id: 'evt-1',
      query_id: 'q-1',
      trace_id: 'trace-1',
      routing_mode: 'classified',
      queried_domains: ['code', 'docs'],
      contributing_domains: ['code'],
      gap_domains: ['docs'],
      emitted_at: '2024-06-01T00:00:00.000Z',
    });
  });

  it('connects once for concurrent publishes', async () => {
    const publisher = new KafkaEventPublisher({ brokers: ['kafka-1:9092'] }, logger);

    await Promise.all([publisher.publish(event), publisher.publish(event)]);

    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockSend).toHaveBeenCalledTimes(2);
  });

  it('logs instead of throwing when the broker is unreachable', async () => {
    mockConnect.mockRejectedValue(new Error('ECONNREFUSED'));
    const publisher = new KafkaEventPublisher({ brokers: ['kafka-1:9092'] }, logger);

    await expect(publisher.publish(event)).resolves.toBeUndefined();

    expect(mockSend).not.toHaveBeenCalled();
    expect(logger.find('Failed to connect to Kafka')[0].fields).toEqual({ error: 'ECONNREFUSED' });
  });

  it('logs instead of throwing when a send fails', async () => {
    mockSend.mockRejectedValue(new Error('leader not available'));
    const publisher = new KafkaEventPublisher({ brokers: ['kafka-1:9092'] }, logger);

    await publisher.publish(event);

    expect(logger.find('Failed to publish routing feedback')[0].fields).toEqual({
      queryId: 'q-1',
      error: 'leader not available',
    });
  });

  it('disconnects the producer', async () => {
    const publisher = new KafkaEventPublisher({ brokers: ['kafka-1:9092'] }, logger);
    await publisher.publish(event);

    await publisher.disconnect();

    expect(mockDisconnect).toHaveBeenCalledTimes(1);
  });
});
