import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { createRouter } from '../src/api/router.js';
import { createContainer, type Container } from '../src/container.js';
import { ConsoleLogProvider } from '../src/providers/ConsoleLogProvider.js';
import { MockDomainRepository } from './mocks/MockDomainRepository.js';
import { MockSignalSource } from './mocks/MockSignalSource.js';
import { MockAgentClient } from './mocks/MockAgentClient.js';
import { MockEventPublisher } from './mocks/MockEventPublisher.js';
import { NOW, makeItem, makeRow } from './fixtures.js';

describe('express app', () => {
  let container: Container;
  let logger: ConsoleLogProvider;
  let app: Express;

  beforeEach(() => {
    const agents = new MockAgentClient().on('code', {
      kind: 'respond',
      items: [makeItem('c1', { domainId: 'code', score: 0.7 })],
    });
    logger = new ConsoleLogProvider();
    container = createContainer({
      domainRepo: new MockDomainRepository([makeRow('code'), makeRow('docs')]),
      signalSource: new MockSignalSource(),
      agentClient: agents,
      eventPublisher: new MockEventPublisher(),
      logProvider: logger,
      clock: () => NOW,
    });
    app = createApp(createRouter(container), logger);
  });

  it('serves a query through the API router', async () => {
    const res = await request(app)
      .post('/api/v1/query')
      .set('X-Trace-Id', 'trace-http')
      .send({ queryText: 'cache expiry', domains: ['code'] })
      .expect(200);

    expect(res.headers['x-trace-id']).toBe('trace-http');
    expect(res.headers['content-type']).toBe('application/json');
    expect(res.body._meta.routing).toBe('explicit');
    expect(res.body.result.items.map((i: { chunkId: string }) => i.chunkId)).toEqual(['c1']);
  });

  it('passes a malformed body to the router unchanged', async () => {
    const res = await request(app)
      .post('/api/v1/query')
      .set('Content-Type', 'application/json')
      .send('{not json')
      .expect(400);

    expect(res.body.error.message).toBe('Request body must be valid JSON');
  });

  it('keeps the router status for health before the registry loads', async () => {
    await request(app).get('/health').expect(503);

    await container.registry.initialize();
    const res = await request(app).get('/health').expect(200);
    expect(res.body.registeredDomains).toBe(2);
  });

  it('answers preflight with an empty 204', async () => {
    const res = await request(app).options('/api/v1/query').expect(204);

    expect(res.headers['access-control-allow-origin']).toBe('*');
  });

  it('returns the router 404 for unknown paths', async () => {
    const res = await request(app).get('/nope').expect(404);

    expect(res.body.error.code).toBe('NOT_FOUND');
  });

  it('rejects a body over the size limit', async () => {
    const res = await request(app)
      .post('/api/v1/query')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify({ queryText: 'x'.repeat(1_100_000) }))
      .expect(413);

    expect(res.body.error.code).toBe('INVALID_REQUEST');
    expect(logger.find('Unhandled request failure')).toEqual([]);
  });
});
