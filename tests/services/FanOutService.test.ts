import { describe, it, expect, beforeEach } from 'vitest';
import { FanOutService } from '../../src/services/FanOutService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { CancelledError } from '../../src/utils/deadline.js';
import { MockAgentClient, transportError } from '../mocks/MockAgentClient.js';
import { makeItem, makePlan, makeSnapshot } from '../fixtures.js';

describe('FanOutService', () => {
  let client: MockAgentClient;
  let logger: ConsoleLogProvider;
  let service: FanOutService;
  const registry = makeSnapshot(['code', 'docs', 'research']);

  beforeEach(() => {
    client = new MockAgentClient();
    logger = new ConsoleLogProvider();
    service = new FanOutService(client, logger);
  });

  it('collects every response in target order', async () => {
    client
      .on('code', { kind: 'respond', items: [makeItem('c1', { domainId: 'code' })], delayMs: 20 })
      .on('docs', { kind: 'respond', items: [makeItem('d1')] });

    const outcome = await service.dispatch(makePlan(['code', 'docs']), registry, {
      perTargetDeadlineMs: 1000,
      topK: 5,
    });

    expect(outcome.gaps).toEqual([]);
    expect(outcome.responses.map((r) => [r.domainId, r.agentId])).toEqual([
      ['code', 'code-agent'],
      ['docs', 'docs-agent'],
    ]);
  });

  it('sends the rewritten query, top-k, filters and trace id', async () => {
    const plan = makePlan(['code', 'docs']);
    plan.targets[0] = { ...plan.targets[0], rewrittenQuery: 'cache eviction implementation' };

    await service.dispatch(plan, registry, {
      perTargetDeadlineMs: 750,
      topK: 7,
      filters: { language: 'typescript' },
    });

    expect(client.requests).toEqual([
      {
        queryId: 'q-1',
        queryText: 'cache eviction implementation',
        originalText: 'how does the cache expire entries',
        domainId: 'code',
        topK: 7,
        filters: { language: 'typescript' },
        traceId: 'trace-1',
        timeoutMs: 750,
      },
      {
        queryId: 'q-1',
        queryText: 'how does the cache expire entries',
        originalText: 'how does the cache expire entries',
        domainId: 'docs',
        topK: 7,
        filters: { language: 'typescript' },
        traceId: 'trace-1',
        timeoutMs: 750,
      },
    ]);
  });

  it('turns a slow agent into a timeout gap and aborts its call', async () => {
    client.on('docs', { kind: 'hang' });

    const outcome = await service.dispatch(makePlan(['code', 'docs']), registry, {
      perTargetDeadlineMs: 30,
      topK: 5,
    });

    expect(outcome.responses.map((r) => r.domainId)).toEqual(['code']);
    expect(outcome.gaps).toEqual([{ domainId: 'docs', agentId: 'docs-agent', reason: 'timeout after 30ms' }]);
    expect(client.aborted).toEqual(['docs']);
  });

  it('turns a transport failure into a gap', async () => {
    client.on('research', { kind: 'fail', error: transportError() });

    const outcome = await service.dispatch(makePlan(['research']), registry, {
      perTargetDeadlineMs: 1000,
      topK: 5,
    });

    expect(outcome.responses).toEqual([]);
    expect(outcome.gaps).toEqual([
      { domainId: 'research', agentId: 'research-agent', reason: 'transport error: connection refused' },
    ]);
  });

  it('turns a reply with an out-of-range score into a gap without touching its siblings', async () => {
    client
      .on('code', { kind: 'respond', items: [makeItem('c1', { domainId: 'code', score: 0.8 })] })
      .on('docs', { kind: 'respond', items: [makeItem('d1', { score: 1.5 })] });

    const outcome = await service.dispatch(makePlan(['code', 'docs']), registry, {
      perTargetDeadlineMs: 1000,
      topK: 5,
    });

    expect(outcome.responses.map((r) => r.domainId)).toEqual(['code']);
    expect(outcome.gaps).toEqual([
      { domainId: 'docs', agentId: 'docs-agent', reason: 'malformed reply: score 1.5 outside [0, 1] for d1' },
    ]);
  });

  it('reports a target whose agent has left the registry without calling it', async () => {
    const plan = makePlan(['docs', 'legal']);
    plan.targets[0] = { ...plan.targets[0], agentId: 'docs-agent-old' };

    const outcome = await service.dispatch(plan, registry, { perTargetDeadlineMs: 1000, topK: 5 });

    expect(client.requests).toEqual([]);
    expect(outcome.gaps.map((g) => [g.domainId, g.reason])).toEqual([
      ['docs', 'agent no longer registered'],
      ['legal', 'agent no longer registered'],
    ]);
  });

  it('cancels outstanding calls when the query is cancelled', async () => {
    client.on('docs', { kind: 'hang' });
    const controller = new AbortController();
    setTimeout(() => controller.abort(new CancelledError()), 20);

    const outcome = await service.dispatch(makePlan(['code', 'docs']), registry, {
      perTargetDeadlineMs: 5000,
      topK: 5,
      signal: controller.signal,
    });

    expect(outcome.responses.map((r) => r.domainId)).toEqual(['code']);
    expect(outcome.gaps).toEqual([
      { domainId: 'docs', agentId: 'docs-agent', reason: 'cancelled: query deadline exceeded' },
    ]);
    expect(client.aborted).toEqual(['docs']);
  });

  it('logs a warning per gap', async () => {
    client.on('code', { kind: 'fail', error: transportError() }).on('docs', { kind: 'fail', error: transportError() });

    await service.dispatch(makePlan(['code', 'docs']), registry, { perTargetDeadlineMs: 1000, topK: 5 });

    const warnings = logger.find('Recall target unavailable');
    expect(warnings.map((w) => w.fields?.domainId)).toEqual(['code', 'docs']);
    expect(warnings[0].fields?.traceId).toBe('trace-1');
  });
});
