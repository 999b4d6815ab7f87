import { describe, it, expect } from 'vitest';
import { pipeline } from '../../src/middleware/pipeline.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

describe('pipeline', () => {
  function makeContext(): HandlerContext {
    return { traceId: 'trace-1' };
  }

  it('should call the handler directly when no middleware', async () => {
    const handler: Handler = async () => new Response('ok', { status: 200 });

    const wrapped = pipeline()(handler);
    const res = await wrapped(new Request('http://test'), makeContext());

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  it('should apply middleware in order (left to right)', async () => {
    const order: string[] = [];

    const tracer = (name: string) => (next: Handler): Handler => async (req, ctx) => {
      order.push(`${name}-before`);
      const res = await next(req, ctx);
      order.push(`${name}-after`);
      return res;
    };

    const handler: Handler = async () => {
      order.push('handler');
      return new Response('ok');
    };

    await pipeline(tracer('outer'), tracer('inner'))(handler)(new Request('http://test'), makeContext());

    expect(order).toEqual(['outer-before', 'inner-before', 'handler', 'inner-after', 'outer-after']);
  });

  it('should allow middleware to short-circuit', async () => {
    const blocker = (_next: Handler): Handler => async () => new Response('blocked', { status: 503 });

    const handler: Handler = async () => {
      throw new Error('Should not reach handler');
    };

    const res = await pipeline(blocker)(handler)(new Request('http://test'), makeContext());

    expect(res.status).toBe(503);
    expect(await res.text()).toBe('blocked');
  });

  it('should pass the trace id through to the handler', async () => {
    const handler: Handler = async (_req, ctx) => new Response(ctx.traceId);

    const res = await pipeline((next) => next)(handler)(new Request('http://test'), makeContext());

    expect(await res.text()).toBe('trace-1');
  });
});
