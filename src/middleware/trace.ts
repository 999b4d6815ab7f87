/**
 * Trace id resolution.
 * An inbound X-Trace-Id is honoured when it looks like an id; anything
 * else is replaced with a fresh UUID.
 */

import { randomUUID } from 'node:crypto';

export const TRACE_HEADER = 'X-Trace-Id';

const TRACE_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function resolveTraceId(req: Request): string {
  const inbound = req.headers.get(TRACE_HEADER)?.trim();
  return inbound && TRACE_ID_PATTERN.test(inbound) ? inbound : randomUUID();
}
