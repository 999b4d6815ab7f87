/**
 * Deadline-scoped async work.
 * The task gets an AbortSignal that fires when its own deadline passes or
 * when the parent signal aborts; the returned promise settles at that moment
 * even if the task ignores the signal.
 */

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timeout after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/** The enclosing query was cancelled before the task finished. */
export class CancelledError extends Error {
  constructor(message = 'cancelled: query deadline exceeded') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(cancellationReason(parent));
  }

  const controller = new AbortController();
  let rejectOnAbort: (reason: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectOnAbort = reject;
  });

  const onAbort = () => rejectOnAbort(controller.signal.reason);
  controller.signal.addEventListener('abort', onAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);
  const onParentAbort = () => {
    if (parent) controller.abort(cancellationReason(parent));
  };
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let running: Promise<T>;
  try {
    running = task(controller.signal);
  } catch (err) {
    running = Promise.reject(err);
  }

  return Promise.race([running, aborted]).finally(() => {
    clearTimeout(timer);
    controller.signal.removeEventListener('abort', onAbort);
    parent?.removeEventListener('abort', onParentAbort);
  });
}

function cancellationReason(parent: AbortSignal): Error {
  return parent.reason instanceof CancelledError ? parent.reason : new CancelledError();
}

/** An AbortSignal that fires after `timeoutMs`; `dispose` releases the timer early. */
export function deadlineSignal(timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new CancelledError()), timeoutMs);
  timer.unref();
  return {
    signal: controller.signal,
    dispose: () => clearTimeout(timer),
  };
}
