/**
 * Abort-aware timing helpers used by the pollers and controller loops.
 */

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects, and
 * always clears its timer, so a cancelled loop leaves nothing scheduled.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, Math.max(0, ms));
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export interface LinkedSignal {
  signal: AbortSignal;
  /** Drop the timer and the listener on the parent signal. */
  dispose(): void;
}

/**
 * A signal that aborts when `parent` aborts or after `timeoutMs`,
 * whichever comes first.
 */
export function linkSignal(timeoutMs: number, parent?: AbortSignal): LinkedSignal {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  const timer = setTimeout(() => {
    const err = new Error(`Request timed out after ${timeoutMs}ms`);
    err.name = 'TimeoutError';
    controller.abort(err);
  }, timeoutMs);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
