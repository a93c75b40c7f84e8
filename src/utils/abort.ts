/**
 * Deadline helper: one AbortSignal that fires on timeout or when a parent signal aborts.
 *
 * Callers check `timedOut()` after a failure to tell a timeout apart from a user interrupt
 * or a plain transport error.
 */

export interface Deadline {
  readonly signal: AbortSignal;
  timedOut(): boolean;
  interrupted(): boolean;
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;
  let interrupted = false;

  const onParentAbort = () => {
    interrupted = true;
    controller.abort(parent?.reason);
  };

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    interrupted: () => interrupted,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
