export class DeadlineExceededError extends Error {
  readonly isTimeout = true;
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const toAbortError = (reason: unknown): Error =>
  reason instanceof Error ? reason : new Error(reason == null ? "Aborted" : String(reason));

/**
 * Runs `task` with a hard deadline. The task receives a signal that aborts on timeout
 * or when `parent` aborts; the returned promise settles at that moment even if the
 * task ignores its signal.
 */
export const runWithTimeout = <T>(
  task: (signal: AbortSignal, deadline: Date) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const deadline = new Date(Date.now() + timeoutMs);
    let settled = false;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      fn();
    };

    const onParentAbort = () => {
      const error = toAbortError(parent?.reason);
      controller.abort(error);
      settle(() => reject(error));
    };

    const timer = setTimeout(() => {
      const error = new DeadlineExceededError(timeoutMs);
      controller.abort(error);
      settle(() => reject(error));
    }, timeoutMs);

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener("abort", onParentAbort, { once: true });

    Promise.resolve()
      .then(() => task(controller.signal, deadline))
      .then(
        (value) => settle(() => resolve(value)),
        (error: unknown) => settle(() => reject(error))
      );
  });
