import { OperationCancelledError } from "../shared/errors";

export function abortReason(signal: AbortSignal): OperationCancelledError {
  return signal.reason instanceof OperationCancelledError
    ? signal.reason
    : new OperationCancelledError();
}

/**
 * Settles with `work`, or rejects as soon as `signal` aborts. `work` itself is
 * not interrupted and its eventual rejection is still observed.
 */
export function withAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export interface CallScope {
  readonly signal: AbortSignal;
  dispose(): void;
}

/**
 * Signal for one tool call: aborts when the caller's signal aborts or when
 * `timeoutMs` elapses (0 or less disables the timeout).
 */
export function createCallScope(parent: AbortSignal | undefined, timeoutMs: number): CallScope {
  const controller = new AbortController();

  const onParentAbort = () => {
    controller.abort(
      parent?.reason instanceof OperationCancelledError
        ? parent.reason
        : new OperationCancelledError("Tool call was cancelled by the client.")
    );
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          controller.abort(new OperationCancelledError(`Tool call timed out after ${timeoutMs}ms.`));
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
