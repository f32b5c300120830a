import { createChildLogger } from "./logger.js";

const log = createChildLogger({ module: "abort" });

export function reasonToError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts. An abandoned promise keeps running and is not awaited.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    abandon(promise);
    return Promise.reject(reasonToError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(reasonToError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
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

/**
 * Run `task` with its own abort signal, which fires after `timeoutMs`
 * (rejecting with `onTimeout()`) or when `parent` aborts.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(onTimeout()), timeoutMs);
  const forward = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", forward, { once: true });

  try {
    if (parent?.aborted) throw reasonToError(parent.reason);
    return await raceAbort(task(controller.signal), controller.signal);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forward);
  }
}

function abandon(promise: Promise<unknown>): void {
  promise.catch((err: unknown) => {
    log.debug({ err }, "Abandoned call settled with an error");
  });
}
