/**
 * Abort Utilities
 *
 * Race an async operation against the request's AbortSignal, so a
 * cancelled request stops waiting on the model or a tool right away.
 */

import { RequestCancelledError } from "../errors.js";

export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === "string" && reason ? reason : "request cancelled";
}

/**
 * Run `fn`, rejecting with RequestCancelledError as soon as `signal` fires.
 * Without a signal the operation just runs.
 */
export function abortableCall<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return fn();
  if (signal.aborted) return Promise.reject(new RequestCancelledError(abortReason(signal)));

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new RequestCancelledError(abortReason(signal)));
    };

    signal.addEventListener("abort", onAbort, { once: true });

    fn().then(
      result => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
