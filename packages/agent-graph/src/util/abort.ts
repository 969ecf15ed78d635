// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/util/abort`
 * Purpose: AbortSignal helpers for abandoning in-flight agent calls.
 * Scope: Pure helpers. Does not own controllers.
 * Side-effects: none
 * @internal
 */

export function createAbortError(reason?: unknown): Error {
  const message =
    reason instanceof Error && reason.message
      ? reason.message
      : typeof reason === "string"
        ? reason
        : "The operation was aborted";
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw createAbortError(signal.reason);
  }
}

/**
 * Settle with `promise`, or reject with an AbortError as soon as `signal` fires.
 * The losing promise keeps running; its outcome is observed and dropped.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(createAbortError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(createAbortError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
