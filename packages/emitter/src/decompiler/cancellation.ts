/**
 * Cooperative cancellation through an AbortSignal
 */

import { OperationCanceledError } from "./errors.js";

const abortReason = (signal: AbortSignal): string => {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.message.length > 0) return reason.message;
  if (typeof reason === "string" && reason.trim().length > 0) return reason;
  return "The operation was canceled";
};

export const throwIfCancellationRequested = (signal?: AbortSignal): void => {
  if (!signal?.aborted) {
    return;
  }
  throw new OperationCanceledError(abortReason(signal));
};

/** An abort raised by the platform, such as `AbortSignal.throwIfAborted` */
export const isAbortError = (error: unknown): error is Error =>
  error instanceof Error &&
  (error.name === "AbortError" || ("code" in error && error.code === "ABORT_ERR"));

/**
 * The cancellation behind a failure, if any: the error itself, an abort
 * error, or anything thrown once the signal has fired.
 */
export const asCancellation = (
  error: unknown,
  signal?: AbortSignal
): OperationCanceledError | undefined => {
  if (error instanceof OperationCanceledError) return error;
  if (signal?.aborted) return new OperationCanceledError(abortReason(signal));
  if (isAbortError(error)) return new OperationCanceledError(error.message || undefined);
  return undefined;
};
