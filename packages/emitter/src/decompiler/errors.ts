/**
 * Decompilation errors
 */

import { methodHandleName, type MethodHandle } from "./method-handle.js";

/** Raised when cancellation was requested; never wrapped */
export class OperationCanceledError extends Error {
  constructor(message = "The operation was canceled") {
    super(message);
    this.name = "OperationCanceledError";
  }
}

/** Any other failure while decompiling one method */
export class DecompilerError extends Error {
  readonly method: MethodHandle;
  readonly cause: unknown;

  constructor(method: MethodHandle, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error decompiling ${methodHandleName(method)}: ${reason}`);
    this.name = "DecompilerError";
    this.method = method;
    this.cause = cause;
  }
}

export const isOperationCanceled = (error: unknown): error is OperationCanceledError =>
  error instanceof OperationCanceledError;
