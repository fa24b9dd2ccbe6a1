/**
 * Invocation error taxonomy (shared).
 *
 * Business faults cross the trust boundary to the remote caller untouched.
 * Everything else the adapter raises is an InvocationError carrying a code,
 * the operation name and, where one exists, the original cause.
 */

export type InvocationErrorCode =
  | "ARGUMENT_MISMATCH"
  | "INVALID_STATE"
  | "INFRASTRUCTURE_FAILURE"
  | "CANCELLED"
  | "INVALID_SIGNATURE"
  | "INVALID_TOKEN";

/**
 * Structured error raised by the invocation adapter itself.
 */
export class InvocationError extends Error {
  public readonly code: InvocationErrorCode;
  public readonly operation?: string;
  public readonly cause?: unknown;

  constructor(args: {
    code: InvocationErrorCode;
    message: string;
    operation?: string;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "InvocationError";
    this.code = args.code;
    this.operation = args.operation;
    this.cause = args.cause;
  }
}

/**
 * Declared, caller-meaningful fault. Operations throw (or reject with) a
 * BusinessFault when the failure is part of their contract, e.g. OrderNotFound.
 */
export class BusinessFault<TDetails = unknown> extends Error {
  public readonly code: string;
  public readonly details?: TDetails;

  constructor(args: { code: string; message: string; details?: TDetails }) {
    super(args.message);
    this.name = "BusinessFault";
    this.code = args.code;
    this.details = args.details;
  }
}

/**
 * Generic cancellation. Named "AbortError" so it reads the same as an
 * aborted AbortSignal's reason.
 */
export class OperationCancelledError extends InvocationError {
  constructor(args: { operation?: string; message?: string } = {}) {
    super({
      code: "CANCELLED",
      message: args.message ?? (args.operation
        ? `Operation "${args.operation}" was cancelled`
        : "Operation was cancelled"),
      operation: args.operation,
    });
    this.name = "AbortError";
  }
}

export function isBusinessFault(err: unknown): err is BusinessFault {
  return err instanceof BusinessFault;
}

const CANCELLATION_NAMES = new Set(["AbortError", "TimeoutError"]);

/**
 * True for OperationCancelledError and for any error named "AbortError" or
 * "TimeoutError" (the DOMException reasons of AbortController.abort() and
 * AbortSignal.timeout()).
 */
export function isCancellation(err: unknown): boolean {
  if (err instanceof OperationCancelledError) return true;
  return err instanceof Error && CANCELLATION_NAMES.has(err.name);
}
