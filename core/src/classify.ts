/**
 * Failure classifier: maps a settled computation to exactly one terminal state.
 *
 * Priority: business fault, then cancellation, then any other error, then
 * success. Must only be given a settlement; the invoker awaits first.
 */

import { InvocationError, isBusinessFault, isCancellation } from "./errors.js";
import type { TerminalState } from "./outcome.js";

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Wrap an arbitrary error as an infrastructure failure of `operation`,
 * keeping the original error as `cause`.
 */
export function toInfrastructureFailure(err: unknown, operation: string): InvocationError {
  if (err instanceof InvocationError && err.code === "INFRASTRUCTURE_FAILURE" && err.operation === operation) {
    return err;
  }
  return new InvocationError({
    code: "INFRASTRUCTURE_FAILURE",
    message: `Operation "${operation}" failed: ${describe(err)}`,
    operation,
    cause: err,
  });
}

export function classify<TResult>(
  settlement: PromiseSettledResult<TResult>,
  operation: string
): TerminalState<TResult> {
  if (settlement.status === "fulfilled") {
    return { status: "succeeded", value: settlement.value };
  }
  const reason: unknown = settlement.reason;
  if (isBusinessFault(reason)) {
    return { status: "faulted", fault: reason };
  }
  if (isCancellation(reason)) {
    return { status: "cancelled" };
  }
  return { status: "failed", error: toInfrastructureFailure(reason, operation) };
}
