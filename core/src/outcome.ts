/**
 * Terminal invocation outcomes.
 *
 * Every invocation ends in exactly one of four states. The union is the only
 * place callers learn whether an operation succeeded, faulted, was cancelled
 * or failed; nothing downstream re-derives it from exceptions.
 */

import type { BusinessFault, InvocationError } from "./errors.js";

export type OutcomeStatus = "succeeded" | "faulted" | "cancelled" | "failed";

/** Classified state of a settled computation, before timing and outputs are attached. */
export type TerminalState<TResult = unknown> =
  | { status: "succeeded"; value: TResult }
  | { status: "faulted"; fault: BusinessFault }
  | { status: "cancelled" }
  | { status: "failed"; error: InvocationError };

interface OutcomeBase {
  /** Operation name */
  operation: string;
  /** Output arguments; length always equals the operation's output slot count */
  outputs: unknown[];
  /** Elapsed time from dispatch to classification (0 for pre-dispatch failures) */
  durationMs: number;
}

export type SucceededOutcome<TResult> = OutcomeBase & {
  status: "succeeded";
  /** Present only when the operation declares a return value */
  value?: TResult;
};

export type FaultedOutcome = OutcomeBase & { status: "faulted"; fault: BusinessFault };

export type CancelledOutcome = OutcomeBase & { status: "cancelled" };

export type FailedOutcome = OutcomeBase & { status: "failed"; error: InvocationError };

export type InvocationOutcome<TResult = unknown> =
  | SucceededOutcome<TResult>
  | FaultedOutcome
  | CancelledOutcome
  | FailedOutcome;
