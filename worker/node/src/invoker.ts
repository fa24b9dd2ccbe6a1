/**
 * Operation invoker: runs one invocation of a BoundOperation end to end.
 *
 * Validates the request, dispatches through the compiled thunk, waits only
 * when the target hands back a thenable, classifies the settlement into a
 * terminal outcome and reports invoked/terminal events to telemetry.
 *
 * Immediate operations return the outcome directly (no Promise, no yield);
 * asynchronous ones return a Promise that never rejects.
 */

import {
  allocateSlots,
  classify,
  InvocationError,
  toInfrastructureFailure,
  type BoundOperation,
  type CancellationTelemetryPolicy,
  type InvocationOutcome,
  type InvocationTelemetry,
  type OutcomeStatus,
  type TerminalEventKind,
  type TerminalState,
} from "@invokekit/core";
import { defaultBinder, type Binder } from "./binder.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { emitSafely } from "./telemetry.js";

const LOG_PREFIX = "operation-invoker:invoker";

/** Caller-supplied identifiers threaded into telemetry. */
export interface InvokeContext {
  correlationId?: string;
  caller?: string;
}

export interface OperationInvokerOptions {
  binder?: Binder;
  telemetry?: InvocationTelemetry;
  /** Default: "silent" */
  cancellationTelemetry?: CancellationTelemetryPolicy;
  clock?: { now(): number };
  loggerFactory?: LoggerFactory;
}

export type MaybePromise<T> = T | Promise<T>;

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export class OperationInvoker<TInstance, TResult = unknown> {
  private readonly binder: Binder;
  private readonly telemetry?: InvocationTelemetry;
  private readonly cancellationTelemetry: CancellationTelemetryPolicy;
  private readonly clock: { now(): number };
  private readonly log: Logger;

  constructor(
    private readonly op: BoundOperation<TInstance, TResult>,
    options: OperationInvokerOptions = {}
  ) {
    this.binder = options.binder ?? defaultBinder;
    this.telemetry = options.telemetry;
    this.cancellationTelemetry = options.cancellationTelemetry ?? "silent";
    this.clock = options.clock ?? { now: () => Date.now() };
    this.log = resolveLogger(options.loggerFactory, LOG_PREFIX);
  }

  get operation(): BoundOperation<TInstance, TResult> {
    return this.op;
  }

  get operationName(): string {
    return this.op.name;
  }

  /** Default-valued inputs buffer, sized to the input slot count. */
  allocateInputs(): unknown[] {
    return allocateSlots(this.op.inputs);
  }

  /** Default-valued outputs buffer, sized to the output slot count. */
  allocateOutputs(): unknown[] {
    return allocateSlots(this.op.outputs);
  }

  /**
   * Invoke the operation on `instance`.
   *
   * Returns the outcome synchronously when the request is rejected before
   * dispatch or the target completes immediately; otherwise a Promise that
   * resolves (never rejects) once the target's thenable settles.
   */
  invoke(
    instance: TInstance | null | undefined,
    inputs: readonly unknown[] | null | undefined,
    context: InvokeContext = {}
  ): MaybePromise<InvocationOutcome<TResult>> {
    const name = this.op.name;
    if (instance === null || instance === undefined) {
      return this.rejectBeforeDispatch(
        new InvocationError({
          code: "INVALID_STATE",
          message: `No target instance for operation "${name}"`,
          operation: name,
        })
      );
    }

    const expected = this.op.inputs.length;
    if (inputs === null || inputs === undefined ? expected > 0 : inputs.length !== expected) {
      return this.rejectBeforeDispatch(
        new InvocationError({
          code: "ARGUMENT_MISMATCH",
          message: inputs
            ? `Operation "${name}" expects ${expected} input(s) but received ${inputs.length}`
            : `Operation "${name}" expects ${expected} input(s) but none were supplied`,
          operation: name,
        })
      );
    }

    const thunk = this.binder.compile(this.op);
    const outputs = this.allocateOutputs();
    const startedAt = this.clock.now();

    emitSafely(
      this.telemetry,
      {
        kind: "invoked",
        operation: name,
        correlationId: context.correlationId,
        caller: context.caller,
        timestampMs: startedAt,
      },
      this.log
    );

    let raw: TResult | PromiseLike<TResult>;
    try {
      raw = thunk(instance, inputs ?? [], outputs);
    } catch (err) {
      return this.finishSafely({ status: "rejected", reason: err }, outputs, startedAt, context);
    }

    if (!isPromiseLike(raw)) {
      return this.finishSafely({ status: "fulfilled", value: raw }, outputs, startedAt, context);
    }

    return this.settle(raw).then(
      (settlement) => this.finishSafely(settlement, outputs, startedAt, context),
      (err: unknown) => this.finishSafely({ status: "rejected", reason: err }, outputs, startedAt, context)
    );
  }

  /** invoke(), always as a Promise. */
  async invokeAsync(
    instance: TInstance | null | undefined,
    inputs: readonly unknown[] | null | undefined,
    context: InvokeContext = {}
  ): Promise<InvocationOutcome<TResult>> {
    return this.invoke(instance, inputs, context);
  }

  private settle(pending: PromiseLike<TResult>): Promise<PromiseSettledResult<TResult>> {
    return new Promise<PromiseSettledResult<TResult>>((resolve) => {
      void pending.then(
        (value) => resolve({ status: "fulfilled", value }),
        (reason: unknown) => resolve({ status: "rejected", reason })
      );
    });
  }

  private rejectBeforeDispatch(error: InvocationError): InvocationOutcome<TResult> {
    this.log.warn?.(
      { operation: this.op.name, code: error.code },
      `${LOG_PREFIX}:invoke - Rejected before dispatch`
    );
    return {
      status: "failed",
      error,
      operation: this.op.name,
      outputs: this.allocateOutputs(),
      durationMs: 0,
    };
  }

  /**
   * finish(), with anything it throws (e.g. a broken injected clock) turned
   * into a failed outcome so the returned Promise never rejects.
   */
  private finishSafely(
    settlement: PromiseSettledResult<TResult>,
    outputs: unknown[],
    startedAt: number,
    context: InvokeContext
  ): InvocationOutcome<TResult> {
    try {
      return this.finish(settlement, outputs, startedAt, context);
    } catch (err) {
      const error = toInfrastructureFailure(err, this.op.name);
      this.log.error?.(
        { operation: this.op.name, error: error.message },
        `${LOG_PREFIX}:invoke - Completing the invocation failed`
      );
      return { status: "failed", error, operation: this.op.name, outputs, durationMs: 0 };
    }
  }

  private finish(
    settlement: PromiseSettledResult<TResult>,
    outputs: unknown[],
    startedAt: number,
    context: InvokeContext
  ): InvocationOutcome<TResult> {
    const state = classify(settlement, this.op.name);
    const durationMs = Math.max(0, this.clock.now() - startedAt);

    const kind = this.terminalEventFor(state.status);
    if (kind) {
      emitSafely(
        this.telemetry,
        { kind, operation: this.op.name, correlationId: context.correlationId, durationMs },
        this.log
      );
    }

    return this.toOutcome(state, outputs, durationMs);
  }

  private terminalEventFor(status: OutcomeStatus): TerminalEventKind | undefined {
    switch (status) {
      case "succeeded":
        return "completed";
      case "faulted":
        return "faulted";
      case "failed":
        return "failed";
      case "cancelled":
        if (this.cancellationTelemetry === "as-failed") return "failed";
        if (this.cancellationTelemetry === "distinct") return "cancelled";
        return undefined;
    }
  }

  private toOutcome(
    state: TerminalState<TResult>,
    outputs: unknown[],
    durationMs: number
  ): InvocationOutcome<TResult> {
    const base = { operation: this.op.name, outputs, durationMs };
    switch (state.status) {
      case "succeeded":
        // value is read only once success is known, and only if declared
        return this.op.returnsValue
          ? { ...base, status: "succeeded", value: state.value }
          : { ...base, status: "succeeded" };
      case "faulted":
        return { ...base, status: "faulted", fault: state.fault };
      case "cancelled":
        return { ...base, status: "cancelled" };
      case "failed":
        return { ...base, status: "failed", error: state.error };
    }
  }
}
