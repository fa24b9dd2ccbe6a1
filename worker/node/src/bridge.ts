/**
 * Legacy completion bridge: begin/end completion protocol over the invoker
 * for callers that take a completion callback instead of awaiting.
 *
 * endInvoke does not block. A caller that needs to wait awaits
 * `token.completion` (or waits for onComplete) and then calls endInvoke;
 * calling it earlier throws INVALID_STATE.
 */

import {
  InvocationError,
  OperationCancelledError,
  toInfrastructureFailure,
  type InvocationOutcome,
} from "@invokekit/core";
import type { InvokeContext, MaybePromise, OperationInvoker } from "./invoker.js";

export type CompletionCallback<TResult, TState> = (token: PendingInvocation<TResult, TState>) => void;

export interface EndInvokeResult<TResult> {
  value: TResult | undefined;
  outputs: unknown[];
}

/** Completion state of one token; written only by the bridge that issued it. */
interface TokenRecord<TResult> {
  outcome: InvocationOutcome<TResult> | undefined;
  synchronous: boolean;
  ended: boolean;
  readonly completion: Promise<void>;
  readonly resolve: () => void;
}

function createTokenRecord<TResult>(): TokenRecord<TResult> {
  let resolve: () => void = () => undefined;
  const completion = new Promise<void>((done) => {
    resolve = done;
  });
  return { outcome: undefined, synchronous: false, ended: false, completion, resolve };
}

/**
 * Token handed out by beginInvoke. Passed back to endInvoke exactly once.
 */
export class PendingInvocation<TResult, TState = unknown> {
  /** Resolves when the outcome is available. Never rejects. */
  readonly completion: Promise<void>;

  constructor(
    private readonly record: Readonly<TokenRecord<TResult>>,
    readonly state: TState
  ) {
    this.completion = record.completion;
  }

  get isCompleted(): boolean {
    return this.record.outcome !== undefined;
  }

  /** True when the outcome was available before beginInvoke returned. */
  get completedSynchronously(): boolean {
    return this.record.synchronous;
  }
}

export class CompletionBridge<TInstance, TResult = unknown> {
  private readonly records = new WeakMap<PendingInvocation<TResult, unknown>, TokenRecord<TResult>>();

  constructor(private readonly invoker: OperationInvoker<TInstance, TResult>) {}

  /**
   * Start an invocation. onComplete runs once, on a microtask after the
   * outcome is available, also when the operation completed immediately.
   */
  beginInvoke<TState>(
    instance: TInstance | null | undefined,
    inputs: readonly unknown[] | null | undefined,
    onComplete: CompletionCallback<TResult, TState> | undefined,
    state: TState,
    context: InvokeContext = {}
  ): PendingInvocation<TResult, TState> {
    const record = createTokenRecord<TResult>();
    const token = new PendingInvocation<TResult, TState>(record, state);
    this.records.set(token, record);

    let result: MaybePromise<InvocationOutcome<TResult>>;
    try {
      result = this.invoker.invoke(instance, inputs, context);
    } catch (err) {
      result = this.bridgeFailure(err);
    }

    if (result instanceof Promise) {
      void result.then(
        (outcome) => this.deliver(record, token, outcome, false, onComplete),
        (err: unknown) => this.deliver(record, token, this.bridgeFailure(err), false, onComplete)
      );
    } else {
      this.deliver(record, token, result, true, onComplete);
    }
    return token;
  }

  /**
   * Finish an invocation: return (value, outputs) or rethrow the classified
   * outcome. Faults are rethrown unchanged; cancellation as
   * OperationCancelledError; failures as the wrapped InvocationError.
   */
  endInvoke<TState>(token: PendingInvocation<TResult, TState>): EndInvokeResult<TResult> {
    const record = this.records.get(token);
    if (!record) {
      throw new InvocationError({
        code: "INVALID_TOKEN",
        message: `endInvoke: token was not issued by this bridge for "${this.invoker.operationName}"`,
        operation: this.invoker.operationName,
      });
    }
    if (record.ended) {
      throw new InvocationError({
        code: "INVALID_TOKEN",
        message: "endInvoke was already called for this invocation",
      });
    }
    const outcome = record.outcome;
    if (!outcome) {
      throw new InvocationError({
        code: "INVALID_STATE",
        message: "endInvoke called before the invocation completed",
      });
    }
    record.ended = true;

    switch (outcome.status) {
      case "succeeded":
        return { value: outcome.value, outputs: outcome.outputs };
      case "faulted":
        throw outcome.fault;
      case "cancelled":
        throw new OperationCancelledError({ operation: outcome.operation });
      case "failed":
        throw outcome.error;
    }
  }

  private deliver<TState>(
    record: TokenRecord<TResult>,
    token: PendingInvocation<TResult, TState>,
    outcome: InvocationOutcome<TResult>,
    synchronously: boolean,
    onComplete: CompletionCallback<TResult, TState> | undefined
  ): void {
    if (record.outcome) return;
    record.outcome = outcome;
    record.synchronous = synchronously;
    record.resolve();
    if (onComplete) {
      queueMicrotask(() => onComplete(token));
    }
  }

  private bridgeFailure(err: unknown): InvocationOutcome<TResult> {
    return {
      status: "failed",
      error: toInfrastructureFailure(err, this.invoker.operationName),
      operation: this.invoker.operationName,
      outputs: this.invoker.allocateOutputs(),
      durationMs: 0,
    };
  }
}
