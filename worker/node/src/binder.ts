/**
 * Binder: compiles a BoundOperation into a reusable, cached invocation thunk.
 *
 * A thunk fixes the operation's call shape once (input arity, output slot
 * positions by name) so each invocation only copies arguments and calls.
 * Thunks are frozen before they are published to the cache; a reader never
 * sees one half-built. Compiling the same operation twice is harmless, every
 * thunk for an operation behaves identically.
 */

import { InvocationError, type BoundOperation, type OutputWriter } from "@invokekit/core";

/**
 * Compiled adapter for one operation. Returns the target's raw result:
 * nothing, a value, or a thenable.
 */
export interface CompiledThunk<TInstance, TResult> {
  (instance: TInstance, inputs: readonly unknown[], outputs: unknown[]): TResult | PromiseLike<TResult>;
  readonly operation: string;
  readonly inputCount: number;
  readonly outputCount: number;
}

function createOutputWriter(
  operation: string,
  outputs: unknown[],
  count: number,
  positions: ReadonlyMap<string, number>
): OutputWriter {
  return {
    set(slot, value) {
      const index = typeof slot === "number" ? slot : positions.get(slot);
      if (index === undefined || !Number.isInteger(index) || index < 0 || index >= count) {
        throw new InvocationError({
          code: "ARGUMENT_MISMATCH",
          message: `Operation "${operation}" has no output slot ${JSON.stringify(slot)}`,
          operation,
        });
      }
      outputs[index] = value;
    },
  };
}

export class Binder {
  private readonly thunks = new WeakMap<object, unknown>();
  private compiled = 0;

  /** Number of thunks this binder has built (not cache hits). */
  get compiledCount(): number {
    return this.compiled;
  }

  /**
   * Return the cached thunk for `operation`, compiling it on first use.
   */
  compile<TInstance, TResult>(operation: BoundOperation<TInstance, TResult>): CompiledThunk<TInstance, TResult> {
    const cached = this.lookup(operation);
    if (cached) return cached;

    const thunk = this.build(operation);
    // publish only the finished, frozen thunk
    this.thunks.set(operation, thunk);
    return thunk;
  }

  /** Build a fresh thunk without consulting or filling the cache. */
  build<TInstance, TResult>(operation: BoundOperation<TInstance, TResult>): CompiledThunk<TInstance, TResult> {
    const name = operation.name;
    const inputCount = operation.inputs.length;
    const outputCount = operation.outputs.length;
    const positions = new Map(operation.outputs.map((slot, index) => [slot.name, index] as const));
    const target = operation.target;

    const call = (instance: TInstance, inputs: readonly unknown[], outputs: unknown[]): TResult | PromiseLike<TResult> => {
      const args = new Array<unknown>(inputCount);
      for (let i = 0; i < inputCount; i++) {
        args[i] = inputs[i];
      }
      return target(instance, Object.freeze(args), createOutputWriter(name, outputs, outputCount, positions));
    };

    const thunk: CompiledThunk<TInstance, TResult> = Object.assign(call, {
      operation: name,
      inputCount,
      outputCount,
    });
    this.compiled++;
    return Object.freeze(thunk);
  }

  private lookup<TInstance, TResult>(
    operation: BoundOperation<TInstance, TResult>
  ): CompiledThunk<TInstance, TResult> | undefined {
    const entry = this.thunks.get(operation);
    return isThunkFor(entry, operation) ? entry : undefined;
  }
}

function isThunkFor<TInstance, TResult>(
  entry: unknown,
  operation: BoundOperation<TInstance, TResult>
): entry is CompiledThunk<TInstance, TResult> {
  return typeof entry === "function" && "operation" in entry && entry.operation === operation.name;
}

/** Process-wide binder shared by invokers that are not given one. */
export const defaultBinder = new Binder();
