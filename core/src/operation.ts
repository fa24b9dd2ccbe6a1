/**
 * Bound operation model.
 *
 * A BoundOperation is the immutable, statically-typed description of one
 * dispatchable target: its positional input and output slots, whether it
 * returns a value, and the closure that performs the call. It is built once
 * per operation with defineOperation() and shared by every invocation.
 */

import { InvocationError } from "./errors.js";
import { OperationSignatureSchema } from "./operation-schema.js";

// ── Signature ───────────────────────────────────────────────────────

export type ReturnKind = "none" | "value" | "async-none" | "async-value";

/** One positional parameter. defaultValue is what the slot holds until written. */
export interface ParameterSlot {
  readonly name: string;
  readonly defaultValue?: unknown;
}

/**
 * Writable view over an invocation's outputs buffer.
 * Slots are addressed by position or by name.
 */
export interface OutputWriter {
  set(slot: number | string, value: unknown): void;
}

/**
 * The callable behind an operation. Receives the positional inputs and a
 * writer for the by-reference outputs; returns nothing, a value, or a
 * thenable that settles later.
 */
export type OperationTarget<TInstance, TResult> = (
  instance: TInstance,
  args: readonly unknown[],
  out: OutputWriter
) => TResult | PromiseLike<TResult>;

export interface BoundOperation<TInstance = unknown, TResult = unknown> {
  readonly name: string;
  readonly inputs: readonly ParameterSlot[];
  readonly outputs: readonly ParameterSlot[];
  readonly returnKind: ReturnKind;
  /** Decided once from returnKind; the invoker never probes the result for it. */
  readonly returnsValue: boolean;
  readonly target: OperationTarget<TInstance, TResult>;
}

// ── Definition ──────────────────────────────────────────────────────

export interface OperationDefinition<TInstance, TResult> {
  name: string;
  /** Slot names or full slot descriptors, in positional order. */
  inputs?: ReadonlyArray<string | ParameterSlot>;
  outputs?: ReadonlyArray<string | ParameterSlot>;
  returns: ReturnKind;
  target: OperationTarget<TInstance, TResult>;
}

function toSlot(slot: string | ParameterSlot): ParameterSlot {
  return typeof slot === "string" ? { name: slot } : slot;
}

export function returnKindHasValue(kind: ReturnKind): boolean {
  return kind === "value" || kind === "async-value";
}

/**
 * Validate a definition and freeze it into a BoundOperation.
 * Throws InvocationError(INVALID_SIGNATURE) when the signature is malformed.
 */
export function defineOperation<TInstance, TResult = void>(
  definition: OperationDefinition<TInstance, TResult>
): BoundOperation<TInstance, TResult> {
  const parsed = OperationSignatureSchema.safeParse({
    name: definition.name,
    inputs: (definition.inputs ?? []).map(toSlot),
    outputs: (definition.outputs ?? []).map(toSlot),
    returns: definition.returns,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvocationError({
      code: "INVALID_SIGNATURE",
      message: `defineOperation: Invalid signature for "${definition.name}": ${issue?.message ?? "unknown issue"}`,
      operation: definition.name,
      cause: parsed.error,
    });
  }

  const sig = parsed.data;
  return Object.freeze({
    name: sig.name,
    inputs: Object.freeze(sig.inputs.map((s) => Object.freeze({ ...s }))),
    outputs: Object.freeze(sig.outputs.map((s) => Object.freeze({ ...s }))),
    returnKind: sig.returns,
    returnsValue: returnKindHasValue(sig.returns),
    target: definition.target,
  });
}

/** Default-valued buffer sized to the given slots. */
export function allocateSlots(slots: readonly ParameterSlot[]): unknown[] {
  return slots.map((slot) => slot.defaultValue);
}
