/**
 * Operation table: statically-typed map from operation name to its
 * BoundOperation, built once at startup. Each entry gets one memoized
 * OperationInvoker sharing the table's binder, telemetry and clock.
 */

import { InvocationError, type BoundOperation } from "@invokekit/core";
import { Binder } from "./binder.js";
import { OperationInvoker, type OperationInvokerOptions } from "./invoker.js";

export class OperationTable<TService> {
  private readonly operations = new Map<string, BoundOperation<TService, unknown>>();
  private readonly invokers = new Map<string, OperationInvoker<TService, unknown>>();
  private readonly options: OperationInvokerOptions & { binder: Binder };

  constructor(options: OperationInvokerOptions = {}) {
    this.options = { ...options, binder: options.binder ?? new Binder() };
  }

  /**
   * Register an operation under its name. Names are unique per table.
   */
  register<TResult>(operation: BoundOperation<TService, TResult>): this {
    if (this.operations.has(operation.name)) {
      throw new InvocationError({
        code: "INVALID_SIGNATURE",
        message: `OperationTable.register: Operation "${operation.name}" is already registered`,
        operation: operation.name,
      });
    }
    this.operations.set(operation.name, operation);
    return this;
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  names(): string[] {
    return [...this.operations.keys()];
  }

  get(name: string): BoundOperation<TService, unknown> {
    const operation = this.operations.get(name);
    if (!operation) {
      throw new InvocationError({
        code: "INVALID_STATE",
        message: `OperationTable.get: Unknown operation "${name}"`,
        operation: name,
      });
    }
    return operation;
  }

  /** Invoker for `name`, created on first use. */
  invokerFor(name: string): OperationInvoker<TService, unknown> {
    const existing = this.invokers.get(name);
    if (existing) return existing;
    const invoker = new OperationInvoker(this.get(name), this.options);
    this.invokers.set(name, invoker);
    return invoker;
  }

  /** Drop all operations and invokers (e.g. on reload). */
  clear(): void {
    this.operations.clear();
    this.invokers.clear();
  }
}
