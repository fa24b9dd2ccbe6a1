/**
 * Unit tests for OperationTable.
 */

import { describe, it, expect } from "vitest";
import { defineOperation, InvocationError, type InvocationEvent } from "@invokekit/core";
import { Binder } from "./binder.js";
import { OperationTable } from "./operation-table.js";

interface Greeter {
  greeting: string;
}

const greetOp = defineOperation<Greeter, string>({
  name: "greet",
  inputs: ["who"],
  returns: "value",
  target: (svc, args) => `${svc.greeting}, ${String(args[0])}`,
});

const waveOp = defineOperation<Greeter>({
  name: "wave",
  returns: "async-none",
  target: async () => undefined,
});

describe("OperationTable", () => {
  it("should register and look up operations by name", () => {
    const table = new OperationTable<Greeter>().register(greetOp).register(waveOp);
    expect(table.has("greet")).toBe(true);
    expect(table.has("shout")).toBe(false);
    expect(table.names()).toEqual(["greet", "wave"]);
    expect(table.get("greet")).toBe(greetOp);
  });

  it("should refuse duplicate names", () => {
    const table = new OperationTable<Greeter>().register(greetOp);
    expect(() => table.register(greetOp)).toThrow(
      'OperationTable.register: Operation "greet" is already registered'
    );
  });

  it("should throw INVALID_STATE for unknown operations", () => {
    const table = new OperationTable<Greeter>();
    try {
      table.get("shout");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvocationError);
      expect(err instanceof InvocationError && err.code).toBe("INVALID_STATE");
    }
  });

  it("should memoize one invoker per operation", () => {
    const table = new OperationTable<Greeter>().register(greetOp);
    expect(table.invokerFor("greet")).toBe(table.invokerFor("greet"));
  });

  it("should invoke through the table's binder and telemetry", () => {
    const binder = new Binder();
    const events: InvocationEvent[] = [];
    const table = new OperationTable<Greeter>({
      binder,
      clock: { now: () => 0 },
      telemetry: { isEnabled: () => true, emit: (event) => void events.push(event) },
    }).register(greetOp);

    const outcome = table.invokerFor("greet").invoke({ greeting: "Hello" }, ["Ada"], { correlationId: "c-9" });

    expect(outcome).toEqual({
      status: "succeeded",
      value: "Hello, Ada",
      operation: "greet",
      outputs: [],
      durationMs: 0,
    });
    expect(binder.compiledCount).toBe(1);
    expect(events.map((e) => e.kind)).toEqual(["invoked", "completed"]);
  });

  it("should forget operations and invokers on clear", () => {
    const table = new OperationTable<Greeter>().register(greetOp);
    const before = table.invokerFor("greet");
    table.clear();
    expect(table.names()).toEqual([]);
    table.register(greetOp);
    expect(table.invokerFor("greet")).not.toBe(before);
  });
});
