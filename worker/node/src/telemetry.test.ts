/**
 * Unit tests for telemetry emission helpers and sinks.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { InvocationEvent, InvocationTelemetry } from "@invokekit/core";

const { connectNatsTelemetry } = vi.hoisted(() => ({ connectNatsTelemetry: vi.fn() }));
vi.mock("./nats-telemetry-sink.js", () => ({ connectNatsTelemetry }));

import {
  combineTelemetry,
  createLoggerTelemetrySink,
  createTelemetryFromConfig,
  emitSafely,
} from "./telemetry.js";
import { InvokerConfigSchema } from "./config.js";

const completed: InvocationEvent = {
  kind: "completed",
  operation: "add",
  correlationId: "corr-1",
  durationMs: 12,
};

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createRecordingSink(enabled = true): InvocationTelemetry & { events: InvocationEvent[] } {
  const events: InvocationEvent[] = [];
  return {
    events,
    isEnabled: () => enabled,
    emit: (event) => {
      events.push(event);
    },
  };
}

describe("emitSafely", () => {
  it("should do nothing without a collector", () => {
    const log = createLogger();
    emitSafely(undefined, completed, log);
    expect(log.warn).not.toHaveBeenCalled();
  });

  it("should skip disabled kinds", () => {
    const sink = createRecordingSink(false);
    emitSafely(sink, completed, createLogger());
    expect(sink.events).toEqual([]);
  });

  it("should log and drop errors from isEnabled", () => {
    const log = createLogger();
    const sink: InvocationTelemetry = {
      isEnabled: () => {
        throw new Error("flag service down");
      },
      emit: vi.fn(),
    };
    expect(() => emitSafely(sink, completed, log)).not.toThrow();
    expect(sink.emit).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith(
      { operation: "add", kind: "completed", error: "flag service down" },
      "operation-invoker:telemetry:emit - Telemetry sink failed"
    );
  });
});

describe("createLoggerTelemetrySink", () => {
  it("should write each event as a structured line", () => {
    const log = createLogger();
    const sink = createLoggerTelemetrySink({ loggerFactory: log });
    void sink.emit(completed);
    expect(log.info).toHaveBeenCalledWith(
      { kind: "completed", operation: "add", correlationId: "corr-1", durationMs: 12 },
      "operation-invoker:telemetry:emit - Operation completed"
    );
  });

  it("should honor the kinds filter and level", () => {
    const log = createLogger();
    const sink = createLoggerTelemetrySink({ loggerFactory: log, kinds: ["failed"], level: "debug" });
    expect(sink.isEnabled("completed")).toBe(false);
    expect(sink.isEnabled("failed")).toBe(true);
    void sink.emit({ ...completed, kind: "failed" });
    expect(log.debug).toHaveBeenCalledTimes(1);
    expect(log.info).not.toHaveBeenCalled();
  });
});

describe("combineTelemetry", () => {
  it("should be enabled when any sink is", () => {
    const combined = combineTelemetry(createRecordingSink(false), createRecordingSink(true));
    expect(combined.isEnabled("invoked")).toBe(true);
    expect(combineTelemetry(createRecordingSink(false)).isEnabled("invoked")).toBe(false);
  });

  it("should deliver only to enabled sinks", async () => {
    const on = createRecordingSink(true);
    const off = createRecordingSink(false);
    await combineTelemetry(on, off).emit(completed);
    expect(on.events).toEqual([completed]);
    expect(off.events).toEqual([]);
  });

  it("should reach every sink and then reject with the failures", async () => {
    const ok = createRecordingSink(true);
    const broken: InvocationTelemetry = {
      isEnabled: () => true,
      emit: () => {
        throw new Error("disk full");
      },
    };
    await expect(combineTelemetry(broken, ok).emit(completed)).rejects.toThrow("1 telemetry sink(s) failed");
    expect(ok.events).toEqual([completed]);
  });
});

describe("createTelemetryFromConfig", () => {
  beforeEach(() => {
    connectNatsTelemetry.mockReset();
  });

  it("should return no collector when telemetry is off", async () => {
    const configured = await createTelemetryFromConfig(InvokerConfigSchema.parse({}));
    expect(configured.telemetry).toBeUndefined();
    await configured.close();
  });

  it("should build a logger sink for log mode", async () => {
    const log = createLogger();
    const configured = await createTelemetryFromConfig(InvokerConfigSchema.parse({ telemetry: "log" }), {
      loggerFactory: log,
    });
    expect(configured.telemetry?.isEnabled("invoked")).toBe(true);
    expect(connectNatsTelemetry).not.toHaveBeenCalled();
  });

  it("should connect to NATS for nats mode and close it on close()", async () => {
    const close = vi.fn().mockResolvedValue(undefined);
    const natsSink = createRecordingSink(true);
    connectNatsTelemetry.mockResolvedValue({ telemetry: natsSink, close });

    const configured = await createTelemetryFromConfig(
      InvokerConfigSchema.parse({ telemetry: "nats", commsUrl: "nats://comms:4222", serviceName: "orders" }),
      { loggerFactory: createLogger() }
    );

    expect(connectNatsTelemetry).toHaveBeenCalledWith(
      expect.objectContaining({ servers: "nats://comms:4222", name: "orders", subjectPrefix: "invoker.telemetry" })
    );
    expect(configured.telemetry).toBe(natsSink);
    await configured.close();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("should fan out to log and NATS in both mode", async () => {
    const log = createLogger();
    const natsSink = createRecordingSink(true);
    connectNatsTelemetry.mockResolvedValue({ telemetry: natsSink, close: vi.fn() });

    const configured = await createTelemetryFromConfig(InvokerConfigSchema.parse({ telemetry: "both" }), {
      loggerFactory: log,
    });
    await configured.telemetry?.emit(completed);

    expect(natsSink.events).toEqual([completed]);
    expect(log.info).toHaveBeenCalledWith(
      { kind: "completed", operation: "add", correlationId: "corr-1", durationMs: 12 },
      "operation-invoker:telemetry:emit - Operation completed"
    );
  });
});
