/**
 * Unit tests for loadConfig.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig } from "./config.js";

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "invoker-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should apply defaults for an empty environment", () => {
    expect(loadConfig({ log: createLogger(), env: {} })).toEqual({
      serviceName: "operation-invoker",
      telemetry: "off",
      cancellationTelemetry: "silent",
      commsUrl: "nats://127.0.0.1:4222",
      telemetrySubject: "invoker.telemetry",
    });
  });

  it("should read values from the environment", () => {
    const config = loadConfig({
      log: createLogger(),
      env: {
        SERVICE_NAME: "orders",
        INVOKER_TELEMETRY: "nats",
        INVOKER_CANCELLATION_TELEMETRY: "distinct",
        COMMS_URL: "nats://comms:4222",
        INVOKER_TELEMETRY_SUBJECT: "orders.telemetry",
      },
    });
    expect(config).toEqual({
      serviceName: "orders",
      telemetry: "nats",
      cancellationTelemetry: "distinct",
      commsUrl: "nats://comms:4222",
      telemetrySubject: "orders.telemetry",
    });
  });

  it("should let the config file override the environment", () => {
    const configPath = join(dir, "invoker.json");
    writeFileSync(configPath, JSON.stringify({ telemetry: "both", cancellationTelemetry: "as-failed" }));
    const log = createLogger();

    const config = loadConfig({ log, env: { CONFIG_PATH: configPath, INVOKER_TELEMETRY: "log" } });

    expect(config.telemetry).toBe("both");
    expect(config.cancellationTelemetry).toBe("as-failed");
    expect(log.info).toHaveBeenCalledWith(
      { configPath },
      "operation-invoker:config:loadConfig - Loaded config from file"
    );
  });

  it("should fall back to defaults for invalid values only", () => {
    const log = createLogger();
    const config = loadConfig({
      log,
      env: { INVOKER_TELEMETRY: "loud", INVOKER_CANCELLATION_TELEMETRY: "distinct" },
    });
    expect(config.telemetry).toBe("off");
    expect(config.cancellationTelemetry).toBe("distinct");
    expect(log.warn).toHaveBeenCalledWith(
      { invalid: ["telemetry"] },
      "operation-invoker:config:loadConfig - Invalid values, using defaults"
    );
  });

  it("should warn and continue when the config file is missing", () => {
    const log = createLogger();
    const configPath = join(dir, "missing.json");
    const config = loadConfig({ log, env: { CONFIG_PATH: configPath } });
    expect(config.telemetry).toBe("off");
    expect(log.warn).toHaveBeenCalledWith({ configPath }, "operation-invoker:config:loadConfig - Config file not found");
  });

  it("should log an error for malformed JSON and use the environment", () => {
    const log = createLogger();
    const configPath = join(dir, "broken.json");
    writeFileSync(configPath, "{ not json");
    const config = loadConfig({ log, env: { CONFIG_PATH: configPath, INVOKER_TELEMETRY: "log" } });
    expect(config.telemetry).toBe("log");
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it("should ignore a config file that is not an object", () => {
    const log = createLogger();
    const configPath = join(dir, "array.json");
    writeFileSync(configPath, "[1, 2]");
    expect(loadConfig({ log, env: { CONFIG_PATH: configPath } }).telemetry).toBe("off");
    expect(log.error).toHaveBeenCalledWith(
      { configPath },
      "operation-invoker:config:loadConfig - Config file is not a JSON object"
    );
  });
});
