/**
 * Telemetry emission for the invoker: failure isolation, a structured-log
 * sink, fan-out, and construction from config.
 */

import type {
  InvocationEvent,
  InvocationEventKind,
  InvocationTelemetry,
} from "@invokekit/core";
import type { InvokerConfig } from "./config.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { connectNatsTelemetry } from "./nats-telemetry-sink.js";

const LOG_PREFIX = "operation-invoker:telemetry";

const ALL_KINDS: readonly InvocationEventKind[] = ["invoked", "completed", "faulted", "failed", "cancelled"];

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Emit one event if the collector wants it. Anything the collector throws
 * or rejects with is logged and dropped here; it never reaches the caller.
 */
export function emitSafely(
  telemetry: InvocationTelemetry | undefined,
  event: InvocationEvent,
  log: Logger
): void {
  if (!telemetry) return;
  const report = (err: unknown): void => {
    log.warn?.(
      { operation: event.operation, kind: event.kind, error: errorMessage(err) },
      `${LOG_PREFIX}:emit - Telemetry sink failed`
    );
  };
  try {
    if (!telemetry.isEnabled(event.kind)) return;
    const pending = telemetry.emit(event);
    if (pending instanceof Promise) {
      pending.catch(report);
    }
  } catch (err) {
    report(err);
  }
}

/**
 * Sink that writes every event as a structured log line.
 */
export function createLoggerTelemetrySink(params: {
  loggerFactory?: LoggerFactory;
  kinds?: readonly InvocationEventKind[];
  level?: "debug" | "info";
} = {}): InvocationTelemetry {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  const kinds = new Set(params.kinds ?? ALL_KINDS);
  const level = params.level ?? "info";
  return {
    isEnabled: (kind) => kinds.has(kind),
    emit(event) {
      log[level]?.({ ...event }, `${LOG_PREFIX}:emit - Operation ${event.kind}`);
    },
  };
}

/**
 * Fan one event out to several collectors. Enabled for a kind when any
 * collector is. Rejects with an AggregateError naming every collector that failed.
 */
export function combineTelemetry(...sinks: InvocationTelemetry[]): InvocationTelemetry {
  return {
    isEnabled: (kind) => sinks.some((sink) => sink.isEnabled(kind)),
    async emit(event) {
      const results = await Promise.allSettled(
        sinks
          .filter((sink) => sink.isEnabled(event.kind))
          .map(async (sink) => sink.emit(event))
      );
      const errors = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
      if (errors.length > 0) {
        throw new AggregateError(errors, `${errors.length} telemetry sink(s) failed`);
      }
    },
  };
}

export interface ConfiguredTelemetry {
  telemetry?: InvocationTelemetry;
  close(): Promise<void>;
}

/**
 * Build the collector selected by config.telemetry. "nats" and "both" open a
 * connection to config.commsUrl; close() drains it.
 */
export async function createTelemetryFromConfig(
  config: InvokerConfig,
  deps: { loggerFactory?: LoggerFactory } = {}
): Promise<ConfiguredTelemetry> {
  const log = resolveLogger(deps.loggerFactory, LOG_PREFIX);
  const logSink = (): InvocationTelemetry => createLoggerTelemetrySink({ loggerFactory: deps.loggerFactory });

  switch (config.telemetry) {
    case "off":
      return { close: async () => undefined };
    case "log":
      return { telemetry: logSink(), close: async () => undefined };
    case "nats":
    case "both": {
      const nats = await connectNatsTelemetry({
        servers: config.commsUrl,
        name: config.serviceName,
        subjectPrefix: config.telemetrySubject,
        loggerFactory: deps.loggerFactory,
      });
      log.info?.(
        { mode: config.telemetry, subject: config.telemetrySubject },
        `${LOG_PREFIX}:createTelemetryFromConfig - Telemetry ready`
      );
      return {
        telemetry: config.telemetry === "both" ? combineTelemetry(logSink(), nats.telemetry) : nats.telemetry,
        close: nats.close,
      };
    }
  }
}
