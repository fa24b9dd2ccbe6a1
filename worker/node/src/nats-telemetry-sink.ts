/**
 * NATS telemetry sink: publishes each invocation event as JSON on
 * `<subjectPrefix>.<kind>`, e.g. invoker.telemetry.completed.
 */

import { connect, StringCodec, type NatsConnection } from "nats";
import type { InvocationEventKind, InvocationTelemetry } from "@invokekit/core";
import { resolveLogger, type LoggerFactory } from "./logger.js";

const LOG_PREFIX = "operation-invoker:nats-telemetry";
const sc = StringCodec();

const DEFAULT_KINDS: readonly InvocationEventKind[] = ["invoked", "completed", "faulted", "failed", "cancelled"];

export interface NatsTelemetrySinkParams {
  connection: Pick<NatsConnection, "publish">;
  subjectPrefix: string;
  kinds?: readonly InvocationEventKind[];
}

export function createNatsTelemetrySink(params: NatsTelemetrySinkParams): InvocationTelemetry {
  const kinds = new Set(params.kinds ?? DEFAULT_KINDS);
  return {
    isEnabled: (kind) => kinds.has(kind),
    emit(event) {
      params.connection.publish(`${params.subjectPrefix}.${event.kind}`, sc.encode(JSON.stringify(event)));
    },
  };
}

export interface NatsTelemetryHandle {
  telemetry: InvocationTelemetry;
  close(): Promise<void>;
}

/**
 * Connect to NATS and return a sink over the new connection.
 */
export async function connectNatsTelemetry(params: {
  servers: string;
  name: string;
  subjectPrefix: string;
  kinds?: readonly InvocationEventKind[];
  loggerFactory?: LoggerFactory;
}): Promise<NatsTelemetryHandle> {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  log.info?.({ servers: params.servers, name: params.name }, `${LOG_PREFIX}:connect - Connecting`);
  const connection = await connect({ servers: params.servers, name: params.name });
  log.info?.({}, `${LOG_PREFIX}:connect - Connected`);

  return {
    telemetry: createNatsTelemetrySink({
      connection,
      subjectPrefix: params.subjectPrefix,
      kinds: params.kinds,
    }),
    async close() {
      await connection.drain();
      log.info?.({}, `${LOG_PREFIX}:close - Drained`);
    },
  };
}
