/**
 * Operation invoker runtime: binder, invoker, completion bridge, operation
 * table, telemetry sinks and configuration.
 */

export { Binder, defaultBinder } from "./binder.js";
export type { CompiledThunk } from "./binder.js";
export { OperationInvoker } from "./invoker.js";
export type { InvokeContext, OperationInvokerOptions, MaybePromise } from "./invoker.js";
export { CompletionBridge, PendingInvocation } from "./bridge.js";
export type { CompletionCallback, EndInvokeResult } from "./bridge.js";
export { OperationTable } from "./operation-table.js";
export {
  emitSafely,
  createLoggerTelemetrySink,
  combineTelemetry,
  createTelemetryFromConfig,
} from "./telemetry.js";
export type { ConfiguredTelemetry } from "./telemetry.js";
export { createNatsTelemetrySink, connectNatsTelemetry } from "./nats-telemetry-sink.js";
export type { NatsTelemetrySinkParams, NatsTelemetryHandle } from "./nats-telemetry-sink.js";
export { loadConfig, InvokerConfigSchema } from "./config.js";
export type { InvokerConfig } from "./config.js";
export { createNodeJSLogger, resolveLogger } from "./logger.js";
export type { Logger, LoggerFactory, LogMethod } from "./logger.js";
