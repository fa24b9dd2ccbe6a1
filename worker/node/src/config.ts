/**
 * Invoker configuration: telemetry mode, cancellation policy, comms.
 */

import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import { CancellationTelemetryPolicySchema } from "@invokekit/core";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "operation-invoker:config";

export const InvokerConfigSchema = z.object({
  /** Connection / log name */
  serviceName: z.string().min(1).default("operation-invoker"),
  /** Where invocation events go */
  telemetry: z.enum(["off", "log", "nats", "both"]).default("off"),
  /** What a cancelled invocation records */
  cancellationTelemetry: CancellationTelemetryPolicySchema.default("silent"),
  /** Comms server URL (NATS telemetry) */
  commsUrl: z.string().min(1).default("nats://127.0.0.1:4222"),
  /** Subject prefix for published events */
  telemetrySubject: z.string().min(1).default("invoker.telemetry"),
});

export type InvokerConfig = z.infer<typeof InvokerConfigSchema>;

function readConfigFile(configPath: string, log: Logger): Record<string, unknown> {
  try {
    if (!existsSync(configPath)) {
      log.warn?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config file not found`);
      return {};
    }
    const data: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      log.error?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config file is not a JSON object`);
      return {};
    }
    log.info?.({ configPath }, `${LOG_PREFIX}:loadConfig - Loaded config from file`);
    return Object.fromEntries(Object.entries(data));
  } catch (err) {
    log.error?.(
      { configPath, error: err instanceof Error ? err.message : String(err) },
      `${LOG_PREFIX}:loadConfig - Failed to load config file`
    );
    return {};
  }
}

/**
 * Load config from environment and optional config file.
 * Env: SERVICE_NAME, INVOKER_TELEMETRY, INVOKER_CANCELLATION_TELEMETRY,
 * COMMS_URL, INVOKER_TELEMETRY_SUBJECT, CONFIG_PATH.
 * Keys in the CONFIG_PATH JSON file override the environment. Invalid
 * values fall back to their defaults.
 */
export function loadConfig(params: { log?: Logger; env?: NodeJS.ProcessEnv } = {}): InvokerConfig {
  const log = params.log ?? console;
  const env = params.env ?? process.env;

  const raw: Record<string, unknown> = {
    serviceName: env.SERVICE_NAME,
    telemetry: env.INVOKER_TELEMETRY,
    cancellationTelemetry: env.INVOKER_CANCELLATION_TELEMETRY,
    commsUrl: env.COMMS_URL,
    telemetrySubject: env.INVOKER_TELEMETRY_SUBJECT,
    ...(env.CONFIG_PATH ? readConfigFile(env.CONFIG_PATH, log) : {}),
  };

  const parsed = InvokerConfigSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
  log.warn?.({ invalid: [...invalid] }, `${LOG_PREFIX}:loadConfig - Invalid values, using defaults`);
  const cleaned = Object.fromEntries(Object.entries(raw).filter(([key]) => !invalid.has(key)));
  return InvokerConfigSchema.parse(cleaned);
}
