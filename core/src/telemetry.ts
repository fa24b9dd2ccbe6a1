/**
 * Invocation telemetry contract (OTEL-friendly, sink-agnostic).
 *
 * The invoker emits one "invoked" event before dispatch and at most one
 * terminal event after classification. Sinks are observational only.
 */

import { z } from "zod";

export type InvocationEventKind = "invoked" | "completed" | "faulted" | "failed" | "cancelled";

export type TerminalEventKind = Exclude<InvocationEventKind, "invoked">;

export interface InvokedEvent {
  kind: "invoked";
  operation: string;
  correlationId?: string;
  caller?: string;
  timestampMs: number;
}

export interface TerminalEvent {
  kind: TerminalEventKind;
  operation: string;
  correlationId?: string;
  durationMs: number;
}

export type InvocationEvent = InvokedEvent | TerminalEvent;

/** Collector the invoker reports to. emit may be async; its failures are isolated. */
export interface InvocationTelemetry {
  isEnabled(kind: InvocationEventKind): boolean;
  emit(event: InvocationEvent): void | Promise<void>;
}

/**
 * What to record when an invocation ends cancelled.
 * - silent: no terminal event
 * - as-failed: a "failed" event
 * - distinct: a "cancelled" event
 */
export type CancellationTelemetryPolicy = "silent" | "as-failed" | "distinct";

export const CancellationTelemetryPolicySchema = z.enum(["silent", "as-failed", "distinct"]);

export const InvokedEventSchema = z.object({
  kind: z.literal("invoked"),
  operation: z.string(),
  correlationId: z.string().optional(),
  caller: z.string().optional(),
  timestampMs: z.number(),
});

export const TerminalEventSchema = z.object({
  kind: z.enum(["completed", "faulted", "failed", "cancelled"]),
  operation: z.string(),
  correlationId: z.string().optional(),
  durationMs: z.number().nonnegative(),
});

export const InvocationEventSchema = z.union([InvokedEventSchema, TerminalEventSchema]);
