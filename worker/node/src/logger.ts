/**
 * Minimal structured logger for the invoker. Prefix + method in the message,
 * structured context alongside. Any logger with the same (ctx, msg) shape
 * (pino, bunyan) can be passed in instead.
 */

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Either a Logger or a factory with get(name) returning one. */
export type LoggerFactory = Logger | { get(name: string): Logger };

type Level = "debug" | "info" | "warn" | "error";

function log(level: Level, ctx: Record<string, unknown>, msg: string): void {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  const line = JSON.stringify({ level, ...payload });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. get(prefix) returns a logger whose
 * lines carry the service name and prefix.
 */
export function createNodeJSLogger(serviceName: string): { get(prefix: string): Logger } {
  return {
    get(prefix: string) {
      const tag = { service: serviceName, prefix };
      return {
        debug: (ctx, msg) => log("debug", { ...ctx, ...tag }, msg),
        info: (ctx, msg) => log("info", { ...ctx, ...tag }, msg),
        warn: (ctx, msg) => log("warn", { ...ctx, ...tag }, msg),
        error: (ctx, msg) => log("error", { ...ctx, ...tag }, msg),
      };
    },
  };
}

/** Resolve a logger from a factory (supports factory.get(name) or a plain logger). */
export function resolveLogger(factory: LoggerFactory | undefined, name: string): Logger {
  if (!factory) return console;
  return "get" in factory ? factory.get(name) : factory;
}
