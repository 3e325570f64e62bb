import { pino, type DestinationStream, type Logger as PinoLogger } from "pino";

type Level = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface Logger {
  child(bindings?: Record<string, unknown>): Logger;
  fatal(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  trace(msg: string, meta?: Record<string, unknown>): void;
}

export type LoggerOptions = {
  level?: string;
  /** Defaults to stderr; stdout carries the status table and JSONL events. */
  destination?: DestinationStream;
};

function wrap(instance: PinoLogger): Logger {
  type PinoCall = (meta: Record<string, unknown>, msg: string) => void;

  const fns: Record<Level, PinoCall> = {
    fatal: (meta, msg) => instance.fatal(meta, msg),
    error: (meta, msg) => instance.error(meta, msg),
    warn: (meta, msg) => instance.warn(meta, msg),
    info: (meta, msg) => instance.info(meta, msg),
    debug: (meta, msg) => instance.debug(meta, msg),
    trace: (meta, msg) => instance.trace(meta, msg),
  };

  const call = (lvl: Level, msg: string, meta?: Record<string, unknown>) => {
    fns[lvl](meta ?? {}, msg);
  };

  return {
    child: (bindings) => wrap(instance.child(bindings ?? {})),
    fatal: (m, meta) => call("fatal", m, meta),
    error: (m, meta) => call("error", m, meta),
    warn: (m, meta) => call("warn", m, meta),
    info: (m, meta) => call("info", m, meta),
    debug: (m, meta) => call("debug", m, meta),
    trace: (m, meta) => call("trace", m, meta),
  };
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const instance = pino(
    {
      level: opts.level ?? process.env.LOG_LEVEL ?? "info",
      base: null,
    },
    opts.destination ?? process.stderr,
  );
  return wrap(instance);
}

/** A logger that discards everything; used where no logger is injected. */
export const silentLogger: Logger = createLogger({ level: "silent" });
