export type ValidationSubKind = "Schema" | "Graph" | "Introspection" | "PartialExecution";

export type ErrorKind =
  | "ConfigError"
  | "SyntaxError"
  | "EnvironmentError"
  | "RegistrationError"
  | "InstantiationError"
  | "CaptureError"
  | `ValidationError.${ValidationSubKind}`
  | "ExecutionError"
  | "Timeout"
  | "Cancelled";

/** Serialized form carried by level and sub-level results. */
export type ErrorInfo = {
  kind: ErrorKind;
  message: string;
  details: string | null;
};

export class EngineError extends Error {
  readonly kind: ErrorKind;
  readonly details: string | null;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions & { details?: string }) {
    super(message, options);
    this.name = "EngineError";
    this.kind = kind;
    this.details = options?.details ?? null;
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message, details: this.details };
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, options?: ErrorOptions & { details?: string }) {
    super("ConfigError", message, options);
    this.name = "ConfigError";
  }
}

export class EnvironmentError extends EngineError {
  constructor(message: string, options?: ErrorOptions & { details?: string }) {
    super("EnvironmentError", message, options);
    this.name = "EnvironmentError";
  }
}

export class RegistrationError extends EngineError {
  constructor(message: string, options?: ErrorOptions & { details?: string }) {
    super("RegistrationError", message, options);
    this.name = "RegistrationError";
  }
}

export class InstantiationError extends EngineError {
  constructor(message: string, options?: ErrorOptions & { details?: string }) {
    super("InstantiationError", message, options);
    this.name = "InstantiationError";
  }
}

export class ValidationError extends EngineError {
  readonly subKind: ValidationSubKind;

  constructor(subKind: ValidationSubKind, message: string, options?: ErrorOptions & { details?: string }) {
    super(`ValidationError.${subKind}`, message, options);
    this.name = "ValidationError";
    this.subKind = subKind;
  }
}

export class ExecutionError extends EngineError {
  constructor(message: string, options?: ErrorOptions & { details?: string }) {
    super("ExecutionError", message, options);
    this.name = "ExecutionError";
  }
}

export class TimeoutError extends EngineError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("Timeout", `${label} timed out after ${formatSeconds(timeoutMs)}`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends EngineError {
  constructor(label: string) {
    super("Cancelled", `${label} was cancelled`);
    this.name = "CancelledError";
  }
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

/**
 * Convert anything thrown inside a level into an ErrorInfo. Engine errors keep
 * their own kind; foreign values take the fallback kind of the failing level.
 */
export function toErrorInfo(err: unknown, fallback: ErrorKind): ErrorInfo {
  if (err instanceof EngineError) return err.toInfo();
  if (err instanceof Error) {
    return { kind: fallback, message: err.message, details: err.stack ?? null };
  }
  return { kind: fallback, message: String(err), details: null };
}
