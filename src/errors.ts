export class BridgeError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BridgeError";
    this.code = code;
  }
}

// ── Domain errors ──

/** A backend producer or consumer could not be created or reached. */
export class BackendUnavailableError extends BridgeError {
  readonly topicName: string | undefined;

  constructor(message: string, options?: ErrorOptions & { topicName?: string }) {
    super(message, "BACKEND_UNAVAILABLE", options);
    this.name = "BackendUnavailableError";
    this.topicName = options?.topicName;
  }
}

export class ProtocolViolationError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROTOCOL_VIOLATION", options);
    this.name = "ProtocolViolationError";
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to BridgeError (preserves cause chain). */
export function toBridgeError(value: unknown): BridgeError {
  if (value instanceof BridgeError) return value;
  if (value instanceof Error) return new BridgeError(value.message, "UNKNOWN", { cause: value });
  return new BridgeError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Error raised by a blocked receive when its AbortSignal fires. */
export function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}
