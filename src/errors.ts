import { ZodError } from "zod";

/**
 * Failure taxonomy shared by every unreliable call. Retry policies and circuit
 * breakers match on the kind, never on the error class.
 */
export type FailureKind =
  | "TransientNetwork"
  | "DataUnavailable"
  | "Validation"
  | "Fatal"
  | "CircuitOpen";

export class MonitorError extends Error {
  constructor(
    message: string,
    readonly kind: FailureKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MonitorError";
  }
}

export class CircuitOpenError extends MonitorError {
  constructor(readonly circuitName: string) {
    super(`Circuit "${circuitName}" is open; call rejected`, "CircuitOpen");
    this.name = "CircuitOpenError";
  }
}

const TRANSIENT_CODES = new Set([
  "NETWORK_ERROR",
  "TIMEOUT",
  "SERVER_ERROR",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const VALIDATION_CODES = new Set([
  "INVALID_ARGUMENT",
  "NUMERIC_FAULT",
  "MISSING_ARGUMENT",
]);

const readCode = (error: unknown): string | undefined => {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
};

export const classifyFailure = (
  error: unknown,
  fallbackKind: FailureKind = "TransientNetwork",
): FailureKind => {
  if (error instanceof MonitorError) {
    return error.kind;
  }
  if (error instanceof ZodError) {
    return "Validation";
  }
  const code = readCode(error);
  if (code && TRANSIENT_CODES.has(code)) {
    return "TransientNetwork";
  }
  if (code && VALIDATION_CODES.has(code)) {
    return "Validation";
  }
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return "TransientNetwork";
    }
    if (error instanceof TypeError && error.message === "fetch failed") {
      return "TransientNetwork";
    }
  }
  return fallbackKind;
};

export const toMonitorError = (
  error: unknown,
  fallbackKind: FailureKind = "TransientNetwork",
): MonitorError => {
  if (error instanceof MonitorError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new MonitorError(message, classifyFailure(error, fallbackKind), {
    cause: error,
  });
};
