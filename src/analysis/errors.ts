export type AnalysisErrorCode =
  | "CONFIGURATION"
  | "ORACLE_UNAVAILABLE"
  | "MALFORMED_OUTPUT"
  | "CHAT_FAILURE";

const PROVIDER_KEY_PATTERN = /\bsk-(?:ant-)?[A-Za-z0-9_-]{8,}/g;

/**
 * Strip credentials from a message before it leaves the process.
 * Known secrets are replaced verbatim; anything shaped like a provider key is
 * replaced by pattern.
 */
export function redactSecrets(message: string, secrets: readonly string[] = []): string {
  let redacted = message;
  for (const secret of secrets) {
    if (secret.length > 0) redacted = redacted.split(secret).join("[REDACTED]");
  }
  return redacted.replace(PROVIDER_KEY_PATTERN, "[REDACTED]");
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(redactSecrets(message), options);
    this.name = "ConfigurationError";
  }
}

export class OracleUnavailableError extends Error {
  readonly code = "ORACLE_UNAVAILABLE" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(redactSecrets(message), options);
    this.name = "OracleUnavailableError";
  }
}

export class MalformedOutputError extends Error {
  readonly code = "MALFORMED_OUTPUT" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(redactSecrets(message), options);
    this.name = "MalformedOutputError";
  }
}

/** Raised inside the investigation flow only; always recovered into an answer. */
export class ChatFailureError extends Error {
  readonly code = "CHAT_FAILURE" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(redactSecrets(message), options);
    this.name = "ChatFailureError";
  }
}

export type AnalysisError =
  | ConfigurationError
  | OracleUnavailableError
  | MalformedOutputError
  | ChatFailureError;

export function isAnalysisError(error: unknown): error is AnalysisError {
  return (
    error instanceof ConfigurationError ||
    error instanceof OracleUnavailableError ||
    error instanceof MalformedOutputError ||
    error instanceof ChatFailureError
  );
}
