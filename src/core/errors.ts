export class MalformedPayloadError extends Error {
  constructor(message: string, public code: string = "MALFORMED_PAYLOAD", public field?: string) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}

export class BackendUnavailableError extends Error {
  constructor(message: string, public code: string = "BACKEND_UNAVAILABLE", public cause?: unknown) {
    super(message);
    this.name = "BackendUnavailableError";
  }
}

export class StoreFailureError extends Error {
  constructor(message: string, public code: string = "STORE_FAILURE", public cause?: unknown) {
    super(message);
    this.name = "StoreFailureError";
  }
}

export class ThreadExpansionError extends Error {
  constructor(message: string, public conversationId: string, public cause?: unknown) {
    super(message);
    this.name = "ThreadExpansionError";
  }

  readonly code = "THREAD_EXPANSION_FAILED";
}

export class NotFoundError extends Error {
  constructor(message: string, public code: string = "TARGET_NOT_FOUND") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class AuthError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "AuthError";
  }
}

export class RateLimitError extends Error {
  constructor(message: string, public code: string = "RATE_LIMITED", public retryAfterSeconds?: number) {
    super(message);
    this.name = "RateLimitError";
  }
}

export class TargetParseError extends Error {
  constructor(message: string, public code: string = "UNSUPPORTED_TARGET") {
    super(message);
    this.name = "TargetParseError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorCode(error: unknown): string {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "UNKNOWN_ERROR";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
