export class NotFoundError extends Error {
  constructor(message: string, public code: string = "NOT_FOUND") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class PreconditionError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** A browser, graph API or LLM call failed. The message is safe to show; details stay in the logs. */
export class UpstreamError extends Error {
  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamError";
  }
}

export class ValidationError extends Error {
  constructor(message: string, public code: string = "validation_error") {
    super(message);
    this.name = "ValidationError";
  }
}

export class ParseError extends Error {
  constructor(message: string, public code: string = "parse_error") {
    super(message);
    this.name = "ParseError";
  }
}

export class SessionError extends Error {
  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionError";
  }
}

export class GroupLinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GroupLinkError";
  }
}

export class LLMError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "LLMError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof PreconditionError || error instanceof ConfigError) return 400;
  return 500;
}

/** Message for the `detail` field of an HTTP error. Unknown errors are not echoed back. */
export function publicMessageFor(error: unknown): string {
  if (
    error instanceof NotFoundError ||
    error instanceof PreconditionError ||
    error instanceof ConfigError ||
    error instanceof ValidationError ||
    error instanceof ParseError
  ) {
    return error.message;
  }
  if (error instanceof UpstreamError || error instanceof LLMError || error instanceof SessionError) {
    return `Upstream call failed (${error.code})`;
  }
  if (error instanceof GroupLinkError) {
    return "Failed to link group";
  }
  return "Internal server error";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
