export type RefresherErrorCode = "config_error" | "solver_error" | "publish_error";

export class RefresherError extends Error {
  readonly code: RefresherErrorCode;

  constructor(code: RefresherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised at startup for missing or invalid settings. Fatal.
 */
export class ConfigError extends RefresherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_error", message, options);
  }
}

export interface UpstreamErrorDetails {
  status?: number;
  body?: unknown;
  cause?: unknown;
}

/**
 * Raised when the solver cannot produce cookies for a cycle. Soft: the loop
 * logs it and waits for the next cycle.
 */
export class SolverError extends RefresherError {
  readonly status: number | undefined;
  readonly body: unknown;

  constructor(message: string, details: UpstreamErrorDetails = {}) {
    super("solver_error", message, { cause: details.cause });
    this.status = details.status;
    this.body = details.body;
  }
}

/**
 * Raised when the update endpoint rejects or never receives the cookie. Soft.
 */
export class PublishError extends RefresherError {
  readonly status: number | undefined;
  readonly body: unknown;

  constructor(message: string, details: UpstreamErrorDetails = {}) {
    super("publish_error", message, { cause: details.cause });
    this.status = details.status;
    this.body = details.body;
  }
}
