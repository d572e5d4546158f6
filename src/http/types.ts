/**
 * UpstreamSuccess represents a 2xx response from an upstream service.
 */
export interface UpstreamSuccess<T> {
  ok: true;
  status: number;
  body: T;
  headers: Headers;
}

/**
 * UpstreamFailure represents a non-2xx response or a transport failure.
 * Transport failures (refused connection, timeout) carry status 0.
 */
export interface UpstreamFailure {
  ok: false;
  status: number;
  error: unknown;
  body?: unknown;
  headers: Headers;
}

/**
 * UpstreamResult is a discriminated union for upstream responses.
 */
export type UpstreamResult<T> = UpstreamSuccess<T> | UpstreamFailure;

export type UpstreamTarget = "solver" | "update";

/**
 * HttpClientOptions configures the HTTP client behavior.
 */
export interface HttpClientOptions {
  timeoutMs: number;
  target: UpstreamTarget;
}
