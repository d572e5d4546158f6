import type { SolverCookie } from "../types/cookie.ts";
import { SolverError } from "../types/errors.ts";
import type { UpstreamResult } from "../http/types.ts";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Unwrap a solver HTTP result into its JSON envelope, checking transport,
 * HTTP status, JSON shape and the solver's own `status: "ok"` flag.
 */
export function expectSolverEnvelope(
  result: UpstreamResult<unknown>,
  action: string,
): Record<string, unknown> {
  if (!result.ok) {
    const reason = result.status === 0 ? describeError(result.error) : `HTTP ${result.status}`;
    throw new SolverError(`Solver ${action} failed: ${reason}`, {
      status: result.status || undefined,
      body: result.body,
      cause: result.error,
    });
  }

  if (!isRecord(result.body)) {
    throw new SolverError(`Solver ${action} returned a non-JSON body`, {
      status: result.status,
      body: result.body,
    });
  }

  const envelope = result.body;
  if (envelope.status !== "ok") {
    const message = typeof envelope.message === "string" ? envelope.message : "unknown error";
    throw new SolverError(`Solver ${action} reported status ${String(envelope.status)}: ${message}`, {
      status: result.status,
      body: envelope,
    });
  }

  return envelope;
}

/**
 * Pull `solution.cookies` out of a request.get envelope. Records without a
 * string name and value are skipped.
 */
export function extractCookies(envelope: Record<string, unknown>): SolverCookie[] {
  const solution = envelope.solution;
  const cookies = isRecord(solution) ? solution.cookies : undefined;
  if (!Array.isArray(cookies)) {
    throw new SolverError("Solver response is missing solution.cookies", { body: envelope });
  }

  const result: SolverCookie[] = [];
  for (const cookie of cookies) {
    if (isRecord(cookie) && typeof cookie.name === "string" && typeof cookie.value === "string") {
      result.push({ name: cookie.name, value: cookie.value });
    }
  }
  return result;
}

/**
 * Look up a cookie value by name. An empty value counts as absent.
 */
export function findCookie(cookies: readonly SolverCookie[], name: string): string | null {
  const match = cookies.find((cookie) => cookie.name === name);
  return match?.value ? match.value : null;
}

export function readSessionId(envelope: Record<string, unknown>): string {
  const solution = envelope.solution;
  const session = isRecord(solution) ? solution.session : envelope.session;
  if (typeof session !== "string" || !session) {
    throw new SolverError("Solver did not return a session id", { body: envelope });
  }
  return session;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
