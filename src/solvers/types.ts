import type { SolverType } from "../types/config.ts";
import type { ProxyDescriptor, SolverCookie } from "../types/cookie.ts";

/**
 * Cookies from one solver run, together with the response envelope they
 * came from so callers can log what the solver actually returned.
 */
export interface SolverResult {
  cookies: SolverCookie[];
  raw: unknown;
}

/**
 * Solver is the capability every browser-solver backend provides: load the
 * target through a real browser and hand back the resulting cookies.
 */
export interface Solver {
  readonly name: SolverType;
  fetchCookies(
    targetUrl: string,
    proxy: ProxyDescriptor | null,
    timeoutMs: number,
  ): Promise<SolverResult>;
}

export interface SolverProxyPayload {
  url: string;
  username?: string;
  password?: string;
}

export interface SolverRequestPayload {
  cmd: "request.get" | "sessions.create" | "sessions.destroy";
  url?: string;
  maxTimeout?: number;
  proxy?: SolverProxyPayload;
  session?: string;
}
