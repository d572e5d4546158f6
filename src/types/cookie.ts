export type ProxyScheme = "http" | "https" | "socks4" | "socks5";

/**
 * ProxyDescriptor is the parsed form of PROXY / PROXY_URL.
 * Credentials are present only when non-empty in the source URL.
 */
export interface ProxyDescriptor {
  scheme: ProxyScheme;
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface SolverCookie {
  name: string;
  value: string;
}

export const CLEARANCE_COOKIE = "cf_clearance";

export interface CookiePayload {
  cf_clearance: string;
}

export type CycleOutcome =
  | { status: "published"; cookie: string }
  | { status: "missing_cookie" }
  | { status: "solver_failed"; error: Error }
  | { status: "publish_failed"; error: Error };

export type LoopState = "idle" | "running";

export interface LoopStatus {
  state: LoopState;
  cycles: number;
  lastOutcome: CycleOutcome["status"] | null;
  lastSuccessAt: Date | null;
}
