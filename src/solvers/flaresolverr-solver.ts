import { HttpClient } from "../http/http-client.ts";
import { logger } from "../observability/logger.ts";
import { hasCredentials, proxyServerUrl } from "../proxy/proxy-resolver.ts";
import type { ProxyDescriptor } from "../types/cookie.ts";
import { expectSolverEnvelope, extractCookies, readSessionId } from "./solver-response.ts";
import type { Solver, SolverProxyPayload, SolverRequestPayload, SolverResult } from "./types.ts";

export interface FlareSolverrOptions {
  solverUrl: string;
  /**
   * Route credentialed proxies through a solver session instead of passing
   * them inline on every request.get.
   */
  useSessions?: boolean;
  httpClient?: HttpClient;
}

export function buildProxyPayload(proxy: ProxyDescriptor): SolverProxyPayload {
  const payload: SolverProxyPayload = { url: proxyServerUrl(proxy) };
  if (proxy.username !== undefined) {
    payload.username = proxy.username;
  }
  if (proxy.password !== undefined) {
    payload.password = proxy.password;
  }
  return payload;
}

/**
 * FlareSolverr speaks a single `/v1` endpoint dispatching on `cmd`.
 */
export class FlareSolverrSolver implements Solver {
  readonly name = "flaresolverr" as const;
  private readonly solverUrl: string;
  private readonly useSessions: boolean;
  private readonly httpClient: HttpClient;

  constructor(options: FlareSolverrOptions) {
    this.solverUrl = options.solverUrl;
    this.useSessions = options.useSessions ?? false;
    this.httpClient = options.httpClient ?? new HttpClient({ timeoutMs: 200_000, target: "solver" });
  }

  async fetchCookies(
    targetUrl: string,
    proxy: ProxyDescriptor | null,
    timeoutMs: number,
  ): Promise<SolverResult> {
    const request: SolverRequestPayload = {
      cmd: "request.get",
      url: targetUrl,
      maxTimeout: timeoutMs,
    };

    if (proxy && this.useSessions && hasCredentials(proxy)) {
      return this.withSession(proxy, timeoutMs, (session) =>
        this.requestCookies({ ...request, session }, timeoutMs),
      );
    }

    if (proxy) {
      request.proxy = buildProxyPayload(proxy);
    }
    return this.requestCookies(request, timeoutMs);
  }

  private async requestCookies(
    request: SolverRequestPayload,
    timeoutMs: number,
  ): Promise<SolverResult> {
    const result = await this.httpClient.post(this.solverUrl, request, {}, timeoutMs);
    const envelope = expectSolverEnvelope(result, "request.get");
    return { cookies: extractCookies(envelope), raw: envelope };
  }

  private async withSession<T>(
    proxy: ProxyDescriptor,
    timeoutMs: number,
    run: (session: string) => Promise<T>,
  ): Promise<T> {
    const created = await this.httpClient.post(
      this.solverUrl,
      { cmd: "sessions.create", proxy: buildProxyPayload(proxy) } satisfies SolverRequestPayload,
      {},
      timeoutMs,
    );
    const session = readSessionId(expectSolverEnvelope(created, "sessions.create"));
    logger.debug({ session }, "Solver session created");

    try {
      return await run(session);
    } finally {
      await this.destroySession(session, timeoutMs);
    }
  }

  private async destroySession(session: string, timeoutMs: number): Promise<void> {
    const result = await this.httpClient.post(
      this.solverUrl,
      { cmd: "sessions.destroy", session } satisfies SolverRequestPayload,
      {},
      timeoutMs,
    );
    if (!result.ok) {
      logger.error(
        { session, status: result.status, body: result.body },
        "Failed to destroy solver session",
      );
      return;
    }
    logger.debug({ session }, "Solver session destroyed");
  }
}
