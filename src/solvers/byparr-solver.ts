import { HttpClient } from "../http/http-client.ts";
import { logger } from "../observability/logger.ts";
import type { ProxyDescriptor } from "../types/cookie.ts";
import { expectSolverEnvelope, extractCookies } from "./solver-response.ts";
import type { Solver, SolverRequestPayload, SolverResult } from "./types.ts";

export interface ByparrOptions {
  solverUrl: string;
  /**
   * The proxy configured for the refresher. Only used to warn that Byparr
   * ignores it.
   */
  proxy?: ProxyDescriptor | null;
  httpClient?: HttpClient;
}

/**
 * Byparr accepts the FlareSolverr request.get shape but takes its outbound
 * proxy from its own environment, so a configured proxy is not forwarded.
 */
export class ByparrSolver implements Solver {
  readonly name = "byparr" as const;
  private readonly solverUrl: string;
  private readonly httpClient: HttpClient;

  constructor(options: ByparrOptions) {
    this.solverUrl = options.solverUrl;
    this.httpClient = options.httpClient ?? new HttpClient({ timeoutMs: 200_000, target: "solver" });
    if (options.proxy) {
      logger.warn("Byparr does not accept a per-request proxy; configure it in the Byparr environment");
    }
  }

  async fetchCookies(
    targetUrl: string,
    _proxy: ProxyDescriptor | null,
    timeoutMs: number,
  ): Promise<SolverResult> {
    const request: SolverRequestPayload = {
      cmd: "request.get",
      url: targetUrl,
      maxTimeout: timeoutMs,
    };
    const result = await this.httpClient.post(this.solverUrl, request, {}, timeoutMs);
    const envelope = expectSolverEnvelope(result, "request.get");
    return { cookies: extractCookies(envelope), raw: envelope };
  }
}
