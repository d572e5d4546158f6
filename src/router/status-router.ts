import type { Registry } from "prom-client";
import type { LoopStatus } from "../types/cookie.ts";
import { errorResponse, jsonResponse } from "./responses.ts";

export interface StatusRouterOptions {
  getStatus: () => LoopStatus;
  metricsRegistry: Registry;
  startedAt: Date;
}

/**
 * StatusRouter exposes liveness and Prometheus metrics for the refresh loop.
 * Health is "degraded" when the most recent cycle did not publish a cookie.
 */
export class StatusRouter {
  private readonly getStatus: () => LoopStatus;
  private readonly metricsRegistry: Registry;
  private readonly startedAt: Date;

  constructor(options: StatusRouterOptions) {
    this.getStatus = options.getStatus;
    this.metricsRegistry = options.metricsRegistry;
    this.startedAt = options.startedAt;
  }

  async handle(request: Request): Promise<Response> {
    const url = new URL(request.url);

    if (request.method !== "GET") {
      return errorResponse("Method not allowed", 405, "method_not_allowed");
    }

    if (url.pathname === "/healthz") {
      return this.health();
    }

    if (url.pathname === "/metrics") {
      const body = await this.metricsRegistry.metrics();
      return new Response(body, {
        status: 200,
        headers: { "content-type": this.metricsRegistry.contentType },
      });
    }

    return errorResponse("Not found", 404, "not_found");
  }

  private health(): Response {
    const status = this.getStatus();
    const healthy = status.lastOutcome === null || status.lastOutcome === "published";
    return jsonResponse(
      {
        status: healthy ? "ok" : "degraded",
        state: status.state,
        cycles: status.cycles,
        lastOutcome: status.lastOutcome,
        lastSuccessAt: status.lastSuccessAt?.toISOString() ?? null,
        uptime: Math.floor((Date.now() - this.startedAt.getTime()) / 1000),
      },
      { status: healthy ? 200 : 503 },
    );
  }
}
