import { logger } from "../observability/logger.ts";
import { upstreamDuration } from "../observability/metrics.ts";
import type { HttpClientOptions, UpstreamResult, UpstreamTarget } from "./types.ts";

/**
 * HttpClient sends JSON POST requests with a timeout.
 * Centralizes fetch logic, error handling, and metrics tracking.
 */
export class HttpClient {
  private readonly timeoutMs: number;
  private readonly target: UpstreamTarget;

  constructor(options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.target = options.target;
  }

  /**
   * Execute a POST request with timeout. Never throws; transport failures
   * come back as an UpstreamFailure with status 0.
   */
  async post(
    url: string,
    body: unknown,
    headers: Record<string, string> = {},
    timeoutMs: number = this.timeoutMs,
  ): Promise<UpstreamResult<unknown>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const start = process.hrtime.bigint();

    try {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...headers,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      const result = await this.parseResponse(response);
      this.observe(start, String(response.status));
      return result;
    } catch (error) {
      this.observe(start, "error");
      const aborted = controller.signal.aborted;
      logger.warn({ error, url, target: this.target, aborted }, "HTTP POST request failed");
      return {
        ok: false,
        status: 0,
        error: aborted ? new Error(`Request timed out after ${timeoutMs}ms`) : error,
        headers: new Headers(),
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private observe(start: bigint, result: string): void {
    const diff = Number(process.hrtime.bigint() - start) / 1_000_000_000;
    upstreamDuration.observe({ target: this.target, result }, diff);
  }

  /**
   * Parse the response body as JSON when possible, otherwise keep the raw text.
   */
  private async parseResponse(response: Response): Promise<UpstreamResult<unknown>> {
    const headers = response.headers;
    const text = await response.text();
    const body = parseJson(text);

    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        error: body,
        body,
        headers,
      };
    }

    return {
      ok: true,
      status: response.status,
      body,
      headers,
    };
  }
}

function parseJson(text: string): unknown {
  if (!text.trim()) {
    return text;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
