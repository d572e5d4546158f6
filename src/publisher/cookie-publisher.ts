import { HttpClient } from "../http/http-client.ts";
import { logger } from "../observability/logger.ts";
import type { CookiePayload } from "../types/cookie.ts";
import { PublishError } from "../types/errors.ts";

export interface CookiePublisherOptions {
  updateEndpoint: string;
  endpointAuth: string;
  timeoutMs: number;
  httpClient?: HttpClient;
}

/**
 * CookiePublisher forwards a cf_clearance value to the update endpoint,
 * authenticating with a static bearer token.
 */
export class CookiePublisher {
  private readonly updateEndpoint: string;
  private readonly endpointAuth: string;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;

  constructor(options: CookiePublisherOptions) {
    this.updateEndpoint = options.updateEndpoint;
    this.endpointAuth = options.endpointAuth;
    this.timeoutMs = options.timeoutMs;
    this.httpClient =
      options.httpClient ?? new HttpClient({ timeoutMs: options.timeoutMs, target: "update" });
  }

  async publish(value: string): Promise<void> {
    if (!value) {
      throw new PublishError("Refusing to publish an empty cookie value");
    }

    const payload: CookiePayload = { cf_clearance: value };
    const result = await this.httpClient.post(
      this.updateEndpoint,
      payload,
      { Authorization: `Bearer ${this.endpointAuth}` },
      this.timeoutMs,
    );

    if (!result.ok) {
      const reason =
        result.status === 0
          ? result.error instanceof Error
            ? result.error.message
            : String(result.error)
          : `HTTP ${result.status}`;
      throw new PublishError(`Update endpoint rejected cookie: ${reason}`, {
        status: result.status || undefined,
        body: result.body,
        cause: result.error,
      });
    }

    logger.debug({ status: result.status, body: result.body }, "Update endpoint accepted cookie");
  }
}
