import { beforeEach, describe, expect, it } from "vitest";
import { HttpClient } from "../../src/http/http-client.ts";
import { CookiePublisher } from "../../src/publisher/cookie-publisher.ts";
import { PublishError } from "../../src/types/errors.ts";
import { MockUpstreams, jsonReply, neverReply } from "../helpers/mock-upstreams.ts";

const UPDATE_ENDPOINT = "http://cookies.local/set/cf_clearance";

function createPublisher(): CookiePublisher {
  return new CookiePublisher({
    updateEndpoint: UPDATE_ENDPOINT,
    endpointAuth: "test-secret",
    timeoutMs: 1000,
  });
}

describe("CookiePublisher", () => {
  let upstreams: MockUpstreams;

  beforeEach(() => {
    upstreams = new MockUpstreams().install();
  });

  it("posts the cookie as JSON with a bearer token", async () => {
    upstreams.route(UPDATE_ENDPOINT, () => jsonReply({ ok: true }));

    await createPublisher().publish("abc123");

    expect(upstreams.requestsTo(UPDATE_ENDPOINT)).toHaveLength(1);
    const [request] = upstreams.requests;
    expect(request?.method).toBe("POST");
    expect(request?.body).toEqual({ cf_clearance: "abc123" });
    expect(request?.headers.get("authorization")).toBe("Bearer test-secret");
    expect(request?.headers.get("content-type")).toBe("application/json");
  });

  it("raises PublishError with the response body on a non-2xx status", async () => {
    upstreams.route(UPDATE_ENDPOINT, () => jsonReply({ error: "unauthorized" }, 401));

    const error = await createPublisher()
      .publish("abc123")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PublishError);
    if (!(error instanceof PublishError)) {
      return;
    }
    expect(error.message).toBe("Update endpoint rejected cookie: HTTP 401");
    expect(error.status).toBe(401);
    expect(error.body).toEqual({ error: "unauthorized" });
    expect(upstreams.requests).toHaveLength(1);
  });

  it("raises PublishError when the endpoint is unreachable", async () => {
    const error = await createPublisher()
      .publish("abc123")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PublishError);
    if (!(error instanceof PublishError)) {
      return;
    }
    expect(error.status).toBeUndefined();
  });

  it("applies its own timeout to an injected client", async () => {
    upstreams.route(UPDATE_ENDPOINT, neverReply);
    const publisher = new CookiePublisher({
      updateEndpoint: UPDATE_ENDPOINT,
      endpointAuth: "test-secret",
      timeoutMs: 20,
      httpClient: new HttpClient({ timeoutMs: 60_000, target: "update" }),
    });

    await expect(publisher.publish("abc123")).rejects.toThrow(
      "Update endpoint rejected cookie: Request timed out after 20ms",
    );
  });

  it("refuses an empty value without calling the endpoint", async () => {
    await expect(createPublisher().publish("")).rejects.toThrow(PublishError);
    expect(upstreams.requests).toHaveLength(0);
  });
});
