import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../../src/observability/logger.ts";
import { ByparrSolver } from "../../src/solvers/byparr-solver.ts";
import { createSolver } from "../../src/solvers/solver-factory.ts";
import { FlareSolverrSolver } from "../../src/solvers/flaresolverr-solver.ts";
import type { RefresherConfig } from "../../src/types/config.ts";
import { MockUpstreams, solverReply } from "../helpers/mock-upstreams.ts";

const SOLVER_URL = "http://byparr.local:8191/v1";

describe("ByparrSolver", () => {
  let upstreams: MockUpstreams;

  beforeEach(() => {
    upstreams = new MockUpstreams().install();
    upstreams.route(SOLVER_URL, () => solverReply([{ name: "cf_clearance", value: "byparr-cookie" }]));
  });

  it("sends a request.get and returns cookies", async () => {
    const solver = new ByparrSolver({ solverUrl: SOLVER_URL });

    const { cookies } = await solver.fetchCookies("https://example.com", null, 30_000);

    expect(cookies).toEqual([{ name: "cf_clearance", value: "byparr-cookie" }]);
    expect(upstreams.requests[0]?.body).toEqual({
      cmd: "request.get",
      url: "https://example.com",
      maxTimeout: 30_000,
    });
  });

  it("does not forward a configured proxy", async () => {
    const proxy = { scheme: "socks5", host: "proxy.local", port: 1080 } as const;
    const solver = new ByparrSolver({ solverUrl: SOLVER_URL, proxy });

    await solver.fetchCookies("https://example.com", proxy, 30_000);
    await solver.fetchCookies("https://example.com", proxy, 30_000);

    expect(upstreams.requests).toHaveLength(2);
    for (const request of upstreams.requests) {
      expect(request.body).not.toHaveProperty("proxy");
    }
  });
});

describe("ByparrSolver proxy warning", () => {
  const proxy = { scheme: "http", host: "proxy.local", port: 3128 } as const;

  it("warns once when constructed with a proxy", async () => {
    upstreamsForWarning();
    const warn = vi.spyOn(logger, "warn");

    const solver = new ByparrSolver({ solverUrl: SOLVER_URL, proxy });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "Byparr does not accept a per-request proxy; configure it in the Byparr environment",
    );

    await solver.fetchCookies("https://example.com", proxy, 30_000);
    await solver.fetchCookies("https://example.com", proxy, 30_000);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("stays quiet without a proxy", () => {
    const warn = vi.spyOn(logger, "warn");

    new ByparrSolver({ solverUrl: SOLVER_URL, proxy: null });

    expect(warn).not.toHaveBeenCalled();
  });
});

function upstreamsForWarning(): MockUpstreams {
  return new MockUpstreams()
    .install()
    .route(SOLVER_URL, () => solverReply([{ name: "cf_clearance", value: "byparr-cookie" }]));
}

describe("createSolver", () => {
  const base: RefresherConfig = {
    solverUrl: SOLVER_URL,
    solverType: "flaresolverr",
    targetUrl: "https://example.com",
    solverTimeoutMs: 1000,
    updateEndpoint: "http://cookies.local/set/cf_clearance",
    endpointAuth: "test-secret",
    intervalSeconds: 300,
    minExecIntervalSeconds: 10,
    proxyUrl: null,
    publishTimeoutMs: 1000,
    useSolverSessions: false,
    statusPort: null,
    runOnce: false,
  };

  it("builds the backend named by the solver type", () => {
    expect(createSolver(base, null)).toBeInstanceOf(FlareSolverrSolver);
    expect(createSolver({ ...base, solverType: "byparr" }, null)).toBeInstanceOf(ByparrSolver);
    expect(createSolver({ ...base, solverType: "byparr" }, null).name).toBe("byparr");
  });

  it("passes the proxy to Byparr so the warning fires at startup", () => {
    const warn = vi.spyOn(logger, "warn");

    createSolver(
      { ...base, solverType: "byparr", proxyUrl: "http://proxy.local:3128" },
      { scheme: "http", host: "proxy.local", port: 3128 },
    );

    expect(warn).toHaveBeenCalledTimes(1);
  });
});
