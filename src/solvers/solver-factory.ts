import { HttpClient } from "../http/http-client.ts";
import type { RefresherConfig } from "../types/config.ts";
import type { ProxyDescriptor } from "../types/cookie.ts";
import { ByparrSolver } from "./byparr-solver.ts";
import { FlareSolverrSolver } from "./flaresolverr-solver.ts";
import type { Solver } from "./types.ts";

export function createSolver(config: Readonly<RefresherConfig>, proxy: ProxyDescriptor | null): Solver {
  const httpClient = new HttpClient({ timeoutMs: config.solverTimeoutMs, target: "solver" });
  switch (config.solverType) {
    case "flaresolverr":
      return new FlareSolverrSolver({
        solverUrl: config.solverUrl,
        useSessions: config.useSolverSessions,
        httpClient,
      });
    case "byparr":
      return new ByparrSolver({ solverUrl: config.solverUrl, proxy, httpClient });
  }
}
