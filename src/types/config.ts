export type SolverType = "flaresolverr" | "byparr";

export const SOLVER_TYPES: readonly SolverType[] = ["flaresolverr", "byparr"];

export interface RefresherConfig {
  solverUrl: string;
  solverType: SolverType;
  targetUrl: string;
  solverTimeoutMs: number;
  updateEndpoint: string;
  endpointAuth: string;
  intervalSeconds: number;
  minExecIntervalSeconds: number;
  proxyUrl: string | null;
  publishTimeoutMs: number;
  useSolverSessions: boolean;
  statusPort: number | null;
  runOnce: boolean;
}

/**
 * ConfigDocument mirrors the optional refresher.yaml file. Keys use the
 * camelCase names of RefresherConfig; every field is optional because the
 * environment may supply or override any of them.
 */
export interface ConfigDocument {
  solverUrl?: string;
  solverType?: string;
  targetUrl?: string;
  solverTimeoutMs?: number;
  updateEndpoint?: string;
  endpointAuth?: string;
  intervalSeconds?: number;
  minExecIntervalSeconds?: number;
  proxyUrl?: string | null;
  publishTimeoutMs?: number;
  useSolverSessions?: boolean;
  statusPort?: number | null;
  runOnce?: boolean;
}
