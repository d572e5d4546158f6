import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import YAML from "yaml";
import { logger } from "../observability/logger.ts";
import { SOLVER_TYPES, type ConfigDocument, type RefresherConfig, type SolverType } from "../types/config.ts";
import { ConfigError } from "../types/errors.ts";

const DEFAULT_CONFIG = {
  solverUrl: "http://localhost:8191",
  solverType: "flaresolverr",
  solverTimeoutMs: 200_000,
  intervalSeconds: 300,
  minExecIntervalSeconds: 10,
  proxyUrl: null,
  publishTimeoutMs: 30_000,
  useSolverSessions: false,
  statusPort: null,
  runOnce: false,
} satisfies Partial<RefresherConfig>;

// setTimeout fires after 1 ms for any delay above 2^31 - 1 ms.
const MAX_TIMER_MS = 2_147_483_647;
const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

/**
 * Environment variables for each setting, in lookup order.
 */
const ENV_NAMES: Record<keyof RefresherConfig, readonly string[]> = {
  solverUrl: ["SOLVER_URL", "FLARESOLVERR_URL"],
  solverType: ["SOLVER_TYPE"],
  targetUrl: ["TARGET_URL"],
  solverTimeoutMs: ["SOLVER_TIMEOUT"],
  updateEndpoint: ["UPDATE_ENDPOINT"],
  endpointAuth: ["ENDPOINT_AUTH"],
  intervalSeconds: ["INTERVAL"],
  minExecIntervalSeconds: ["MIN_EXEC_INTERVAL"],
  proxyUrl: ["PROXY", "PROXY_URL"],
  publishTimeoutMs: ["PUBLISH_TIMEOUT"],
  useSolverSessions: ["SOLVER_SESSIONS"],
  statusPort: ["STATUS_PORT"],
  runOnce: ["RUN_ONCE"],
};

export interface ConfigManagerOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * ConfigManager resolves the refresher configuration once at startup.
 * Priority: environment variable > refresher.yaml > built-in default.
 */
export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;
  private readonly config: Readonly<RefresherConfig>;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = this.resolveConfigPath(options.configPath, this.env.REFRESHER_CONFIG_PATH);
    this.config = Object.freeze(this.load());
  }

  private resolveConfigPath(cliOption: string | undefined, envVar: string | undefined): string {
    if (cliOption) {
      return resolve(cliOption);
    }
    if (envVar) {
      return resolve(envVar);
    }
    return resolve(process.cwd(), "refresher.yaml");
  }

  getConfig(): Readonly<RefresherConfig> {
    return this.config;
  }

  private load(): RefresherConfig {
    const doc = this.readDocument(this.configPath);
    const pick = (key: keyof RefresherConfig): unknown => {
      for (const name of ENV_NAMES[key]) {
        const value = this.env[name];
        if (value !== undefined && value.trim() !== "") {
          return value.trim();
        }
      }
      return doc[key];
    };

    const intervalSeconds = readInteger(
      "INTERVAL",
      pick("intervalSeconds"),
      DEFAULT_CONFIG.intervalSeconds,
      1,
      MAX_TIMER_SECONDS,
    );
    const minExecIntervalSeconds = readInteger(
      "MIN_EXEC_INTERVAL",
      pick("minExecIntervalSeconds"),
      DEFAULT_CONFIG.minExecIntervalSeconds,
      0,
      MAX_TIMER_SECONDS,
    );

    const config: RefresherConfig = {
      solverUrl: normalizeSolverUrl(
        readHttpUrl("SOLVER_URL", pick("solverUrl") ?? DEFAULT_CONFIG.solverUrl),
      ),
      solverType: readSolverType(pick("solverType")),
      targetUrl: readHttpUrl("TARGET_URL", pick("targetUrl")),
      solverTimeoutMs: readInteger(
        "SOLVER_TIMEOUT",
        pick("solverTimeoutMs"),
        DEFAULT_CONFIG.solverTimeoutMs,
        1,
        MAX_TIMER_MS,
      ),
      updateEndpoint: readHttpUrl("UPDATE_ENDPOINT", pick("updateEndpoint")),
      endpointAuth: readRequiredString("ENDPOINT_AUTH", pick("endpointAuth")),
      intervalSeconds,
      minExecIntervalSeconds,
      proxyUrl: readOptionalString("PROXY", pick("proxyUrl")),
      publishTimeoutMs: readInteger(
        "PUBLISH_TIMEOUT",
        pick("publishTimeoutMs"),
        DEFAULT_CONFIG.publishTimeoutMs,
        1,
        MAX_TIMER_MS,
      ),
      useSolverSessions: readBoolean("SOLVER_SESSIONS", pick("useSolverSessions"), DEFAULT_CONFIG.useSolverSessions),
      statusPort: readPort("STATUS_PORT", pick("statusPort")),
      runOnce: readBoolean("RUN_ONCE", pick("runOnce"), DEFAULT_CONFIG.runOnce),
    };

    logger.info(
      {
        configPath: existsSync(this.configPath) ? this.configPath : null,
        solverUrl: config.solverUrl,
        solverType: config.solverType,
        targetUrl: config.targetUrl,
        updateEndpoint: config.updateEndpoint,
        intervalSeconds: config.intervalSeconds,
        minExecIntervalSeconds: config.minExecIntervalSeconds,
        proxyConfigured: config.proxyUrl !== null,
      },
      "Configuration loaded",
    );

    return config;
  }

  private readDocument(path: string): ConfigDocument {
    if (!existsSync(path)) {
      return {};
    }
    const raw = readFileSync(path, "utf8");
    if (!raw.trim()) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (error) {
      throw new ConfigError(`Failed to parse configuration YAML at ${path}`, { cause: error });
    }
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigError(`Configuration file ${path} must contain a mapping`);
    }
    return parsed;
  }
}

/**
 * Solver endpoints are served under /v1; append it unless already present.
 */
export function normalizeSolverUrl(value: string): string {
  const trimmed = value.replace(/\/+$/, "");
  return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}

function readRequiredString(name: string, value: unknown): string {
  if (value === undefined || value === null || value === "") {
    throw new ConfigError(`${name} is required`);
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${name} must be a string`);
  }
  return value;
}

function readOptionalString(name: string, value: unknown): string | null {
  if (value === undefined || value === null || value === "") {
    return null;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${name} must be a string`);
  }
  return value;
}

function readHttpUrl(name: string, value: unknown): string {
  const raw = readRequiredString(name, value);
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (error) {
    throw new ConfigError(`${name} is not a valid URL: ${raw}`, { cause: error });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${name} must use http or https: ${raw}`);
  }
  return raw;
}

function readInteger(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
): number {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${String(value)}`);
  }
  if (parsed > max) {
    throw new ConfigError(`${name} must be at most ${max}, got ${String(value)}`);
  }
  return parsed;
}

function readBoolean(name: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.toLowerCase();
    if (["true", "1", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["false", "0", "no", "off"].includes(normalized)) {
      return false;
    }
  }
  throw new ConfigError(`${name} must be a boolean, got ${String(value)}`);
}

function readPort(name: string, value: unknown): number | null {
  if (value === undefined || value === null || value === "") {
    return null;
  }
  return readInteger(name, value, 0, 1, 65535);
}

function readSolverType(value: unknown): SolverType {
  const raw = value ?? DEFAULT_CONFIG.solverType;
  if (typeof raw !== "string") {
    throw new ConfigError("SOLVER_TYPE must be a string");
  }
  const normalized = raw.toLowerCase();
  const match = SOLVER_TYPES.find((type) => type === normalized);
  if (!match) {
    throw new ConfigError(`SOLVER_TYPE must be one of ${SOLVER_TYPES.join(", ")}, got ${raw}`);
  }
  return match;
}
