import { logger } from "../observability/logger.ts";
import { observeCycle } from "../observability/metrics.ts";
import type { CookiePublisher } from "../publisher/cookie-publisher.ts";
import { findCookie } from "../solvers/solver-response.ts";
import type { Solver } from "../solvers/types.ts";
import type { RefresherConfig } from "../types/config.ts";
import {
  CLEARANCE_COOKIE,
  type CycleOutcome,
  type LoopState,
  type LoopStatus,
  type ProxyDescriptor,
} from "../types/cookie.ts";
import { PublishError, SolverError } from "../types/errors.ts";

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RefreshLoopOptions {
  config: Pick<
    RefresherConfig,
    "targetUrl" | "solverTimeoutMs" | "intervalSeconds" | "minExecIntervalSeconds"
  >;
  proxy: ProxyDescriptor | null;
  solver: Solver;
  publisher: Pick<CookiePublisher, "publish">;
  now?: () => number;
  sleep?: Sleeper;
}

/**
 * Resolve after `ms`, or as soon as the signal aborts.
 */
export const abortableSleep: Sleeper = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

export function effectiveIntervalMs(intervalSeconds: number, minExecIntervalSeconds: number): number {
  return Math.max(intervalSeconds, minExecIntervalSeconds) * 1000;
}

/**
 * RefreshLoop owns the fetch-then-publish cycle and its schedule.
 * Two states: idle (sleeping) and running (one cycle in flight).
 */
export class RefreshLoop {
  private readonly targetUrl: string;
  private readonly solverTimeoutMs: number;
  private readonly intervalMs: number;
  private readonly proxy: ProxyDescriptor | null;
  private readonly solver: Solver;
  private readonly publisher: Pick<CookiePublisher, "publish">;
  private readonly now: () => number;
  private readonly sleep: Sleeper;
  private readonly stopController = new AbortController();
  private state: LoopState = "idle";
  private cycles = 0;
  private lastOutcome: CycleOutcome["status"] | null = null;
  private lastSuccessAt: Date | null = null;

  constructor(options: RefreshLoopOptions) {
    const { config } = options;
    this.targetUrl = config.targetUrl;
    this.solverTimeoutMs = config.solverTimeoutMs;
    this.intervalMs = effectiveIntervalMs(config.intervalSeconds, config.minExecIntervalSeconds);
    this.proxy = options.proxy;
    this.solver = options.solver;
    this.publisher = options.publisher;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;

    if (config.intervalSeconds < config.minExecIntervalSeconds) {
      logger.warn(
        {
          intervalSeconds: config.intervalSeconds,
          minExecIntervalSeconds: config.minExecIntervalSeconds,
        },
        "INTERVAL is below MIN_EXEC_INTERVAL; using the minimum",
      );
    }
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  getState(): LoopState {
    return this.state;
  }

  getStatus(): LoopStatus {
    return {
      state: this.state,
      cycles: this.cycles,
      lastOutcome: this.lastOutcome,
      lastSuccessAt: this.lastSuccessAt,
    };
  }

  /**
   * Run one fetch + publish cycle. Soft failures are logged and reported in
   * the outcome; anything else propagates.
   */
  async runCycle(): Promise<CycleOutcome> {
    this.state = "running";
    this.cycles += 1;
    logger.info(
      { cycle: this.cycles, targetUrl: this.targetUrl, solver: this.solver.name },
      "Refresh cycle started",
    );

    try {
      const outcome = await this.fetchAndPublish();
      this.lastOutcome = outcome.status;
      if (outcome.status === "published") {
        this.lastSuccessAt = new Date(this.now());
        observeCycle(outcome.status, this.lastSuccessAt);
      } else {
        observeCycle(outcome.status);
      }
      return outcome;
    } finally {
      this.state = "idle";
    }
  }

  private async fetchAndPublish(): Promise<CycleOutcome> {
    const fetched = await this.fetchClearance();
    if (typeof fetched !== "string") {
      return fetched;
    }

    logger.debug({ cookie: fetched }, "Obtained cf_clearance cookie");

    try {
      await this.publisher.publish(fetched);
    } catch (error) {
      if (error instanceof PublishError) {
        logger.error({ err: error, status: error.status, body: error.body }, "Cookie publish failed");
        return { status: "publish_failed", error };
      }
      throw error;
    }

    logger.info("Cookie published to update endpoint");
    return { status: "published", cookie: fetched };
  }

  private async fetchClearance(): Promise<string | CycleOutcome> {
    try {
      const { cookies, raw } = await this.solver.fetchCookies(
        this.targetUrl,
        this.proxy,
        this.solverTimeoutMs,
      );
      const cookie = findCookie(cookies, CLEARANCE_COOKIE);
      if (cookie) {
        return cookie;
      }
      logger.error(
        { cookieNames: cookies.map((entry) => entry.name), body: raw },
        "Solver response carried no cf_clearance cookie; the target may not be challenging this IP",
      );
      return { status: "missing_cookie" };
    } catch (error) {
      if (error instanceof SolverError) {
        logger.error({ err: error, status: error.status, body: error.body }, "Solver request failed");
        return { status: "solver_failed", error };
      }
      throw error;
    }
  }

  /**
   * Run cycles until stop() is called. Consecutive cycle starts are at least
   * one effective interval apart.
   */
  async start(): Promise<void> {
    logger.info({ intervalMs: this.intervalMs }, "Refresh loop started");
    const signal = this.stopController.signal;

    while (!signal.aborted) {
      const startedAt = this.now();
      await this.runCycle();
      if (signal.aborted) {
        break;
      }
      const elapsed = this.now() - startedAt;
      await this.sleep(Math.max(0, this.intervalMs - elapsed), signal);
    }

    logger.info({ cycles: this.cycles }, "Refresh loop stopped");
  }

  /**
   * Ask the loop to exit. A cycle in flight finishes first.
   */
  stop(): void {
    this.stopController.abort();
  }
}
