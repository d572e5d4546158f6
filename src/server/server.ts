import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "../observability/logger.ts";
import { registry } from "../observability/metrics.ts";
import { parseProxyUrl } from "../proxy/proxy-resolver.ts";
import { CookiePublisher } from "../publisher/cookie-publisher.ts";
import { RefreshLoop } from "../refresh/refresh-loop.ts";
import { StatusRouter } from "../router/status-router.ts";
import { errorResponse } from "../router/responses.ts";
import { createSolver } from "../solvers/solver-factory.ts";
import type { RefresherConfig } from "../types/config.ts";
import { ConfigError } from "../types/errors.ts";
import { ConfigManager, type ConfigManagerOptions } from "./config-manager.ts";

export interface RefresherOptions extends ConfigManagerOptions {
  listen?: boolean;
}

export interface RefresherContext {
  config: Readonly<RefresherConfig>;
  loop: RefreshLoop;
  server: Server | null;
  fetch(request: Request): Promise<Response>;
  stop(): Promise<void>;
}

/**
 * Wire configuration, proxy, solver, publisher and loop together. Does not
 * start the loop; callers choose between `loop.start()` and `loop.runCycle()`.
 *
 * @throws ConfigError when required settings are missing or invalid.
 */
export function startRefresher(options: RefresherOptions = {}): RefresherContext {
  const startedAt = new Date();
  const config = new ConfigManager(options).getConfig();
  const proxy = parseProxyUrl(config.proxyUrl);
  if (proxy) {
    logger.info({ proxy }, "Outbound proxy configured for solver");
  }

  const solver = createSolver(config, proxy);
  const publisher = new CookiePublisher({
    updateEndpoint: config.updateEndpoint,
    endpointAuth: config.endpointAuth,
    timeoutMs: config.publishTimeoutMs,
  });
  const loop = new RefreshLoop({ config, proxy, solver, publisher });

  const statusRouter = new StatusRouter({
    getStatus: () => loop.getStatus(),
    metricsRegistry: registry,
    startedAt,
  });

  const handler = async (request: Request): Promise<Response> => {
    try {
      return await statusRouter.handle(request);
    } catch (error) {
      logger.error({ error }, "Unhandled error during status request");
      return errorResponse("Internal server error", 500, "internal_error");
    }
  };

  let server: Server | null = null;
  if (options.listen !== false && config.statusPort !== null) {
    const port = config.statusPort;
    server = createServer((req, res) => {
      serveNodeRequest(handler, req, res).catch((error: unknown) => {
        logger.error({ error }, "Status server failed to write response");
        res.destroy();
      });
    });
    server.on("error", (error) => {
      logger.error({ error, port }, "Status server error");
    });
    server.listen(port, () => {
      logger.info({ port }, "Status server listening");
    });
  }

  return {
    config,
    loop,
    server,
    fetch: handler,
    async stop() {
      loop.stop();
      if (server) {
        const listening = server;
        await new Promise<void>((done) => listening.close(() => done()));
      }
    },
  } satisfies RefresherContext;
}

async function serveNodeRequest(
  handler: (request: Request) => Promise<Response>,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const response = await handler(new Request(url, { method: req.method ?? "GET" }));
  res.statusCode = response.status;
  response.headers.forEach((value, key) => res.setHeader(key, value));
  res.end(await response.text());
}

function startOrReport(): RefresherContext | null {
  try {
    return startRefresher();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ err: error }, "Invalid configuration");
      return null;
    }
    throw error;
  }
}

export async function main(): Promise<number> {
  const context = startOrReport();
  if (!context) {
    return 1;
  }

  if (context.config.runOnce) {
    const outcome = await context.loop.runCycle();
    await context.stop();
    return outcome.status === "published" ? 0 : 1;
  }

  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Received shutdown signal; finishing current cycle");
    context.loop.stop();
  };
  process.on("SIGTERM", handleSignal);
  process.on("SIGINT", handleSignal);

  try {
    await context.loop.start();
  } finally {
    process.off("SIGTERM", handleSignal);
    process.off("SIGINT", handleSignal);
    await context.stop();
  }
  return 0;
}

const entry = process.argv[1];
if (entry && resolve(entry) === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ err: error }, "Refresher crashed");
      process.exitCode = 1;
    },
  );
}
