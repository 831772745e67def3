#!/usr/bin/env node
/**
 * Entry point.
 *
 * Parses flags, loads configuration, starts the HTTP server and handles
 * graceful shutdown: stop accepting, give in-flight requests a grace
 * period, then close whatever is left.
 */

import { serve } from "@hono/node-server";
import { Command } from "commander";
import pino from "pino";
import { createGateway } from "./app.js";
import { loadGatewayConfig, loadRuntimeConfig, parsePort } from "./config.js";

type CliOptions = {
  config?: string;
  port?: string;
};

async function main(argv: readonly string[]): Promise<void> {
  const program = new Command()
    .name("gatehouse")
    .description(
      "HTTP gateway that authenticates requests and forwards them to backend services",
    )
    .option("-c, --config <path>", "path to configuration yaml")
    .option("-p, --port <port>", "override server port (e.g. 8080 or :8080)");
  program.parse([...argv]);
  const flags = program.opts<CliOptions>();

  const runtime = loadRuntimeConfig();
  const logger = pino({
    level: runtime.LOG_LEVEL,
    ...(runtime.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { config, overrides } = loadGatewayConfig(
    flags.config ?? runtime.CONFIG_PATH,
  );
  for (const o of overrides) {
    logger.info(
      { target: o.target, var: o.variable },
      "setting overridden from env",
    );
  }

  const port =
    flags.port !== undefined
      ? parsePort(flags.port)
      : runtime.PORT ?? config.listenPort;

  const { app } = createGateway({
    config,
    logger,
    upstreamTimeoutMs: runtime.UPSTREAM_TIMEOUT_MS,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port,
    hostname: runtime.HOST,
  });

  logger.info({ port, host: runtime.HOST }, "gateway listening");

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "shutting down server");

    const force = setTimeout(() => {
      logger.error(
        { graceMs: runtime.SHUTDOWN_GRACE_MS },
        "server forced shutdown",
      );
      if ("closeAllConnections" in server) {
        server.closeAllConnections();
      }
      process.exit(1);
    }, runtime.SHUTDOWN_GRACE_MS);
    force.unref();

    server.close((err) => {
      clearTimeout(force);
      if (err !== undefined) {
        logger.error({ err }, "error while closing server");
        process.exit(1);
      }
      logger.info("server exiting");
      process.exit(0);
    });
    if ("closeIdleConnections" in server) {
      server.closeIdleConnections();
    }
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main(process.argv).catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
