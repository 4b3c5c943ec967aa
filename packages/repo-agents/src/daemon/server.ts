/**
 * Server process wiring: config → manager → Hono app → HTTP listener.
 */

import { AgentManager } from "../agent/manager.ts";
import { validateConfig, type Config } from "../config.ts";
import { createContextFetcher } from "../github/fetcher.ts";
import type { Logger } from "../logger.ts";
import { createModelResolver } from "../models/models.ts";
import { createApp } from "./app.ts";
import { startHttpServer, type ServerHandle } from "./serve.ts";

export interface StartServerOptions {
  /** Override config.serverHost */
  host?: string;
  /** Override config.serverPort */
  port?: number;
  /** Install SIGINT/SIGTERM handlers that close the server (default: true) */
  handleSignals?: boolean;
}

export interface RunningServer extends ServerHandle {
  host: string;
  manager: AgentManager;
}

export async function startServer(
  config: Config,
  logger: Logger,
  options: StartServerOptions = {},
): Promise<RunningServer> {
  const log = logger.child("server");
  const report = validateConfig(config);
  for (const name of report.missing) {
    log.warn(`${name} is not set; requests that need it will fail`);
  }
  for (const warning of report.warnings) {
    log.warn(warning);
  }

  const manager = new AgentManager({
    resolveModel: createModelResolver(config),
    fetcher: createContextFetcher(config),
    logger: logger.child("agents"),
  });

  const host = options.host ?? config.serverHost;
  const app = createApp({ manager, logger: log });
  const handle = await startHttpServer(app, { port: options.port ?? config.serverPort, hostname: host });

  log.info(`Listening on http://${host}:${handle.port}`);
  log.info(`Agent types: ${manager.availableTypes().join(", ")}`);

  if (options.handleSignals ?? true) {
    let closing = false;
    const shutdown = (signal: string) => {
      if (closing) return;
      closing = true;
      log.info(`${signal} received, shutting down`);
      handle.close().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error("Shutdown failed:", error);
          process.exit(1);
        },
      );
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  }

  return { ...handle, host, manager };
}
