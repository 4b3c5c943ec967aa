import { InvalidArgumentError, type Command } from "commander";
import { loadConfig } from "../../config.ts";
import { startServer } from "../../daemon/server.ts";
import { createLogger } from "../../logger.ts";

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Must be a port number (0-65535).");
  }
  return port;
}

export function registerServerCommand(program: Command) {
  program
    .command("server")
    .description("Start the REST server in the foreground")
    .option("--host <host>", "Host to bind to (default: SERVER_HOST or 0.0.0.0)")
    .option("--port <port>", "HTTP port (default: SERVER_PORT or 5000)", parsePort)
    .action(async (options: { host?: string; port?: number }) => {
      const config = loadConfig();
      const logger = createLogger({ level: config.logLevel });
      await startServer(config, logger, { host: options.host, port: options.port });
    });
}
