/**
 * HTTP server for Hono apps on Node.js via @hono/node-server.
 *
 * Callers use ServerHandle; they never touch the node server directly.
 */

import { serve } from "@hono/node-server";
import type { Hono } from "hono";

export interface ServerHandle {
  /** Actual port the server is listening on */
  port: number;
  /** Stop accepting connections and wait for open ones to finish */
  close(): Promise<void>;
}

export interface ServeOptions {
  port: number;
  hostname?: string;
}

export function startHttpServer(app: Hono, options: ServeOptions): Promise<ServerHandle> {
  return new Promise<ServerHandle>((resolve, reject) => {
    const server = serve(
      {
        fetch: app.fetch,
        port: options.port,
        hostname: options.hostname,
      },
      (info) => {
        resolve({
          port: info.port,
          close: () =>
            new Promise<void>((done, fail) =>
              server.close((error) => (error ? fail(error) : done())),
            ),
        });
      },
    );

    server.on("error", reject);
  });
}
