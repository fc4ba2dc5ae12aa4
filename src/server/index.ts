import type { Server } from "node:net";

import { serve } from "@hono/node-server";
import type { Hono } from "hono";

import type { Logger } from "@/lib/logger";

export interface ServerDeps {
  app: Hono;
  port: number;
  host: string;
  logger: Logger;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

/**
 * Resolves once the socket is listening. A listen failure (e.g. EADDRINUSE)
 * rejects instead of surfacing as an unhandled `error` event.
 */
export const startHttpServer = (deps: ServerDeps): Promise<HttpServer> =>
  new Promise<HttpServer>((resolve, reject) => {
    let listening = false;

    const close = (): Promise<void> =>
      new Promise<void>((resolveClose) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolveClose();
        });
      });

    const server = serve(
      {
        fetch: deps.app.fetch,
        port: deps.port,
        hostname: deps.host,
      },
      (info) => {
        listening = true;
        deps.logger.info(`HTTP server listening on ${deps.host}:${info.port}`);
        resolve({ port: info.port, close });
      },
    );

    const socket: Server = server;
    socket.on("error", (error: Error) => {
      if (!listening) {
        reject(error);
        return;
      }
      deps.logger.error("HTTP server error", error);
    });
  });

export { createApp, SERVICE_NAME, SERVICE_VERSION, type AppDeps } from "./app";
