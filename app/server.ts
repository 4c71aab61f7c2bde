/**
 * Express Server Entry Point
 *
 * All initialization happens here before accepting HTTP requests.
 */

import compression from "compression";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import morgan from "morgan";
import { getLogger } from "~/.server/log/logger";
import { initializeApp, shutdownApp } from "~/.server/init";
import { mountRoutes } from "~/.server/http/express-adapter";
import routes from "./routes";

const log = getLogger({ module: "Server" });
const PORT = process.env.PORT || 3000;

function shutdown(signal: string): void {
  log.info({ signal }, "shutdown initiated");

  try {
    shutdownApp();
    log.info({}, "shutdown complete");
    process.exit(0);
  } catch (error) {
    log.error({ err: error }, "error during shutdown");
    process.exit(1);
  }
}

async function main() {
  await initializeApp();

  const app = express();

  app.set("trust proxy", true);
  app.use(compression());

  if (process.env.NODE_ENV === "development") {
    app.use(morgan("dev"));
  }

  mountRoutes(app, routes);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
  });

  // Errors that escaped a route handler, e.g. while streaming the response
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    log.error({ err: error, method: req.method, path: req.path }, "unhandled request error");
    if (!res.headersSent) {
      res.status(500).json({ error: "Internal server error" });
    }
  });

  const server = app.listen(PORT, () => {
    log.info({ port: PORT }, "server listening");
  });

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  process.on("uncaughtException", (error) => {
    log.error({ err: error }, "uncaught exception");
    shutdown("uncaughtException");
  });

  process.on("unhandledRejection", (reason) => {
    log.error({ err: reason }, "unhandled rejection");
  });

  return server;
}

main().catch((error: unknown) => {
  log.error({ err: error }, "failed to start server");
  process.exit(1);
});
