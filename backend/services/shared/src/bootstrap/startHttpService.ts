// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Starting/stopping an HTTP server is a single concern: bind, harden socket
 * timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so multiple calls don’t multiply handlers.
 * - `stop()` closes the server, then runs `onClose` (e.g. DB disconnect).
 * - headersTimeout stays above keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  host?: string;
  serviceName: string;
  logger: Pick<Logger, "info" | "error">;
  /** Runs after the server has closed. */
  onClose?: () => Promise<void>;
  /** Install SIGINT/SIGTERM handlers (default true). */
  handleSignals?: boolean;
}

export interface StartedService {
  server: Server;
  /** Resolves with the bound port once listening. */
  ready: Promise<number>;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const {
    app,
    port,
    host = "0.0.0.0",
    serviceName,
    logger,
    onClose,
    handleSignals = true,
  } = opts;

  const server = app.listen(port, host);

  const ready = new Promise<number>((resolve, reject) => {
    server.once("listening", () => {
      const addr = server.address();
      const boundPort = addr && typeof addr === "object" ? addr.port : port;
      logger.info(
        { service: serviceName, host, port: boundPort },
        "service listening"
      );
      resolve(boundPort);
    });
    server.once("error", reject);
  });

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
  });

  const stop = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    if (onClose) await onClose();
  };

  if (handleSignals) {
    const shutdown = (signal: string) => {
      logger.info({ signal, service: serviceName }, "shutting down service");
      stop().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err, service: serviceName }, "shutdown failed");
          process.exit(1);
        }
      );
      // Fail-safe in case close hangs
      setTimeout(() => process.exit(1), 10_000).unref();
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  }

  return { server, ready, stop };
}
