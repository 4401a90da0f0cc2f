// backend/services/todo/index.ts
/**
 * Start-up order: load env (bootstrap), init logs, connect DB (bounded retry,
 * fatal on exhaustion), inject the repo into the app, then start HTTP.
 */

import "./src/bootstrap";

import { initLogger, logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { createTodoApp, SERVICE_NAME } from "./src/app";
import { loadConfig } from "./src/config";
import { connectDb, disconnectDb, mongoReadiness } from "./src/db";
import { MongoTodoRepo } from "./src/repo/mongoTodoRepo";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start() {
  const config = loadConfig();
  initLogger(SERVICE_NAME, config.logLevel);

  const connection = await connectDb({
    uri: config.mongoUri,
    dbName: config.dbName,
    maxAttempts: config.dbConnectMaxAttempts,
    retryDelayMs: config.dbConnectRetryDelayMs,
  });

  const app = createTodoApp({
    repo: new MongoTodoRepo(connection),
    readiness: mongoReadiness(connection),
  });

  const { ready } = startHttpService({
    app,
    port: config.port,
    host: config.host,
    serviceName: SERVICE_NAME,
    logger,
    onClose: () => disconnectDb(connection),
  });
  await ready;
}

start().catch((err: unknown) => {
  logger.fatal({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
