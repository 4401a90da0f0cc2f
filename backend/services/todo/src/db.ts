// backend/services/todo/src/db.ts
import mongoose, { type Connection } from "mongoose";
import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "@shared/utils/logger";

export class DbConnectError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`Could not connect to database after ${attempts} attempts`);
    this.name = "DbConnectError";
  }
}

export type ConnectDbOptions = {
  uri: string;
  dbName: string;
  maxAttempts: number;
  retryDelayMs: number;
  /** Injected in tests; defaults to timers/promises setTimeout. */
  wait?: (ms: number) => Promise<unknown>;
};

export function redactMongoUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One attempt: open, then prove liveness with an admin ping. */
async function openAndPing(uri: string, dbName: string): Promise<Connection> {
  const conn = mongoose.createConnection(uri, { dbName });
  try {
    await conn.asPromise();
    await conn.getClient().db("admin").command({ ping: 1 });
    return conn;
  } catch (err) {
    await conn.close().catch((closeErr: unknown) => {
      logger.debug({ err: messageOf(closeErr) }, "[todo.db] close after failed attempt");
    });
    throw err;
  }
}

/**
 * Startup handshake with bounded, fixed-interval retry. Waits after every
 * failed attempt; rejects with DbConnectError once attempts are exhausted.
 */
export async function connectDb(opts: ConnectDbOptions): Promise<Connection> {
  const { uri, dbName, maxAttempts, retryDelayMs, wait = sleep } = opts;
  const redacted = redactMongoUri(uri);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    logger.info(
      { uri: redacted, dbName, attempt, maxAttempts },
      "[todo.db] connecting to Mongo"
    );
    try {
      const conn = await openAndPing(uri, dbName);
      logger.info({ dbName, attempt }, "[todo.db] Mongo connected");
      return conn;
    } catch (err) {
      lastError = err;
      logger.warn(
        { attempt, maxAttempts, err: messageOf(err) },
        "[todo.db] DB not ready yet"
      );
      await wait(retryDelayMs);
    }
  }

  throw new DbConnectError(maxAttempts, lastError);
}

export async function disconnectDb(conn: Connection): Promise<void> {
  if (conn.readyState !== 0) {
    await conn.close();
    logger.info("[todo.db] Mongo disconnected");
  }
}

export function mongoReadiness(conn: Connection) {
  return () => {
    if (conn.readyState !== 1) {
      throw new Error(`mongo readyState=${conn.readyState}`);
    }
    return { mongo: "ok" };
  };
}
