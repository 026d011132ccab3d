import { DuckDBInstance, DuckDBConnection } from "@duckdb/node-api";
import { mkdirSync, existsSync } from "fs";
import { dirname } from "path";
import { StoreUnavailableError, describeError } from "../common/errors";
import type { Logger } from "../common/logger";
import { withRetry } from "../common/retry";

const DEFAULT_DB_PATH = process.env.DUCKDB_PATH || "./data/mobility.duckdb"; // file-backed persistence

export interface DatabaseOptions {
  path?: string;
  /** Connect attempts after the first one. */
  maxRetryCount?: number;
  retryBackoffMs?: number;
  logger: Logger;
}

/**
 * One DuckDB instance per process. Callers never share a connection: every
 * batch operation opens its own and closes it when the batch is done, so no
 * connection outlives a network fetch or a scheduler sleep.
 */
export class Database {
  private instancePromise: Promise<DuckDBInstance> | null = null;
  private readonly path: string;
  private readonly logger: Logger;
  private readonly maxRetryCount: number;
  private readonly retryBackoffMs: number;

  constructor(options: DatabaseOptions) {
    this.path = options.path ?? DEFAULT_DB_PATH;
    this.logger = options.logger;
    this.maxRetryCount = options.maxRetryCount ?? 5;
    this.retryBackoffMs = options.retryBackoffMs ?? 10_000;
  }

  private async getInstance(): Promise<DuckDBInstance> {
    if (!this.instancePromise) {
      if (this.path !== ":memory:") {
        const dir = dirname(this.path);
        if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      }
      this.instancePromise = DuckDBInstance.create(this.path, {
        threads: process.env.DUCKDB_THREADS || "4",
      }).catch((err: unknown) => {
        this.instancePromise = null;
        throw new StoreUnavailableError(
          `Failed to open database: ${describeError(err)}`,
          { path: this.path },
          { cause: err }
        );
      });
    }
    return this.instancePromise;
  }

  async connect(): Promise<DuckDBConnection> {
    return withRetry(
      async () => {
        const instance = await this.getInstance();
        try {
          return await instance.connect();
        } catch (err) {
          throw new StoreUnavailableError(
            `Failed to connect: ${describeError(err)}`,
            { path: this.path },
            { cause: err }
          );
        }
      },
      {
        attempts: this.maxRetryCount + 1,
        backoffMs: this.retryBackoffMs,
        label: "database connect",
        logger: this.logger,
      }
    );
  }

  async withConnection<T>(fn: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
    const conn = await this.connect();
    try {
      return await fn(conn);
    } finally {
      conn.closeSync();
    }
  }

  async withTransaction<T>(fn: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
    return this.withConnection(async (conn) => {
      await conn.run("BEGIN TRANSACTION");
      try {
        const result = await fn(conn);
        await conn.run("COMMIT");
        return result;
      } catch (err) {
        await conn.run("ROLLBACK").catch((rollbackErr: unknown) => {
          this.logger
            .with()
            .error(rollbackErr)
            .logger()
            .warn("Rollback failed");
        });
        throw err;
      }
    });
  }

  async close(): Promise<void> {
    if (this.instancePromise) {
      const inst = await this.instancePromise;
      inst.closeSync?.();
      this.instancePromise = null;
    }
  }
}
