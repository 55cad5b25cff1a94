import mysql, { type Connection, type Pool, type ResultSetHeader, type RowDataPacket } from "mysql2/promise";
import { config } from "./environment";
import { createModuleLogger, logDatabaseQuery } from "./logger";

const moduleLogger = createModuleLogger("Database");

export type QueryParam = string | number | boolean | Date | null;

export interface DatabaseOptions {
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
  connectionLimit: number;
  connectTimeoutMs: number;
}

/**
 * Anything SQL can be sent through: the pool itself, or a single connection
 * checked out for a transaction.
 */
export interface Queryable {
  query<T extends RowDataPacket>(sql: string, params?: QueryParam[]): Promise<T[]>;
  queryOne<T extends RowDataPacket>(sql: string, params?: QueryParam[]): Promise<T | null>;
  execute(sql: string, params?: QueryParam[]): Promise<ResultSetHeader>;
}

export interface Database extends Queryable {
  transaction<T>(callback: (tx: Queryable) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

type Executor = Pick<Connection, "execute">;

class StatementRunner implements Queryable {
  constructor(private readonly executor: Executor, private readonly label: string) {}

  async query<T extends RowDataPacket>(sql: string, params: QueryParam[] = []): Promise<T[]> {
    return this.timed(sql, params, async () => {
      const [rows] = await this.executor.execute<T[]>(sql, params);
      return rows;
    });
  }

  async queryOne<T extends RowDataPacket>(sql: string, params: QueryParam[] = []): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async execute(sql: string, params: QueryParam[] = []): Promise<ResultSetHeader> {
    return this.timed(sql, params, async () => {
      const [result] = await this.executor.execute<ResultSetHeader>(sql, params);
      return result;
    });
  }

  private async timed<R>(sql: string, params: QueryParam[], run: () => Promise<R>): Promise<R> {
    const start = Date.now();

    try {
      const result = await run();

      if (config.app.isDevelopment) {
        logDatabaseQuery(sql, params.length, Date.now() - start);
      }

      return result;
    } catch (error) {
      moduleLogger.error(
        {
          err: error,
          sql: sql.replace(/\s+/g, " ").trim(),
          paramCount: params.length,
          duration: `${Date.now() - start}ms`,
        },
        `${this.label} failed`
      );
      throw error;
    }
  }
}

export class DatabaseManager implements Database {
  private readonly pool: Pool;
  private readonly runner: StatementRunner;

  constructor(options: DatabaseOptions) {
    this.pool = mysql.createPool({
      host: options.host,
      port: options.port,
      user: options.user,
      password: options.password,
      database: options.name,
      connectionLimit: options.connectionLimit,
      connectTimeout: options.connectTimeoutMs,
      waitForConnections: true,
      charset: "utf8mb4",
      timezone: "Z",
      dateStrings: ["DATE"],
    });
    this.runner = new StatementRunner(this.pool, "Database query");
  }

  query<T extends RowDataPacket>(sql: string, params?: QueryParam[]): Promise<T[]> {
    return this.runner.query<T>(sql, params);
  }

  queryOne<T extends RowDataPacket>(sql: string, params?: QueryParam[]): Promise<T | null> {
    return this.runner.queryOne<T>(sql, params);
  }

  execute(sql: string, params?: QueryParam[]): Promise<ResultSetHeader> {
    return this.runner.execute(sql, params);
  }

  public async transaction<T>(callback: (tx: Queryable) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();

    try {
      await connection.beginTransaction();
      const result = await callback(new StatementRunner(connection, "Transaction query"));
      await connection.commit();

      return result;
    } catch (error) {
      await connection.rollback();
      throw error;
    } finally {
      connection.release();
    }
  }

  public async ping(): Promise<void> {
    const connection = await this.pool.getConnection();

    try {
      await connection.ping();
    } finally {
      connection.release();
    }
  }

  public async close(): Promise<void> {
    await this.pool.end();
    moduleLogger.info("Database connection pool closed");
  }
}

export const createDatabase = (options: DatabaseOptions = config.database): Database => {
  return new DatabaseManager(options);
};

/**
 * MySQL reports constraint violations through `error.code`, e.g. `ER_DUP_ENTRY`.
 */
export const isDatabaseError = (error: unknown, code: string): boolean => {
  return error instanceof Error && "code" in error && error.code === code;
};
