import { createConnection, type ConnectionOptions } from 'mysql2/promise';
import type { Logger } from 'pino';
import type { DatabaseConfig } from '../config';
import { DatabaseConnectionError, QueryError, driverErrorCode, driverErrorMessage } from '../errors';

export interface QueryableConnection {
  query(options: { sql: string; rowsAsArray: boolean }): Promise<[unknown, unknown]>;
  end(): Promise<void>;
}

export type Connector = (options: ConnectionOptions) => Promise<QueryableConnection>;

export interface UserDbSession {
  fetchRows(sql: string): Promise<unknown[][]>;
  close(): Promise<void>;
}

export interface DbOptions {
  connector?: Connector;
  logger: Logger;
}

export const mysqlConnector: Connector = async (options) => {
  const connection = await createConnection(options);
  return {
    query: (queryOptions) => connection.query(queryOptions),
    end: () => connection.end()
  };
};

function sanitizeErrorForLog(error: unknown): Record<string, string> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message
    };
  }
  return {
    errorType: typeof error
  };
}

class MysqlUserSession implements UserDbSession {
  private closed = false;

  constructor(private readonly connection: QueryableConnection) {}

  async fetchRows(sql: string): Promise<unknown[][]> {
    let result: unknown;
    try {
      [result] = await this.connection.query({ sql, rowsAsArray: true });
    } catch (error) {
      throw new QueryError(`Failed to execute query: ${driverErrorMessage(error)}`, { driverCode: driverErrorCode(error) });
    }

    if (!Array.isArray(result)) {
      throw new QueryError('Query did not return rows');
    }

    return result.map((row: unknown, index) => {
      if (!Array.isArray(row)) {
        throw new QueryError(`Row ${index} is not a positional row`);
      }
      return row;
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.connection.end();
  }
}

export async function getDb(config: DatabaseConfig, options: DbOptions): Promise<UserDbSession> {
  const connector = options.connector ?? mysqlConnector;
  options.logger.debug({ host: config.host, port: config.port, database: config.database }, 'database_connecting');

  let connection: QueryableConnection;
  try {
    connection = await connector({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      dateStrings: true,
      supportBigNumbers: true,
      bigNumberStrings: true
    });
  } catch (error) {
    throw new DatabaseConnectionError(`Failed to connect to database ${config.database}: ${driverErrorMessage(error)}`, {
      driverCode: driverErrorCode(error)
    });
  }

  options.logger.debug({ host: config.host, database: config.database }, 'database_connected');
  return new MysqlUserSession(connection);
}

export async function withDb<T>(
  config: DatabaseConfig,
  fn: (session: UserDbSession) => Promise<T>,
  options: DbOptions
): Promise<T> {
  const session = await getDb(config, options);

  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (error) {
      options.logger.warn(sanitizeErrorForLog(error), 'database_close_failed');
    }
  }
}
