import pino from 'pino';
import { type Mock, vi } from 'vitest';
import type { DatabaseConfig } from '../src/config';
import type { Connector, QueryableConnection } from '../src/db/connection';

export const silentLogger = pino({ level: 'silent' });

export function makeDatabaseConfig(overrides: Partial<DatabaseConfig> = {}): DatabaseConfig {
  return {
    host: 'localhost',
    port: 3306,
    user: 'root',
    password: 'test-secret',
    database: 'my_db',
    ...overrides
  };
}

export function captureSink(): { write: (chunk: string) => boolean; lines: () => string[] } {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
    lines: () => chunks.join('').split('\n').filter((line) => line.length > 0)
  };
}

export interface FakeConnection {
  query: Mock<QueryableConnection['query']>;
  end: Mock<QueryableConnection['end']>;
}

export function makeFakeConnection(rows: unknown): FakeConnection {
  return {
    query: vi.fn<QueryableConnection['query']>().mockResolvedValue([rows, []]),
    end: vi.fn<QueryableConnection['end']>().mockResolvedValue(undefined)
  };
}

export function makeConnector(connection: QueryableConnection): Mock<Connector> {
  return vi.fn<Connector>().mockResolvedValue(connection);
}

export const ANN_ROW = ['Ann', 'ann@x.com', '555-1234', '000-00-0000', 'pw1', '1.2.3.4', '2024-01-01', 'curl/8'];
