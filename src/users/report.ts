import type { Logger } from 'pino';
import type { UserDbSession } from '../db/connection';
import type { LineSink } from '../logger';
import { QueryError } from '../errors';

export const USERS_QUERY = 'SELECT * FROM users;';

export const USER_COLUMNS = [
  'name',
  'email',
  'phone',
  'ssn',
  'password',
  'ip',
  'last_login',
  'user_agent'
] as const;

export interface ReportOptions {
  write: LineSink['write'];
  // When set, each row goes through the redacting logger instead of being written raw.
  redactLogger?: Pick<Logger, 'info'>;
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function formatUserRow(row: readonly unknown[]): string {
  if (row.length < USER_COLUMNS.length) {
    throw new QueryError(`Expected ${USER_COLUMNS.length} columns per user row, got ${row.length}`);
  }

  return USER_COLUMNS.map((column, index) => `${column}=${formatValue(row[index])};`).join(' ');
}

export async function reportUsers(session: UserDbSession, options: ReportOptions): Promise<number> {
  const rows = await session.fetchRows(USERS_QUERY);

  for (const row of rows) {
    const message = formatUserRow(row);
    if (options.redactLogger) {
      options.redactLogger.info(message);
    } else {
      options.write(`${message}\n`);
    }
  }

  return rows.length;
}
