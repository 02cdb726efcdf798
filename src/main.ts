import type { Logger } from 'pino';
import { loadConfig } from './config';
import { type Connector, withDb } from './db/connection';
import { buildLogger, getLogger, type LineSink } from './logger';
import { reportUsers } from './users/report';

export interface MainDependencies {
  connector?: Connector;
  out?: LineSink;
  logger?: Logger;
}

export async function main(env: NodeJS.ProcessEnv = process.env, dependencies: MainDependencies = {}): Promise<number> {
  const config = loadConfig(env);
  const logger = dependencies.logger ?? buildLogger(config.logLevel);
  const out = dependencies.out ?? process.stdout;
  logger.debug({ config }, 'config_loaded');

  const rowCount = await withDb(
    config.database,
    (session) =>
      reportUsers(session, {
        write: (chunk) => out.write(chunk),
        redactLogger: config.redactRows ? getLogger(out) : undefined
      }),
    { connector: dependencies.connector, logger }
  );

  logger.info({ rowCount, redacted: config.redactRows }, 'user_report_completed');
  return rowCount;
}
