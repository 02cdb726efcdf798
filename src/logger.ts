import pino, { type DestinationStream, type Logger } from 'pino';
import { parseLogRecord } from './schemas/logRecord';
import { RedactingFormatter } from './redaction/formatter';
import { PII_FIELDS } from './redaction/filterDatum';

export const USER_DATA_LOGGER = 'user_data';

export interface LineSink {
  write(chunk: string): unknown;
}

export function buildLogger(level: string, destination: DestinationStream = pino.destination(2)): Logger {
  return pino(
    {
      level,
      redact: {
        paths: ['config.database.password'],
        censor: '[REDACTED]'
      }
    },
    destination
  );
}

/** pino destination that turns each JSON record into one redacted text line. */
export class RedactingDestination implements DestinationStream {
  constructor(
    private readonly formatter: RedactingFormatter,
    private readonly sink: LineSink
  ) {}

  write(line: string): void {
    const record = parseLogRecord(line);
    this.sink.write(`${this.formatter.format(record)}\n`);
  }
}

// Each call builds its own logger and destination; nothing is registered globally.
export function getLogger(sink: LineSink = process.stdout): Logger {
  return pino(
    {
      name: USER_DATA_LOGGER,
      level: 'info'
    },
    new RedactingDestination(new RedactingFormatter(PII_FIELDS), sink)
  );
}
