import { z } from 'zod';
import { FormatError } from '../errors';

export const logRecordSchema = z
  .object({
    level: z.number().int(),
    time: z.number(),
    name: z.string().optional(),
    msg: z.coerce.string().default('')
  })
  .passthrough();

export type LogRecord = z.infer<typeof logRecordSchema>;

export function parseLogRecord(line: string): LogRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new FormatError('Log line is not valid JSON');
  }

  const result = logRecordSchema.safeParse(parsed);
  if (!result.success) {
    throw new FormatError('Log line is not a log record', result.error.flatten());
  }

  return result.data;
}
