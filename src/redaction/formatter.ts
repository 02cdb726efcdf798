import pino from 'pino';
import { FormatError } from '../errors';
import type { LogRecord } from '../schemas/logRecord';
import { filterDatum, REDACTION, SEPARATOR } from './filterDatum';

const PLACEHOLDER = /\{(\w+)\}/g;
const PLACEHOLDER_NAMES = ['name', 'levelname', 'asctime', 'message'] as const;

const KNOWN_PLACEHOLDERS = new Set<string>(PLACEHOLDER_NAMES);

type Placeholder = (typeof PLACEHOLDER_NAMES)[number];

function isPlaceholder(value: string): value is Placeholder {
  return KNOWN_PLACEHOLDERS.has(value);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss,SSS`. */
export function formatAsctime(epochMs: number): string {
  const date = new Date(epochMs);
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

export function levelName(level: number): string {
  const label = pino.levels.labels[level];
  return label ? label.toUpperCase() : `LEVEL${level}`;
}

export class TemplateFormatter {
  constructor(protected readonly template: string) {
    for (const match of template.matchAll(PLACEHOLDER)) {
      if (!isPlaceholder(match[1])) {
        throw new FormatError(`Unknown placeholder {${match[1]}} in log template`);
      }
    }
  }

  format(record: LogRecord): string {
    const values: Record<Placeholder, string> = {
      name: record.name ?? '',
      levelname: levelName(record.level),
      asctime: formatAsctime(record.time),
      message: record.msg
    };

    return this.template.replace(PLACEHOLDER, (placeholder: string, key: string) =>
      isPlaceholder(key) ? values[key] : placeholder
    );
  }
}

/**
 * Renders log records with a fixed prefix and masks the configured fields in the rendered line.
 */
export class RedactingFormatter extends TemplateFormatter {
  static readonly REDACTION = REDACTION;
  static readonly FORMAT = '[HOLBERTON] {name} {levelname} {asctime}: {message}';
  static readonly SEPARATOR = SEPARATOR;

  readonly fields: readonly string[];

  constructor(fields: readonly string[]) {
    super(RedactingFormatter.FORMAT);
    this.fields = [...fields];
  }

  override format(record: LogRecord): string {
    return filterDatum(this.fields, RedactingFormatter.REDACTION, super.format(record), RedactingFormatter.SEPARATOR);
  }
}
