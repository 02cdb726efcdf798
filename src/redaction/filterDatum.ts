export const PII_FIELDS = ['name', 'email', 'phone', 'ssn', 'password'] as const;
export const REDACTION = '***';
export const SEPARATOR = ';';

function escapePattern(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces the value of every `<field>=<value><separator>` segment with the redaction marker.
 * Values end at the first separator after the `=`; field names and the separator are matched literally.
 */
export function filterDatum(fields: readonly string[], redaction: string, message: string, separator: string): string {
  const escapedSeparator = escapePattern(separator);

  return fields.reduce((current, field) => {
    const pattern = new RegExp(`${escapePattern(field)}=.*?${escapedSeparator}`, 'g');
    const replacement = `${field}=${redaction}${separator}`;
    return current.replace(pattern, () => replacement);
  }, message);
}
