import type { LogRecord, LogValue } from '../tabular-log.js';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Reads a command-line value the way a CSV cell would be typed by hand:
 * numbers, `true`/`false`, empty as null, anything else as text.
 */
export function parseScalar(raw: string): LogValue {
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  if (NUMBER_PATTERN.test(trimmed)) return Number(trimmed);
  return raw;
}

/**
 * Parses `key=value` arguments into a record.
 * @throws Error when an argument has no `=` or an empty key
 */
export function parseAssignments(args: string[]): LogRecord {
  const record: LogRecord = {};
  for (const arg of args) {
    const index = arg.indexOf('=');
    if (index <= 0) {
      throw new Error(`Expected key=value, got: ${arg}`);
    }
    record[arg.slice(0, index)] = parseScalar(arg.slice(index + 1));
  }
  return record;
}
