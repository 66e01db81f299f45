import { closeSync, existsSync, fsyncSync, openSync, readFileSync, writeSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { ClosedLogError } from './errors.js';
import { toEpochSeconds } from './util/date.js';
import { logger as defaultLogger, type Logger } from './util/logger.js';

export type LogValue = string | number | boolean | null | undefined;
/**
 * Column order follows key order, and plain objects list integer-like keys
 * ("10") before every other key. Give such columns a non-numeric name when
 * their position matters.
 */
export type LogRecord = Record<string, LogValue>;
export type LogRow = LogRecord & { _tick: number; _time: number };

export type LogOrigin = 'fresh' | 'resumed';
export type AppenderState = 'open' | 'closed';

export type TabularLogOptions = {
  logger?: Logger;
  clock?: () => Date;
};

export type AppendOptions = {
  verbose?: boolean;
};

export const TICK_COLUMN = '_tick';
export const TIME_COLUMN = '_time';
const LEGACY_TICK_COLUMN = '# _tick';

function parseCsv(content: string): string[][] {
  const records: unknown = parse(content, {
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records)) {
    return [];
  }
  return records
    .filter((record): record is unknown[] => Array.isArray(record))
    .map((record) => record.map((field) => String(field)));
}

function encodeLine(fields: LogValue[]): string {
  return stringify([fields], { cast: { boolean: (value) => String(value) } });
}

// Rows go in as arrays: with the `columns` option the stringifier would read
// dotted names such as "eval.loss" as nested paths.
function encodeRow(row: LogRecord, columns: string[]): string {
  return encodeLine(columns.map((column) => row[column]));
}

function parseTick(field: string | undefined): number | null {
  const trimmed = field?.trim() ?? '';
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

function formatEcho(row: LogRecord): string {
  return Object.keys(row)
    .sort()
    .map((key) => `${key}: ${String(row[key])}`)
    .join(', ');
}

function writeAll(fd: number, text: string): void {
  const buffer = Buffer.from(text, 'utf8');
  let offset = 0;
  while (offset < buffer.length) {
    offset += writeSync(fd, buffer, offset, buffer.length - offset);
  }
}

/**
 * Append-only CSV log whose columns grow as new keys show up.
 *
 * Reopening an existing file resumes from it: the header on disk becomes the
 * column list and `_tick` continues after the last complete row. The header
 * is written once, together with the row that gets tick 0. Columns first seen
 * after that row are stored in every later row but never reach the header;
 * readers of older logs rely on this, so it is kept as is.
 */
export class TabularLogAppender {
  readonly path: string;
  readonly origin: LogOrigin;
  private readonly fieldnames: string[] = [TICK_COLUMN, TIME_COLUMN];
  private tick = 0;
  private fd: number | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(logsPath: string, options: TabularLogOptions = {}) {
    this.path = logsPath;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());

    if (existsSync(logsPath)) {
      this.logger.warn('Path to log file already exists. New data will be appended.');
      this.resume(readFileSync(logsPath, 'utf8'));
      this.origin = 'resumed';
    } else {
      this.origin = 'fresh';
    }

    this.fd = openSync(logsPath, 'a');
  }

  get columns(): string[] {
    return [...this.fieldnames];
  }

  get nextTick(): number {
    return this.tick;
  }

  get state(): AppenderState {
    return this.fd === null ? 'closed' : 'open';
  }

  private resume(content: string): void {
    let records: string[][];
    try {
      records = parseCsv(content);
    } catch (error) {
      this.logger.warn(`Could not parse log file, keeping default columns and restarting at 0: ${String(error)}`);
      return;
    }

    const header = records[0];
    if (header && header.length > 0) {
      const fields = header.map((name) => (name === LEGACY_TICK_COLUMN ? TICK_COLUMN : name));
      this.fieldnames.splice(0, this.fieldnames.length, ...fields);
    }

    // Records span lines when a quoted value holds a newline. A file that does
    // not end in a newline has a partial last record; it is skipped.
    const complete = content.endsWith('\n') ? records : records.slice(0, -1);
    const lastRow = complete[complete.length - 1];
    if (lastRow === undefined) {
      return;
    }

    const previous = parseTick(lastRow[0]);
    if (previous === null) {
      this.logger.warn(`Could not read a tick from the last log row, restarting at 0: ${JSON.stringify(lastRow)}`);
      return;
    }
    this.tick = previous + 1;
  }

  append(record: LogRecord, options: AppendOptions = {}): LogRow {
    if (this.fd === null) {
      throw new ClosedLogError(this.path);
    }

    const row: LogRow = {
      ...record,
      _tick: this.tick,
      _time: toEpochSeconds(this.clock()),
    };
    this.tick += 1;

    for (const key of Object.keys(row)) {
      if (!this.fieldnames.includes(key)) {
        this.fieldnames.push(key);
      }
    }

    let text = '';
    if (row._tick === 0) {
      text += encodeLine(this.fieldnames);
    }
    text += encodeRow(row, this.fieldnames);

    writeAll(this.fd, text);
    fsyncSync(this.fd);

    if (options.verbose) {
      this.logger.info(`LOG | ${formatEcho(row)}`);
    }
    return row;
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
