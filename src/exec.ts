import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { execa } from 'execa';
import { RunRecorder, type RunRecorderOptions } from './recorder.js';
import type { LogRecord, LogValue } from './tabular-log.js';

export type ExecSummary = {
  runId: string;
  exitCode: number;
  rows: number;
  successful: boolean;
};

function isLogValue(value: unknown): value is LogValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * A stdout line counts as a row when it is a JSON object whose values are all
 * scalars. Everything else is a message.
 */
export function parseRowLine(line: string): LogRecord | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  const record: LogRecord = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isLogValue(value)) {
      return null;
    }
    record[key] = value;
  }
  return record;
}

async function forEachLine(stream: Readable | null, onLine: (line: string) => void): Promise<void> {
  if (!stream) {
    return;
  }
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  for await (const line of lines) {
    onLine(line);
  }
}

/**
 * Runs `command` as one recorded run. JSON rows on stdout go to the tabular
 * log, other stdout lines are logged as info and stderr lines as warnings.
 * The run is successful when the command exits with 0.
 */
export async function recordCommand(
  command: string,
  args: string[],
  options: RunRecorderOptions = {},
): Promise<ExecSummary> {
  const recorder = await RunRecorder.open({
    ...options,
    config: { command, args, ...options.config },
  });

  let rows = 0;
  let successful = false;
  let exitCode = 1;
  try {
    const child = execa(command, args, { reject: false, cwd: options.cwd, env: options.env });
    await Promise.all([
      forEachLine(child.stdout, (line) => {
        const row = parseRowLine(line);
        if (row) {
          recorder.log(row);
          rows += 1;
        } else {
          recorder.logger.info(line);
        }
      }),
      forEachLine(child.stderr, (line) => recorder.logger.warn(line)),
    ]);
    const result = await child;
    exitCode = result.exitCode ?? 1;
    successful = exitCode === 0 && !result.failed;
    if (!successful) {
      recorder.logger.error(`Command exited with code ${exitCode}`);
    }
  } finally {
    recorder.close(successful);
  }

  return { runId: recorder.runId, exitCode, rows, successful };
}
