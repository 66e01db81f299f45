import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Logger, LogLevel, type LogSink } from '../src/util/logger.js';

export type CapturedLine = { level: LogLevel; message: string };

export type MemorySink = LogSink & { lines: CapturedLine[] };

export function memorySink(name = 'memory'): MemorySink {
  const lines: CapturedLine[] = [];
  return {
    name,
    lines,
    write(level, message) {
      lines.push({ level, message });
    },
  };
}

export function captureLogger(): { logger: Logger; sink: MemorySink } {
  const sink = memorySink();
  return { logger: new Logger({ level: LogLevel.DEBUG, sinks: [sink] }), sink };
}

export function messagesAt(sink: MemorySink, level: LogLevel): string[] {
  return sink.lines.filter((line) => line.level === level).map((line) => line.message);
}

/** Returns `start`, then `start + stepMs`, and so on. */
export function steppingClock(start: Date, stepMs = 1000): () => Date {
  let next = start.getTime();
  return () => {
    const current = new Date(next);
    next += stepMs;
    return current;
  };
}

const tempDirs: string[] = [];

export async function makeTempDir(prefix = 'runlog-'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
}
