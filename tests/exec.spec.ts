import { afterEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parseRowLine, recordCommand } from '../src/exec.js';
import { Logger, LogLevel } from '../src/util/logger.js';
import { cleanupTempDirs, makeTempDir } from './helpers.js';

const ROWS_SCRIPT = [
  'console.log(JSON.stringify({ loss: 0.5 }));',
  'console.log("warming up");',
  'console.error("careful");',
  'console.log(JSON.stringify({ loss: 0.25, acc: 0.75 }));',
].join('\n');

describe('parseRowLine', () => {
  it('accepts JSON objects of scalars', () => {
    expect(parseRowLine(' {"loss": 0.5, "tag": "a", "done": false, "skip": null} ')).toEqual({
      loss: 0.5,
      tag: 'a',
      done: false,
      skip: null,
    });
  });

  it('rejects anything else', () => {
    expect(parseRowLine('epoch 3')).toBeNull();
    expect(parseRowLine('{not json')).toBeNull();
    expect(parseRowLine('{"nested": {"a": 1}}')).toBeNull();
    expect(parseRowLine('[1, 2]')).toBeNull();
  });
});

describe('recordCommand', () => {
  afterEach(async () => {
    await cleanupTempDirs();
  });

  it('turns JSON lines into rows and everything else into messages', async () => {
    const root = await makeTempDir();

    const summary = await recordCommand(process.execPath, ['-e', ROWS_SCRIPT], {
      runId: 'exec-run',
      root,
      cwd: root,
      logger: new Logger({ level: LogLevel.DEBUG, sinks: [] }),
    });

    expect(summary).toEqual({ runId: 'exec-run', exitCode: 0, rows: 2, successful: true });
    const runDir = path.join(root, 'exec-run');
    const csv = (await fs.readFile(path.join(runDir, 'logs.csv'), 'utf8')).trimEnd().split('\n');
    expect(csv[0]).toBe('_tick,_time,loss');
    expect(csv).toHaveLength(3);
    expect(csv[2]).toMatch(/^1,[\d.]+,0\.25,0\.75$/);

    const messages = (await fs.readFile(path.join(runDir, 'out.log'), 'utf8')).split('\n');
    expect(messages).toContain('warming up');
    expect(messages).toContain('careful');

    const meta = JSON.parse(await fs.readFile(path.join(runDir, 'meta.json'), 'utf8')) as unknown;
    expect(meta).toMatchObject({
      successful: true,
      args: { command: process.execPath, args: ['-e', ROWS_SCRIPT] },
    });
  });

  it('records a failing command as unsuccessful', async () => {
    const root = await makeTempDir();

    const summary = await recordCommand(process.execPath, ['-e', 'process.exit(3)'], {
      runId: 'exec-fail',
      root,
      cwd: root,
      logger: new Logger({ level: LogLevel.DEBUG, sinks: [] }),
    });

    expect(summary).toEqual({ runId: 'exec-fail', exitCode: 3, rows: 0, successful: false });
    const meta = JSON.parse(await fs.readFile(path.join(root, 'exec-fail', 'meta.json'), 'utf8')) as unknown;
    expect(meta).toMatchObject({ successful: false });
    const messages = await fs.readFile(path.join(root, 'exec-fail', 'out.log'), 'utf8');
    expect(messages).toBe('Saving logs data to ' + path.join(root, 'exec-fail', 'logs.csv') + '\nCommand exited with code 3\n');
  });
});
