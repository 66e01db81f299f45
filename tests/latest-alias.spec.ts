import { afterEach, describe, expect, it, vi } from 'vitest';
import { promises as fs, symlinkSync, unlinkSync } from 'node:fs';
import path from 'node:path';
import { ensureLatestAlias } from '../src/run-directory.js';
import { cleanupTempDirs, makeTempDir } from './helpers.js';

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    symlinkSync: vi.fn(actual.symlinkSync),
    unlinkSync: vi.fn(actual.unlinkSync),
  };
});

function fsError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

describe('ensureLatestAlias under contention', () => {
  afterEach(async () => {
    vi.clearAllMocks();
    await cleanupTempDirs();
  });

  it('returns false when another process creates the alias first', async () => {
    const root = await makeTempDir();
    const aliasPath = path.join(root, 'latest');
    vi.mocked(symlinkSync).mockImplementationOnce(() => {
      throw fsError('EEXIST');
    });

    expect(ensureLatestAlias(root, path.join(root, 'r1'))).toBe(false);
    await expect(fs.lstat(aliasPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('returns false when another process removes the old alias first', async () => {
    const root = await makeTempDir();
    await fs.symlink(path.join(root, 'old'), path.join(root, 'latest'));
    vi.mocked(unlinkSync).mockImplementationOnce(() => {
      throw fsError('ENOENT');
    });

    expect(ensureLatestAlias(root, path.join(root, 'new'))).toBe(false);
    expect(symlinkSync).not.toHaveBeenCalled();
  });

  it('propagates any other error', async () => {
    const root = await makeTempDir();
    vi.mocked(symlinkSync).mockImplementationOnce(() => {
      throw fsError('EACCES');
    });

    expect(() => ensureLatestAlias(root, path.join(root, 'r1'))).toThrow('EACCES: simulated');
  });
});
