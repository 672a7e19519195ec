import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LogSourceError } from '@shared/lib/errors.js';
import { FileLogSource } from './file-log-source.js';

describe('FileLogSource', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'buildbrief-log-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads a log file', async () => {
    const path = join(tempDir, 'build.log');
    writeFileSync(path, 'npm ERR! code ELIFECYCLE\n');

    const log = await new FileLogSource().fetchLog({ kind: 'file', path });

    expect(log).toBe('npm ERR! code ELIFECYCLE\n');
  });

  it('reads stdin for "-"', async () => {
    const source = new FileLogSource({ readStdin: async () => 'piped log' });

    expect(await source.fetchLog({ kind: 'file', path: '-' })).toBe('piped log');
  });

  it('wraps read failures in LogSourceError', async () => {
    const path = join(tempDir, 'missing.log');

    await expect(new FileLogSource().fetchLog({ kind: 'file', path })).rejects.toThrow(LogSourceError);
    await expect(new FileLogSource().fetchLog({ kind: 'file', path })).rejects.toThrow(
      `Cannot read build log from ${path}`,
    );
  });

  it('names stdin when reading it fails', async () => {
    const source = new FileLogSource({
      readStdin: async () => {
        throw new Error('EPIPE');
      },
    });

    await expect(source.fetchLog({ kind: 'file', path: '-' })).rejects.toThrow('Cannot read build log from stdin: EPIPE');
  });

  it('refuses GitHub references', async () => {
    await expect(
      new FileLogSource().fetchLog({ kind: 'github', owner: 'a', repo: 'b' }),
    ).rejects.toThrow('FileLogSource cannot read a github reference');
  });
});
