import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createNodeFileSystemReader } from './fileSystemReader.js';

describe('createNodeFileSystemReader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sizewalk-reader-'));
    await fs.writeFile(path.join(tempDir, 'data.bin'), Buffer.alloc(1234));
    await fs.mkdir(path.join(tempDir, 'nested'));
    await fs.symlink(path.join(tempDir, 'nested'), path.join(tempDir, 'shortcut'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should classify files, directories and symlinks', async () => {
    const reader = createNodeFileSystemReader();

    const entries = await reader.listDirectory(tempDir);
    const byName = Object.fromEntries(entries.map((entry) => [entry.name, entry.kind]));

    expect(byName).toEqual({
      'data.bin': 'file',
      nested: 'directory',
      shortcut: 'other',
    });
  });

  it('should report the size of a file', async () => {
    const reader = createNodeFileSystemReader();

    await expect(reader.getFileSize(path.join(tempDir, 'data.bin'))).resolves.toBe(1234);
  });

  it('should reject for a directory that does not exist', async () => {
    const reader = createNodeFileSystemReader();

    await expect(reader.listDirectory(path.join(tempDir, 'missing'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
