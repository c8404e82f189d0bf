import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import type { DirectoryEntryKind, FileSystemReader } from './types.js';

// Symlinks are checked first so they are never followed or counted.
function classifyEntry(entry: Dirent): DirectoryEntryKind {
  if (entry.isSymbolicLink()) return 'other';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

export function createNodeFileSystemReader(): FileSystemReader {
  return {
    async listDirectory(dirPath) {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });

      return entries.map((entry) => ({ name: entry.name, kind: classifyEntry(entry) }));
    },

    async getFileSize(filePath) {
      const stats = await fs.lstat(filePath);
      return stats.size;
    },
  };
}
