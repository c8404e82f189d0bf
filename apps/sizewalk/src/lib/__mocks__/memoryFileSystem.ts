import type { DirectoryEntry, FileSystemReader } from '../types.js';

export type MemoryNode =
  | { type: 'file'; size: number; unreadable?: boolean }
  | { type: 'directory'; children: Record<string, MemoryNode>; unreadable?: boolean }
  | { type: 'other' };

export const file = (size: number, options: { unreadable?: boolean } = {}): MemoryNode => ({
  type: 'file',
  size,
  ...options,
});

export const dir = (
  children: Record<string, MemoryNode> = {},
  options: { unreadable?: boolean } = {},
): MemoryNode => ({ type: 'directory', children, ...options });

export const other = (): MemoryNode => ({ type: 'other' });

class MemoryFileSystemError extends Error {
  constructor(
    public code: string,
    syscall: string,
    targetPath: string,
  ) {
    super(`${code}: ${code === 'EACCES' ? 'permission denied' : 'no such file or directory'}, ${syscall} '${targetPath}'`);
    this.name = 'MemoryFileSystemError';
  }
}

/**
 * In-memory FileSystemReader mounted at `rootPath`. Listing order is the
 * insertion order of `children`, reversed, so tests notice when callers rely on it.
 */
export function createMemoryFileSystem(rootPath: string, root: MemoryNode) {
  const listedDirectories: string[] = [];
  const statedFiles: string[] = [];

  function lookup(targetPath: string): MemoryNode | undefined {
    if (targetPath === rootPath) return root;

    const prefix = rootPath.endsWith('/') ? rootPath : `${rootPath}/`;
    if (!targetPath.startsWith(prefix)) return undefined;

    let node: MemoryNode | undefined = root;
    for (const segment of targetPath.slice(prefix.length).split('/')) {
      if (node?.type !== 'directory') return undefined;
      node = node.children[segment];
    }

    return node;
  }

  const reader: FileSystemReader = {
    async listDirectory(dirPath) {
      listedDirectories.push(dirPath);
      const node = lookup(dirPath);

      if (node?.type !== 'directory') {
        throw new MemoryFileSystemError('ENOENT', 'scandir', dirPath);
      }
      if (node.unreadable) {
        throw new MemoryFileSystemError('EACCES', 'scandir', dirPath);
      }

      const entries: DirectoryEntry[] = Object.entries(node.children).map(([name, child]) => ({
        name,
        kind: child.type,
      }));

      return entries.reverse();
    },

    async getFileSize(filePath) {
      statedFiles.push(filePath);
      const node = lookup(filePath);

      if (node?.type !== 'file') {
        throw new MemoryFileSystemError('ENOENT', 'lstat', filePath);
      }
      if (node.unreadable) {
        throw new MemoryFileSystemError('EACCES', 'lstat', filePath);
      }

      return node.size;
    },
  };

  return {
    reader,
    listedDirectories,
    statedFiles,
  };
}
