import * as path from 'node:path';
import type { SF } from '@sizewalk/service-framework-node';
import { formatBytes, formatDuration } from '@sizewalk/utils';
import type {
  DirectoryEntry,
  FileSystemReader,
  ReportPrinter,
  ScanConfig,
  ScanSummary,
  WalkResult,
} from './types.js';

export interface DirectoryScannerParams {
  config: ScanConfig;
  fileSystem: FileSystemReader;
  logger: SF.Logger;
  print: ReportPrinter;
}

const emptyWalk: WalkResult = { totalBytes: 0, printedFileCount: 0 };

function compareByName(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Depth-first size walk. Every directory and file whose size exceeds the
 * threshold is printed as `<path>: <size>` the moment its size is known, so a
 * directory line follows the lines of everything inside it.
 *
 * Unreadable directories, files whose size cannot be read and directories
 * matching the ignore pattern are logged and contribute nothing.
 */
export function createDirectoryScanner({ config, fileSystem, logger, print }: DirectoryScannerParams) {
  const formatLine = (entryPath: string, bytes: number) =>
    `${entryPath}: ${formatBytes(bytes, config.sizeUnits)}`;

  const isIgnored = (dirPath: string) => config.ignorePattern?.test(dirPath) ?? false;

  async function readEntries(dirPath: string): Promise<DirectoryEntry[] | undefined> {
    try {
      const entries = await fileSystem.listDirectory(dirPath);
      return [...entries].sort(compareByName);
    } catch (error) {
      logger.error(error, `could not read contents of directory ${dirPath}`);
      logger.warn(`will skip directory ${dirPath} in calculations`);
      return undefined;
    }
  }

  async function readFileSize(filePath: string): Promise<number | undefined> {
    try {
      return await fileSystem.getFileSize(filePath);
    } catch (error) {
      logger.error(error, `could not get info for file ${filePath}`);
      logger.warn(`file ${filePath} will not be included in calculations`);
      return undefined;
    }
  }

  // Resolves to undefined when the directory itself cannot be listed.
  async function walk(dirPath: string): Promise<WalkResult | undefined> {
    const entries = await readEntries(dirPath);
    if (!entries) return undefined;

    let totalBytes = 0;
    let printedFileCount = 0;

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      let entryBytes: number;
      let closesGroup = false;

      if (entry.kind === 'file') {
        const size = await readFileSize(fullPath);
        if (size === undefined) continue;

        entryBytes = size;
      } else if (entry.kind === 'directory') {
        if (isIgnored(fullPath)) {
          logger.warn(`ignoring directory '${fullPath}' due to matched ignore-regexp`);
          continue;
        }

        const subtree = await walk(fullPath);
        if (!subtree) continue;

        entryBytes = subtree.totalBytes;
        closesGroup = subtree.printedFileCount > 0;
      } else {
        continue;
      }

      if (entryBytes > config.sizeThreshold) {
        if (entry.kind === 'file' && printedFileCount === 0) {
          print('');
        }

        print(formatLine(fullPath, entryBytes));

        if (closesGroup) {
          print('');
        }

        if (entry.kind === 'file') {
          printedFileCount++;
        }
      }

      totalBytes += entryBytes;
    }

    return { totalBytes, printedFileCount };
  }

  async function scan(dirPath: string): Promise<WalkResult> {
    return (await walk(dirPath)) ?? emptyWalk;
  }

  async function visualise(rootPath: string): Promise<ScanSummary> {
    const startTime = Date.now();
    const result = await walk(rootPath);

    if (result && result.totalBytes > config.sizeThreshold) {
      print(formatLine(rootPath, result.totalBytes));
      print('');
    }

    const duration = Date.now() - startTime;
    const summary: ScanSummary = { rootPath, duration, ...(result ?? emptyWalk) };

    logger.debug('Scan completed', {
      rootPath,
      totalBytes: summary.totalBytes,
      duration: formatDuration(duration),
    });

    return summary;
  }

  return {
    scan,
    visualise,
  };
}

export type DirectoryScanner = ReturnType<typeof createDirectoryScanner>;
