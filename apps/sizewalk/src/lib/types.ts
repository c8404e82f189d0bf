import type { ByteUnitSystem } from '@sizewalk/utils';

export type DirectoryEntryKind = 'file' | 'directory' | 'other';

export interface DirectoryEntry {
  name: string;
  kind: DirectoryEntryKind;
}

export interface FileSystemReader {
  /**
   * Reads the whole listing of a directory before returning it.
   */
  listDirectory(dirPath: string): Promise<DirectoryEntry[]>;
  getFileSize(filePath: string): Promise<number>;
}

export interface ScanConfig {
  readonly sizeThreshold: number;
  readonly ignorePattern?: RegExp;
  readonly sizeUnits: ByteUnitSystem;
}

export interface WalkResult {
  totalBytes: number;
  /**
   * File lines printed directly at this directory level (not in subdirectories).
   */
  printedFileCount: number;
}

export interface ScanSummary extends WalkResult {
  rootPath: string;
  duration: number;
}

export type ReportPrinter = (line: string) => void;
