import { type ByteUnitSystem, parseBytes } from '@sizewalk/utils';
import type { ScanConfig } from './types.js';

export class ScanConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ScanConfigError';
    Object.setPrototypeOf(this, ScanConfigError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export interface ScanConfigInput {
  sizeThreshold: string;
  ignoreDirRegexp: string;
  sizeUnits: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isByteUnitSystem(value: string): value is ByteUnitSystem {
  return value === 'si' || value === 'iec';
}

function parseThreshold(sizeThreshold: string): number {
  try {
    return parseBytes(sizeThreshold);
  } catch (error) {
    throw new ScanConfigError(
      `invalid size threshold '${sizeThreshold}': ${describeError(error)}`,
      error,
    );
  }
}

function compileIgnorePattern(ignoreDirRegexp: string): RegExp | undefined {
  if (ignoreDirRegexp === '') {
    return undefined;
  }

  try {
    return new RegExp(ignoreDirRegexp);
  } catch (error) {
    throw new ScanConfigError(
      `could not compile regexp '${ignoreDirRegexp}': ${describeError(error)}`,
      error,
    );
  }
}

export function createScanConfig(input: ScanConfigInput): ScanConfig {
  const sizeThreshold = parseThreshold(input.sizeThreshold);
  const ignorePattern = compileIgnorePattern(input.ignoreDirRegexp);

  if (!isByteUnitSystem(input.sizeUnits)) {
    throw new ScanConfigError(`unknown size units '${input.sizeUnits}', expected 'si' or 'iec'`);
  }

  return Object.freeze({
    sizeThreshold,
    ignorePattern,
    sizeUnits: input.sizeUnits,
  });
}
