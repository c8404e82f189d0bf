import type { SizewalkContext } from './context.js';
import { parseCliArgs } from './cli.js';
import { createDirectoryScanner } from './lib/directoryScanner.js';
import { createNodeFileSystemReader } from './lib/fileSystemReader.js';
import { createScanConfig, ScanConfigError } from './lib/scanConfig.js';
import type { FileSystemReader, ReportPrinter, ScanConfig } from './lib/types.js';

export interface RunSizewalkOptions {
  print?: ReportPrinter;
  fileSystem?: FileSystemReader;
}

const printToStdout: ReportPrinter = (line) => console.log(line);

/**
 * Runs one scan for the given arguments and resolves to the process exit code.
 * Flags take precedence over the environment.
 */
export async function runSizewalk(
  context: SizewalkContext,
  args: string[],
  { print = printToStdout, fileSystem = createNodeFileSystemReader() }: RunSizewalkOptions = {},
): Promise<number> {
  const { config: env } = context.envContext;
  const { logger } = context.diagnosticContext;

  let rootDir: string;
  let config: ScanConfig;

  try {
    const cli = parseCliArgs(args);
    if (cli.kind === 'exit') {
      return cli.exitCode;
    }

    rootDir = cli.options.rootDir ?? env.ROOT_DIR;
    config = createScanConfig({
      sizeThreshold: cli.options.sizeThreshold ?? env.SIZE_THRESHOLD,
      ignoreDirRegexp: cli.options.ignoreDirRegexp ?? env.IGNORE_DIR_REGEXP,
      sizeUnits: cli.options.sizeUnits ?? env.SIZE_UNITS,
    });
  } catch (error) {
    if (error instanceof ScanConfigError) {
      logger.fatal(error);
      return 1;
    }
    throw error;
  }

  logger.info('Scanning directory', {
    rootDir,
    sizeThreshold: config.sizeThreshold,
    ignorePattern: config.ignorePattern?.source,
  });

  const scanner = createDirectoryScanner({ config, fileSystem, logger, print });
  await scanner.visualise(rootDir);

  return 0;
}
