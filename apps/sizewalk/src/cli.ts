import { cac } from 'cac';
import { ScanConfigError } from './lib/scanConfig.js';

export const VERSION = '0.1.0';

export interface CliOptions {
  rootDir?: string;
  sizeThreshold?: string;
  ignoreDirRegexp?: string;
  sizeUnits?: string;
}

export type CliParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'exit'; exitCode: number };

export function createCli() {
  const cli = cac('sizewalk');

  cli.usage('[options]');
  cli.option('-d <path>', 'directory to search (default: $ROOT_DIR or /)');
  cli.option('-s <size>', 'size threshold, e.g. 100MB or 1.5GiB (default: $SIZE_THRESHOLD or 100MB)');
  cli.option('-i <regexp>', 'regexp matching full paths of directories to ignore (default: $IGNORE_DIR_REGEXP)');
  cli.option('-u, --units <units>', 'units for printed sizes, si or iec (default: $SIZE_UNITS or si)');
  cli.version(VERSION);
  cli.help();

  return cli;
}

type Cli = ReturnType<typeof createCli>;
type CliOption = Cli['globalCommand']['options'][number];

function indexOptionsByFlag(cli: Cli): Map<string, CliOption> {
  const byFlag = new Map<string, CliOption>();

  for (const option of cli.globalCommand.options) {
    for (const name of option.names) {
      byFlag.set(name.length === 1 ? `-${name}` : `--${name}`, option);
    }
  }

  return byFlag;
}

/**
 * Reads flag values from the raw tokens so that paths and patterns such as
 * `2024.10` or `01` reach the scanner untouched. Accepts `-d value`,
 * `--units value` and `--units=value`; stops at `--`.
 */
function readOptionValues(cli: Cli, args: string[]): Map<string, string | true> {
  const byFlag = indexOptionsByFlag(cli);
  const values = new Map<string, string | true>();

  for (let index = 0; index < args.length; index++) {
    const token = args[index];

    if (token === '--') break;
    if (!token.startsWith('-') || token === '-') continue;

    const separator = token.indexOf('=');
    const flag = separator === -1 ? token : token.slice(0, separator);
    const option = byFlag.get(flag);

    if (!option) {
      throw new ScanConfigError(`unknown option '${flag}'`);
    }

    if (option.isBoolean) {
      values.set(option.name, true);
    } else if (separator !== -1) {
      values.set(option.name, token.slice(separator + 1));
    } else {
      const value = args[index + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new ScanConfigError(`option ${flag} requires a value`);
      }

      values.set(option.name, value);
      index++;
    }
  }

  return values;
}

/**
 * Parses user arguments (without the node binary and script path).
 * Help and version are printed here and end the run.
 */
export function parseCliArgs(args: string[]): CliParseResult {
  const cli = createCli();
  const values = readOptionValues(cli, args);

  if (values.has('help')) {
    cli.outputHelp();
    return { kind: 'exit', exitCode: 0 };
  }
  if (values.has('version')) {
    cli.outputVersion();
    return { kind: 'exit', exitCode: 0 };
  }

  const read = (name: string) => {
    const value = values.get(name);
    return typeof value === 'string' ? value : undefined;
  };

  return {
    kind: 'run',
    options: {
      rootDir: read('d'),
      sizeThreshold: read('s'),
      ignoreDirRegexp: read('i'),
      sizeUnits: read('units'),
    },
  };
}
