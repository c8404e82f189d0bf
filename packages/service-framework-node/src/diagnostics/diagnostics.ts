import type { DefaultEnvContext } from '../environment/types.js';
import type {
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  Logger,
  LogOutputFormat,
  LogSeverity,
  LogStream,
  LogWriter,
} from './types.js';

const severityLevels: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const cliSeverityLabels: Record<LogSeverity, string> = {
  debug: 'debug',
  info: 'info',
  warn: 'warning',
  error: 'error',
  fatal: 'fatal',
};

const resetColor = '\x1b[0m';
const msgColor = '\x1b[34m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

export const consoleLogWriter: LogWriter = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function formatAsCli(entry: LogEntry): string {
  const label = cliSeverityLabels[entry.severity];
  const additionalMessage = entry.fields?.additionalMessage;

  if (typeof additionalMessage !== 'string') {
    return `${label}: ${entry.message}`;
  }

  // error()/fatal() put the cause in `message` and the caller's text in `additionalMessage`
  const cause = additionalMessage === entry.message ? entry.fields?.error : entry.message;

  return typeof cause === 'string'
    ? `${label}: ${additionalMessage}: ${cause}`
    : `${label}: ${additionalMessage}`;
}

function formatAsJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function formatAsHumanReadable(entry: LogEntry): string {
  const severityColor = severityColors[entry.severity];

  const parts: string[] = [
    `${severityColor}${entry.severity}${resetColor}`,
    `process=${msgColor}${entry.serviceName}${resetColor}`,
    `ts=${msgColor}${entry.timestamp}${resetColor}`,
    `msg="${severityColor}${entry.message}${resetColor}"`,
  ];

  if (entry.fields) {
    for (const [key, value] of Object.entries(entry.fields)) {
      const serializedValue = typeof value === 'object' ? JSON.stringify(value) : `"${String(value)}"`;
      parts.push(`${key}=${severityColor}${serializedValue}${resetColor}`);
    }
  }

  return parts.join(' ');
}

function formatAsStructuredText(entry: LogEntry): string {
  const parts: string[] = [
    `timestamp=${entry.timestamp}`,
    `service_name=${entry.serviceName}`,
    `severity=${entry.severity}`,
    `message="${entry.message}"`,
  ];

  if (entry.fields) {
    for (const [key, value] of Object.entries(entry.fields)) {
      const serializedValue = typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
      parts.push(`${key}=${serializedValue}`);
    }
  }

  return parts.join(' ');
}

function formatLogEntry(entry: LogEntry, outputFormat: LogOutputFormat): string {
  switch (outputFormat) {
    case 'cli':
      return formatAsCli(entry);
    case 'json':
      return formatAsJson(entry);
    case 'human':
      return formatAsHumanReadable(entry);
    case 'structured-text':
      return formatAsStructuredText(entry);
    default:
      return formatAsJson(entry);
  }
}

function writeLine(writer: LogWriter, stream: LogStream, severity: LogSeverity, line: string) {
  if (stream === 'stderr' || severity === 'error' || severity === 'fatal') {
    writer.stderr(line);
  } else {
    writer.stdout(line);
  }
}

function formatErrorAsParams(error: unknown): Record<string, unknown> | undefined {
  if (error instanceof Error) {
    return {
      ...(error.name !== 'Error' ? { name: error.name } : {}),
      stack: error.stack,
      ...('toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
        ? error.toErrorPlainObject()
        : {}),
    };
  }

  return {
    error: String(error),
  };
}

export function createLogger(serviceName: string, config: DiagnosticConfig = {}): Logger {
  const minimumSeverity = config.minimumSeverity ?? 'info';
  const outputFormat = config.outputFormat ?? 'human';
  const stream = config.stream ?? 'split';
  const writer = config.writer ?? consoleLogWriter;

  function log(severity: LogSeverity, message: string, fields?: Record<string, unknown>): void {
    if (severityLevels[severity] < severityLevels[minimumSeverity]) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      serviceName,
      fields,
    };

    writeLine(writer, stream, severity, formatLogEntry(logEntry, outputFormat));
  }

  function logError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void {
    const additionalFields = typeof message === 'string' ? fields : message;
    const additionalMessage = typeof message === 'string' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;

    log(severity, errorMessage ?? additionalMessage ?? String(error), {
      ...formatErrorAsParams(error),
      ...additionalFields,
      ...fields,
      ...(additionalMessage ? { additionalMessage } : {}),
    });
  }

  return {
    debug(message: string, fields?: Record<string, unknown>): void {
      log('debug', message, fields);
    },

    info(message: string, fields?: Record<string, unknown>): void {
      log('info', message, fields);
    },

    warn(message: string, fields?: Record<string, unknown>): void {
      log('warn', message, fields);
    },

    error(error: unknown, message?: string | Record<string, unknown>, fields?: Record<string, unknown>): void {
      logError('error', error, message, fields);
    },

    fatal(error: unknown, message?: string | Record<string, unknown>, fields?: Record<string, unknown>): void {
      logError('fatal', error, message, fields);
    },
  };
}

export function createDiagnosticContext(
  envContext: DefaultEnvContext,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  return {
    logger: createLogger(envContext.config.PROCESS_NAME, config),
  };
}
