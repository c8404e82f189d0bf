export type LogSeverity = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogOutputFormat = 'cli' | 'json' | 'human' | 'structured-text';

/**
 * Where formatted lines go. `split` sends debug/info/warn to stdout and
 * error/fatal to stderr; `stderr` keeps stdout free for command output.
 */
export type LogStream = 'split' | 'stderr';

export interface LogWriter {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
  fatal(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
}

export interface LogEntry {
  timestamp: string;
  severity: LogSeverity;
  message: string;
  serviceName: string;
  fields?: Record<string, unknown>;
}

export interface DiagnosticConfig {
  minimumSeverity?: LogSeverity;
  outputFormat?: LogOutputFormat;
  stream?: LogStream;
  writer?: LogWriter;
}

export interface DiagnosticContext {
  logger: Logger;
}
