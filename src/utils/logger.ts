/**
 * Console logger used across the CLI.
 *
 * Diagnostics go to stderr with `[INFO]`, `[WARN]`, `[ERROR]` and `[DEBUG]`
 * prefixes; `result` lines go to stdout so they can be piped.
 */

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Plain line on stdout, no prefix. */
  result(message: string): void;
}

export interface LoggerOptions {
  /** Emit `[DEBUG]` lines. */
  verbose?: boolean;
  stdout?: LogSink;
  stderr?: LogSink;
}

// eslint-disable-next-line no-console
const consoleStdout: LogSink = (line) => console.log(line);
// eslint-disable-next-line no-console
const consoleStderr: LogSink = (line) => console.error(line);

export function createLogger(options: LoggerOptions = {}): Logger {
  const stdout = options.stdout ?? consoleStdout;
  const stderr = options.stderr ?? consoleStderr;
  const verbose = options.verbose ?? false;

  return {
    debug: (message) => {
      if (verbose) stderr(`[DEBUG] ${message}`);
    },
    info: (message) => stderr(`[INFO] ${message}`),
    warn: (message) => stderr(`[WARN] ${message}`),
    error: (message) => stderr(`[ERROR] ${message}`),
    result: (message) => stdout(message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  result: () => undefined,
};
