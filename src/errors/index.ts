/**
 * Error types for pdf-page-md.
 *
 * Every failure the tool can report is a `PdfPageMdError`. Resolution and
 * extraction code throws these; only the CLI turns them into messages and
 * exit codes.
 */

export type ErrorCode =
  | 'USAGE'
  | 'INPUT_NOT_FOUND'
  | 'DEFAULT_OUTPUT_DIR_MISSING'
  | 'PDF_OPEN_FAILED'
  | 'WRITE_FAILED'
  | 'CONFIG_INVALID';

/**
 * Base error class. All errors extend this class for consistent handling.
 */
export class PdfPageMdError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: number = 1;

  constructor(message: string, code: ErrorCode, cause?: Error) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'PdfPageMdError';
    this.code = code;
  }
}

/** Insufficient arguments: no input PDF was given. */
export class UsageError extends PdfPageMdError {
  constructor(message = 'Missing required argument: input PDF path') {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

export class InputNotFoundError extends PdfPageMdError {
  public readonly inputPath: string;

  constructor(inputPath: string, reason: 'missing' | 'not-a-file' = 'missing') {
    super(
      reason === 'missing'
        ? `Input file '${inputPath}' was not found`
        : `Input path '${inputPath}' is not a file`,
      'INPUT_NOT_FOUND'
    );
    this.name = 'InputNotFoundError';
    this.inputPath = inputPath;
  }
}

/**
 * The default `output/` directory beside the program is missing and no
 * explicit output was given.
 */
export class DefaultOutputDirMissingError extends PdfPageMdError {
  public readonly directory: string;

  constructor(directory: string) {
    super(
      `Default output directory '${directory}' does not exist or is not a directory. ` +
        `Create a directory named 'output' next to the program, or pass --output.`,
      'DEFAULT_OUTPUT_DIR_MISSING'
    );
    this.name = 'DefaultOutputDirMissingError';
    this.directory = directory;
  }
}

export class OpenError extends PdfPageMdError {
  public readonly inputPath: string;

  constructor(inputPath: string, cause?: Error) {
    super(
      cause !== undefined
        ? `Could not open PDF '${inputPath}': ${cause.message}`
        : `Could not open PDF '${inputPath}'`,
      'PDF_OPEN_FAILED',
      cause
    );
    this.name = 'OpenError';
    this.inputPath = inputPath;
  }
}

export class WriteError extends PdfPageMdError {
  public readonly outputPath: string;
  /** Set when the temporary file could not be removed after the failure */
  public readonly cleanupError: Error | undefined;

  constructor(outputPath: string, cause: Error, cleanupError?: Error) {
    super(`Failed to write '${outputPath}': ${cause.message}`, 'WRITE_FAILED', cause);
    this.name = 'WriteError';
    this.outputPath = outputPath;
    this.cleanupError = cleanupError;
  }
}

export class ConfigError extends PdfPageMdError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
