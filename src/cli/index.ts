import { Command, CommanderError, Option } from 'commander';
import { realpathSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, type AppConfig } from '../config/index.js';
import { extractToMarkdown } from '../converter/index.js';
import { PdfPageMdError, UsageError, toError } from '../errors/index.js';
import type { PdfLoader } from '../extractors/index.js';
import { resolvePaths } from '../resolver/index.js';
import {
  CLI_NAME,
  EMPTY_PAGE_POLICIES,
  ENV_KEYS,
  TOOL_VERSION,
  type EmptyPagePolicy,
} from '../utils/constants.js';
import { createLogger, type LogSink, type Logger } from '../utils/logger.js';

export const USAGE_LINES = [
  `Usage: ${CLI_NAME} <input.pdf> [--output <output-directory-or-file.md>]`,
  `  ${CLI_NAME} input.pdf                          # writes <program dir>/output/input.md`,
  `  ${CLI_NAME} input.pdf --output ./my_output/    # writes ./my_output/input.md`,
  `  ${CLI_NAME} input.pdf --output ./specific.md   # writes ./specific.md`,
] as const;

interface CliOptions {
  output?: string;
  /** Restricted to the policies by commander's `choices` */
  emptyPage: EmptyPagePolicy;
  verbose: boolean;
}

export interface CliDependencies {
  /** Environment used for option defaults (default: `process.env`) */
  env?: NodeJS.ProcessEnv;
  /** Directory holding the default `output/` directory (default: {@link getProgramDir}) */
  programDir?: string;
  loader?: PdfLoader;
  stdout?: LogSink;
  stderr?: LogSink;
}

/**
 * Directory of the running entry script, resolved through symlinks so an
 * npm-linked bin still finds the `output/` directory beside the real file.
 */
export function getProgramDir(): string {
  const entry = process.argv[1];
  if (entry === undefined || entry === '') {
    return dirname(fileURLToPath(import.meta.url));
  }
  try {
    return dirname(realpathSync(entry));
  } catch {
    return dirname(resolve(entry));
  }
}

/**
 * Map an error onto its message and exit code.
 */
function reportError(error: unknown, logger: Logger, verbose: boolean): number {
  const err = toError(error);
  logger.error(err.message);

  if (err instanceof UsageError) {
    for (const line of USAGE_LINES) logger.result(line);
  }
  if (verbose && err.stack !== undefined) {
    logger.error(err.stack);
  }

  return err instanceof PdfPageMdError ? err.exitCode : 1;
}

async function convert(
  pdfFile: string | undefined,
  options: CliOptions,
  logger: Logger,
  deps: CliDependencies
): Promise<void> {
  const paths = await resolvePaths(
    { input: pdfFile, output: options.output },
    { programDir: deps.programDir ?? getProgramDir(), logger }
  );

  logger.debug(`Input: ${paths.inputPath}`);
  logger.debug(`Output resolution: ${paths.resolution}`);
  logger.debug(`Empty page policy: ${options.emptyPage}`);

  const result = await extractToMarkdown(paths.inputPath, paths.outputPath, {
    emptyPage: options.emptyPage,
    logger,
    ...(deps.loader !== undefined ? { loader: deps.loader } : {}),
  });

  logger.debug(`Pages: ${result.pageCount}, written: ${result.pagesWritten}, skipped: ${result.pagesSkipped}`);
  logger.result(`Markdown saved: ${result.outputPath}`);
}

function buildProgram(
  config: AppConfig,
  deps: CliDependencies,
  stdout: LogSink,
  stderr: LogSink,
  onExitCode: (code: number) => void
): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Extract the text of a PDF page by page into a Markdown file')
    .version(TOOL_VERSION)
    .argument('[pdf-file]', 'Path to the input PDF')
    .option(
      '-o, --output <path>',
      `Output directory or Markdown file (default: <program dir>/output/<name>.md, env ${ENV_KEYS.OUTPUT})`,
      config.output
    )
    .addOption(
      new Option('--empty-page <policy>', `Body for pages without text (env ${ENV_KEYS.EMPTY_PAGE})`)
        .choices(EMPTY_PAGE_POLICIES)
        .default(config.emptyPage)
    )
    .option('-v, --verbose', `Enable verbose output (env ${ENV_KEYS.VERBOSE})`, config.verbose)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => stdout(str.trimEnd()),
      writeErr: (str) => stderr(str.trimEnd()),
    })
    .action(async (pdfFile: string | undefined, options: CliOptions) => {
      const logger = createLogger({ verbose: options.verbose, stdout, stderr });
      try {
        await convert(pdfFile, options, logger, deps);
        onExitCode(0);
      } catch (error) {
        onExitCode(reportError(error, logger, options.verbose));
      }
    });

  return program;
}

/**
 * Run the CLI against a full argv (`[node, script, ...args]`).
 *
 * @returns the process exit code: 0 on success, 1 on any failure
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  // eslint-disable-next-line no-console
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  // eslint-disable-next-line no-console
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    return reportError(error, createLogger({ stdout, stderr }), false);
  }

  let exitCode = 0;
  const program = buildProgram(config, deps, stdout, stderr, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    // --help, --version and option errors surface here through exitOverride
    if (error instanceof CommanderError) return error.exitCode;
    return reportError(error, createLogger({ stdout, stderr }), false);
  }

  return exitCode;
}
