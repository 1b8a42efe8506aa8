import { basename, extname, join } from 'path';
import { DefaultOutputDirMissingError, InputNotFoundError, UsageError } from '../errors/index.js';
import { DEFAULT_OUTPUT_DIR_NAME, MARKDOWN_EXTENSION } from '../utils/constants.js';
import { getPathKind } from '../utils/fs.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Which branch produced the output path:
 * - `directory`: `--output` named an existing directory
 * - `file-new`: `--output` named a path where nothing exists yet
 * - `file-overwrite`: `--output` named an existing non-directory
 * - `default`: no `--output`; `<programDir>/output/<baseName>.md`
 */
export type OutputResolution = 'directory' | 'file-new' | 'file-overwrite' | 'default';

export interface PathResolverInput {
  /** Positional input PDF path */
  input?: string | undefined;
  /** Value of `--output` */
  output?: string | undefined;
}

export interface PathResolverOptions {
  /** Directory of the running program; the default `output/` lives here. */
  programDir: string;
  logger?: Logger;
}

export interface ResolvedPaths {
  inputPath: string;
  outputPath: string;
  /** Input file name without its final extension */
  baseName: string;
  resolution: OutputResolution;
}

/**
 * Input file name with its final extension stripped
 * (`report.pdf` -> `report`, `archive.tar.gz` -> `archive.tar`).
 */
export function getBaseName(inputPath: string): string {
  return basename(inputPath, extname(inputPath));
}

/**
 * Turn CLI input into the input PDF path and the Markdown output path.
 *
 * Paths are used as given; relative paths resolve against the working
 * directory when the filesystem is touched. Only the `--output` value itself is
 * checked for being a directory, never its parent.
 *
 * @throws UsageError when no input is given
 * @throws InputNotFoundError when the input is not an existing file
 * @throws DefaultOutputDirMissingError when `--output` is absent and the default directory is unusable
 */
export async function resolvePaths(
  args: PathResolverInput,
  options: PathResolverOptions
): Promise<ResolvedPaths> {
  const logger = options.logger ?? silentLogger;
  const inputPath = args.input;

  if (inputPath === undefined || inputPath === '') {
    throw new UsageError();
  }

  const inputKind = await getPathKind(inputPath);
  if (inputKind === 'missing') {
    throw new InputNotFoundError(inputPath, 'missing');
  }
  if (inputKind !== 'file') {
    throw new InputNotFoundError(inputPath, 'not-a-file');
  }

  const baseName = getBaseName(inputPath);
  const fileName = `${baseName}${MARKDOWN_EXTENSION}`;

  if (args.output !== undefined && args.output !== '') {
    const outputKind = await getPathKind(args.output);

    if (outputKind === 'directory') {
      const outputPath = join(args.output, fileName);
      logger.info(`Output directory given: '${args.output}'`);
      logger.info(`Writing to: '${outputPath}'`);
      return { inputPath, outputPath, baseName, resolution: 'directory' };
    }

    if (outputKind === 'missing') {
      logger.info(`New output file given: '${args.output}'`);
      return { inputPath, outputPath: args.output, baseName, resolution: 'file-new' };
    }

    logger.info(`Output file given (existing file, will be overwritten): '${args.output}'`);
    return { inputPath, outputPath: args.output, baseName, resolution: 'file-overwrite' };
  }

  const outputDir = join(options.programDir, DEFAULT_OUTPUT_DIR_NAME);
  if ((await getPathKind(outputDir)) !== 'directory') {
    throw new DefaultOutputDirMissingError(outputDir);
  }

  const outputPath = join(outputDir, fileName);
  logger.info(`Default output: '${outputPath}'`);
  return { inputPath, outputPath, baseName, resolution: 'default' };
}
