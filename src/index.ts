/**
 * pdf-page-md - extract PDF text page by page into Markdown
 *
 * @example
 * ```typescript
 * import { resolvePaths, extractToMarkdown } from 'pdf-page-md';
 *
 * const paths = await resolvePaths({ input: 'report.pdf', output: './out' }, { programDir: process.cwd() });
 * const result = await extractToMarkdown(paths.inputPath, paths.outputPath);
 * console.log(`${result.pagesWritten} pages written to ${result.outputPath}`);
 * ```
 */

export { resolvePaths, getBaseName } from './resolver/index.js';
export type {
  OutputResolution,
  PathResolverInput,
  PathResolverOptions,
  ResolvedPaths,
} from './resolver/index.js';

export { extractToMarkdown } from './converter/index.js';
export type { ConvertOptions, ExtractionResult } from './converter/index.js';

export { loadPdfDocument, joinTextItems, wrapPdfjsDocument } from './extractors/index.js';
export type {
  PdfDocumentHandle,
  PdfPageHandle,
  PdfLoader,
  PdfjsDocumentLike,
  PdfjsPageLike,
} from './extractors/index.js';

export { MarkdownBuffer, renderMarkdown, emptyPageBody } from './output/index.js';
export type { PageText } from './output/index.js';

export { loadConfig, isEmptyPagePolicy } from './config/index.js';
export type { AppConfig } from './config/index.js';

export { runCli, getProgramDir, USAGE_LINES } from './cli/index.js';
export type { CliDependencies } from './cli/index.js';

export {
  PdfPageMdError,
  UsageError,
  InputNotFoundError,
  DefaultOutputDirMissingError,
  OpenError,
  WriteError,
  ConfigError,
} from './errors/index.js';
export type { ErrorCode } from './errors/index.js';

export * from './utils/index.js';
