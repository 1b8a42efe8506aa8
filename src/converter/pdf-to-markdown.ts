import { OpenError, PdfPageMdError, toError } from '../errors/index.js';
import { loadPdfDocument, type PdfDocumentHandle, type PdfLoader } from '../extractors/index.js';
import { MarkdownBuffer, emptyPageBody } from '../output/index.js';
import type { EmptyPagePolicy } from '../utils/constants.js';
import { writeFileAtomic } from '../utils/fs.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ConvertOptions {
  /** Body for a page without text (default: `empty`) */
  emptyPage?: EmptyPagePolicy;
  /** Opens the input PDF (default: pdfjs-dist) */
  loader?: PdfLoader;
  logger?: Logger;
}

export interface ExtractionResult {
  outputPath: string;
  markdown: string;
  pageCount: number;
  /** Pages that got a section */
  pagesWritten: number;
  /** Pages that could not be retrieved and were left out */
  pagesSkipped: number;
}

async function openDocument(loader: PdfLoader, inputPath: string): Promise<PdfDocumentHandle> {
  try {
    return await loader(inputPath);
  } catch (error) {
    if (error instanceof PdfPageMdError) throw error;
    throw new OpenError(inputPath, toError(error));
  }
}

/**
 * Extract every page of a PDF into one Markdown document and write it.
 *
 * Pages are read one after another in document order. A page that cannot be
 * retrieved gets no section; a page without text gets a section whose body
 * follows the empty-page policy. The output file is written once, atomically.
 *
 * @throws OpenError when the PDF cannot be opened
 * @throws WriteError when the Markdown cannot be written
 */
export async function extractToMarkdown(
  inputPath: string,
  outputPath: string,
  options: ConvertOptions = {}
): Promise<ExtractionResult> {
  const logger = options.logger ?? silentLogger;
  const emptyBody = emptyPageBody(options.emptyPage ?? 'empty');

  const document = await openDocument(options.loader ?? loadPdfDocument, inputPath);
  const pageCount = document.pageCount;
  logger.debug(`Opened '${inputPath}' (${pageCount} pages)`);

  const buffer = new MarkdownBuffer();
  let pagesSkipped = 0;

  try {
    for (let index = 0; index < pageCount; index++) {
      const page = await document.getPage(index);
      if (page === null) {
        pagesSkipped++;
        logger.debug(`Page ${index + 1} could not be retrieved, skipping`);
        continue;
      }

      const text = await page.getText();
      if (text === undefined) {
        logger.debug(`Page ${index + 1} has no text`);
      }
      buffer.appendPage(index + 1, text ?? emptyBody);
    }
  } finally {
    await document.close();
  }

  const markdown = buffer.toString();
  await writeFileAtomic(outputPath, markdown);

  return {
    outputPath,
    markdown,
    pageCount,
    pagesWritten: buffer.sectionCount,
    pagesSkipped,
  };
}
