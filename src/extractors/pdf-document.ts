/**
 * PDF access through pdfjs-dist.
 *
 * The rest of the tool only sees `PdfDocumentHandle`/`PdfPageHandle`, so the
 * converter can be driven by any loader (tests use in-memory documents).
 */
import { readFile } from 'fs/promises';
import { OpenError, toError } from '../errors/index.js';

/**
 * One page of an open document.
 */
export interface PdfPageHandle {
  /** Plain text of the page, or `undefined` when none could be extracted. */
  getText(): Promise<string | undefined>;
}

/**
 * An open PDF. Owned by whoever opened it and closed once after reading.
 */
export interface PdfDocumentHandle {
  readonly pageCount: number;
  /**
   * Page at a 0-based index, or `null` when the page cannot be retrieved.
   */
  getPage(index: number): Promise<PdfPageHandle | null>;
  close(): Promise<void>;
}

/**
 * Opens the PDF at a path.
 *
 * @throws OpenError when the file cannot be read or parsed
 */
export type PdfLoader = (filePath: string) => Promise<PdfDocumentHandle>;

/**
 * The part of a pdfjs `PDFDocumentProxy` this module reads.
 */
export interface PdfjsDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfjsPageLike>;
  destroy(): Promise<void>;
}

export interface PdfjsPageLike {
  getTextContent(): Promise<{ items: readonly object[] }>;
}

/**
 * Internal interface for pdfjs text items.
 */
interface PdfjsTextItemLike {
  str: string;
  hasEOL: boolean;
}

/**
 * Type guard to check if an item is a text item (marked-content entries have no `str`).
 */
function isTextItem(item: object): item is PdfjsTextItemLike {
  return (
    'str' in item &&
    typeof item.str === 'string' &&
    'hasEOL' in item &&
    typeof item.hasEOL === 'boolean'
  );
}

/**
 * Join a page's text items in content-stream order, breaking lines where
 * pdfjs flags an end of line. Trailing whitespace is dropped.
 */
export function joinTextItems(items: readonly object[]): string | undefined {
  const parts: string[] = [];

  for (const item of items) {
    if (!isTextItem(item)) continue;
    parts.push(item.str);
    if (item.hasEOL) parts.push('\n');
  }

  const text = parts.join('').trimEnd();
  return text.length > 0 ? text : undefined;
}

/**
 * Adapt an open pdfjs document. A page that fails to load is `null`; a page
 * whose text content fails to load has no text.
 */
export function wrapPdfjsDocument(pdfDocument: PdfjsDocumentLike): PdfDocumentHandle {
  return {
    pageCount: pdfDocument.numPages,

    async getPage(index: number): Promise<PdfPageHandle | null> {
      if (!Number.isInteger(index) || index < 0 || index >= pdfDocument.numPages) {
        return null;
      }

      try {
        // pdfjs page numbers are 1-indexed
        const page = await pdfDocument.getPage(index + 1);
        return {
          async getText(): Promise<string | undefined> {
            try {
              const textContent = await page.getTextContent();
              return joinTextItems(textContent.items);
            } catch {
              // Unreadable content stream: the page exists but has no text
              return undefined;
            }
          },
        };
      } catch {
        // A page whose object cannot be loaded is reported as absent
        return null;
      }
    },

    async close(): Promise<void> {
      await pdfDocument.destroy();
    },
  };
}

/**
 * Open a PDF file with pdfjs-dist.
 */
export const loadPdfDocument: PdfLoader = async (filePath) => {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await readFile(filePath));
  } catch (error) {
    throw new OpenError(filePath, toError(error));
  }

  // Dynamic import for pdfjs-dist (ESM build, legacy variant for Node)
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
    isEvalSupported: false,
    verbosity: pdfjs.VerbosityLevel.ERRORS,
  });

  try {
    const pdfDocument = await loadingTask.promise;
    return wrapPdfjsDocument(pdfDocument);
  } catch (error) {
    await loadingTask.destroy();
    throw new OpenError(filePath, toError(error));
  }
};
