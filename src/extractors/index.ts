// PDF access using pdfjs-dist
export { loadPdfDocument, joinTextItems, wrapPdfjsDocument } from './pdf-document.js';

export type {
  PdfDocumentHandle,
  PdfPageHandle,
  PdfLoader,
  PdfjsDocumentLike,
  PdfjsPageLike,
} from './pdf-document.js';
