import {
  EMPTY_PAGE_PLACEHOLDER,
  MARKDOWN_TITLE,
  type EmptyPagePolicy,
} from '../utils/constants.js';

export interface PageText {
  /** 1-indexed page number used in the heading */
  pageNumber: number;
  /** Extracted text; `undefined` when the page yielded none */
  text: string | undefined;
}

/**
 * Body written for a page that yielded no text.
 */
export function emptyPageBody(policy: EmptyPagePolicy): string {
  return policy === 'placeholder' ? EMPTY_PAGE_PLACEHOLDER : '';
}

/**
 * Append-only Markdown document. Starts with the title heading; each page
 * adds `## Page <N>`, a blank line, the body, a blank line, `---` and a blank
 * line. Segments are joined once in `toString()`.
 */
export class MarkdownBuffer {
  private readonly segments: string[] = [`${MARKDOWN_TITLE}\n\n`];
  private sections = 0;

  appendPage(pageNumber: number, body: string): void {
    this.segments.push(`## Page ${pageNumber}\n\n`, body, '\n\n---\n\n');
    this.sections++;
  }

  get sectionCount(): number {
    return this.sections;
  }

  toString(): string {
    return this.segments.join('');
  }
}

/**
 * Render already-extracted pages in the order given.
 */
export function renderMarkdown(
  pages: readonly PageText[],
  policy: EmptyPagePolicy = 'empty'
): string {
  const buffer = new MarkdownBuffer();
  for (const page of pages) {
    buffer.appendPage(page.pageNumber, page.text ?? emptyPageBody(policy));
  }
  return buffer.toString();
}
