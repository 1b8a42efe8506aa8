export { extractToMarkdown } from './pdf-to-markdown.js';
export type { ConvertOptions, ExtractionResult } from './pdf-to-markdown.js';
