export { MarkdownBuffer, renderMarkdown, emptyPageBody } from './markdown.js';
export type { PageText } from './markdown.js';
