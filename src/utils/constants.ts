export const TOOL_VERSION = '1.0.0';

export const CLI_NAME = 'pdf-page-md';

/** Name of the directory beside the program that receives output by default. */
export const DEFAULT_OUTPUT_DIR_NAME = 'output';

export const MARKDOWN_EXTENSION = '.md';

export const MARKDOWN_TITLE = '# PDFから抽出されたテキスト';

export const EMPTY_PAGE_PLACEHOLDER = '(空のページ)';

export const EMPTY_PAGE_POLICIES = ['empty', 'placeholder'] as const;
export type EmptyPagePolicy = typeof EMPTY_PAGE_POLICIES[number];

export const ENV_KEYS = {
  OUTPUT: 'PDF_PAGE_MD_OUTPUT',
  EMPTY_PAGE: 'PDF_PAGE_MD_EMPTY_PAGE',
  VERBOSE: 'PDF_PAGE_MD_VERBOSE',
} as const;
