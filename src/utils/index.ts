export {
  TOOL_VERSION,
  CLI_NAME,
  DEFAULT_OUTPUT_DIR_NAME,
  MARKDOWN_EXTENSION,
  MARKDOWN_TITLE,
  EMPTY_PAGE_PLACEHOLDER,
  EMPTY_PAGE_POLICIES,
  ENV_KEYS,
} from './constants.js';
export type { EmptyPagePolicy } from './constants.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions, LogSink } from './logger.js';
export { getPathKind, writeFileAtomic } from './fs.js';
export type { PathKind } from './fs.js';
