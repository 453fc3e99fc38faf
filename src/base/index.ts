export {
  ErrorCode,
  MarkdownReaderError,
  NotFoundError,
  InvalidInputError,
  FileReadError,
  NoContentError,
  isMarkdownReaderError,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
