export { Logger } from './Logger';
export type { ParserLog, LogLevel, LogSubscriber } from './Logger';
export { ok, err, unwrap, toNullable } from './result';
export type { Ok, Err, Result } from './result';
export {
  LONGEST_TEXT,
  AlignSchema,
  FormatOptionsSchema,
  LoggerOptionsSchema,
  resolveFormatOptions,
} from './config';
export type {
  Align,
  FormatOptions,
  ResolvedFormatOptions,
  LoggerOptions,
  TextFamily,
} from './config';
