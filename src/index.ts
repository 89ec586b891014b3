export type {
  ConfValue,
  FlatBody,
  Item,
  ListItem,
  NestedBody,
  PairItem,
  Section,
  SectionBody,
  SourcePosition,
} from './ast.js';
export { isConfBoolean, isConfInteger, isConfString, isFlat, isIdentifier, isNested } from './ast.js';
export type { ErrorCode, ParseErrorCode, QueryErrorCode } from './errors.js';
export { ConfEncodeError, ConfError, ConfIOError, ConfParseError, ConfQueryError } from './errors.js';
export { DEFAULT_EXCERPT_WIDTH, Scanner, skipTrivia } from './scanner.js';
export type { ParsedValue } from './values.js';
export { parseScalar, parseValue } from './values.js';
export type { ParseOptions } from './parser.js';
export { DEFAULT_MAX_DEPTH, parse } from './parser.js';
export type { EnvironmentTag, InitializeOptions } from './document.js';
export { ConfDocument, getEnvironmentTag, initialize, teardown } from './document.js';
export type { IntegerRange, IntegerWidth, NarrowWidth, WideWidth } from './integers.js';
export { fitsWidth, INTEGER_RANGES, isIntegerWidth, isNarrowWidth } from './integers.js';
export type { Resolved } from './query.js';
export {
  getBool,
  getInt,
  getList,
  getProperties,
  getSections,
  getStr,
  getValue,
  resolve,
} from './query.js';
export type { StringifyOptions } from './stringify.js';
export { stringify } from './stringify.js';
export type { LoadOptions } from './loader.js';
export { DEFAULT_MAX_SIZE, loadFile, loadFileSync, resolvePath } from './loader.js';
export type { LoadConfigOptions } from './config.js';
export { loadConfig, loadConfigSync } from './config.js';
export type { LogFormat, LoggerOptions, LogLevel, WritableOutput } from './logger.js';
export { DEFAULT_LOG_LEVEL, isLogLevel, Logger } from './logger.js';
