/**
 * tierconf
 *
 * Typed option declarations resolved from defaults, a config document and
 * command-line tokens, in that order of precedence.
 *
 * @example
 * ```typescript
 * import { Config, option } from 'tierconf';
 *
 * const config = new Config({ programName: 'serve' })
 *   .add(option('port').shortflag('p').defaultValue(8080).description('Port'));
 *
 * if (!config.parse()) {
 *   config.printLog();
 *   process.exit(1);
 * }
 * ```
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export { TypeMismatchError, Value, typeLabel } from './value/index.js';
export type { DataType, Scalar } from './value/index.js';

export {
  CONFIG_KEY,
  HELP_KEY,
  OptionBuilder,
  OptionRegistry,
  declaredType,
  option,
} from './options/index.js';
export type { OptionSpec, PreparedRegistry, ReservedOptions } from './options/index.js';

export {
  DiagnosticLog,
  ResolutionEngine,
  ResolvedOptions,
  checkFormat,
  classifyToken,
  isAtLeast,
  isNumericLiteral,
  parseTokenAs,
  validate,
  worstOf,
} from './resolution/index.js';
export type {
  ClassifiedToken,
  Diagnostic,
  EngineOptions,
  LogThreshold,
  ResolutionResult,
  ResolvedEntry,
  Severity,
  ValueSource,
} from './resolution/index.js';

export {
  DocumentFormatError,
  DocumentParseError,
  PATH_SEPARATOR,
  UnsupportedFormatError,
  documentFromPlain,
  documentToPlain,
  flattenDocument,
  formatForPath,
  mapNode,
  parseDocument,
  parseFormatName,
  readDocumentFile,
  readFlatEntries,
  scalarNode,
  serializeValues,
  unflattenEntries,
  writeDocumentFile,
} from './document/index.js';
export type {
  DocumentFormat,
  DocumentNode,
  DocumentReader,
  MapNode,
  PlainDocument,
  ScalarNode,
} from './document/index.js';

export { renderUsage, renderValueTable } from './render/index.js';
export type { TableOptions, UsageOptions } from './render/index.js';

export { Config } from './config/index.js';
export type { ConfigOptions, ParseOptions } from './config/index.js';

export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
