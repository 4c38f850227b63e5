/**
 * @cfdi-bundle/shared
 *
 * Shared utilities for the CFDI submission bundle pipeline.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';
export { createSafeLogger, assertSafeLogging, type SafeLoggerOptions } from './logging/safe-logger.js';
export {
  SubmissionError,
  ValidationError,
  ConfigurationError,
  MissingUploadSetError,
  SequenceIntegrityError,
} from './errors/errors.js';
export {
  defaultIdGenerator,
  createSequentialIdGenerator,
  generateRecordId,
  generateSessionId,
  type IdGenerator,
} from './utils/ids.js';
export { formatSequenceLabel, assertContiguousLabels } from './sequence/labels.js';
export { canonicalStringify, computeConfigHash } from './crypto/canonical-hash.js';

// Decimal arithmetic
export {
  add,
  sum,
  isNegative,
  isValidDecimalAmount,
  toNumber,
  toPlainDecimal,
} from './decimal/decimal-utils.js';

// Diagnostics summary
export {
  buildDiagnosticsSummary,
  formatDiagnosticLines,
  type DiagnosticsSummaryOptions,
  type DiagnosticsSummary,
  type TopCodeEntry,
} from './diagnostics/index.js';
