import { createLogger, type Logger, type LoggerOptions } from './logger.js';

/**
 * PII patterns that should be scrubbed from logs
 */
const PII_PATTERNS: { pattern: RegExp; replacement: string; name: string }[] = [
  // Email addresses
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
    name: 'email',
  },
  // CURP (18 chars), checked before RFC since an RFC prefix is embedded in it
  {
    pattern: /\b[A-Z][AEIOUX][A-Z]{2}\d{6}[HM][A-Z]{5}[A-Z0-9]\d\b/gi,
    replacement: '[CURP:REDACTED]',
    name: 'curp',
  },
  // RFC, persona moral (12) and persona física (13)
  {
    pattern: /\b[A-ZÑ&]{3,4}\d{6}[A-Z0-9]{3}\b/gi,
    replacement: '[RFC:REDACTED]',
    name: 'rfc',
  },
  // CFDI folio fiscal (UUID)
  {
    pattern: /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi,
    replacement: '[UUID:REDACTED]',
    name: 'uuid',
  },
  // Credit card numbers (basic pattern)
  {
    pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g,
    replacement: '[CC:REDACTED]',
    name: 'creditcard',
  },
];

/**
 * Context keys that are always fully redacted (compared lower-cased)
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'authorization',
  'email',
  'contactemail',
  'claimantname',
  'personalidlast4',
  'ssn',
  'curp',
  'rfc',
  'issuertaxid',
  'identifier',
  'uuid',
]);

function scrubString(value: string, extra: readonly { pattern: RegExp; replacement: string }[]): string {
  let result = value;
  for (const { pattern, replacement } of [...PII_PATTERNS, ...extra]) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function scrubValue(
  value: unknown,
  extra: readonly { pattern: RegExp; replacement: string }[],
  depth = 0,
): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return scrubString(value, extra);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item, extra, depth + 1));
  }

  if (typeof value === 'object') {
    return scrubRecord(Object.entries(value), extra, depth + 1);
  }

  return '[UNSUPPORTED_TYPE]';
}

function scrubRecord(
  entries: [string, unknown][],
  extra: readonly { pattern: RegExp; replacement: string }[],
  depth: number,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    result[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase())
      ? '[REDACTED]'
      : scrubValue(value, extra, depth);
  }
  return result;
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Session ID to include in all log entries
   */
  sessionId?: string;

  /**
   * Whether to enable PII scrubbing
   * @default true
   */
  scrubPii?: boolean;

  /**
   * Additional patterns to scrub
   */
  additionalPatterns?: { pattern: RegExp; replacement: string }[];
}

/**
 * Create a logger that scrubs PII (e-mail, RFC, CURP, fiscal folios,
 * card numbers) from messages and context before output.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ sessionId: 'ses-abc' });
 * logger.info('Parsed invoice', { issuerTaxId: 'AAA010101AAA' }); // issuerTaxId is redacted
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const scrubPii = options.scrubPii ?? true;
  const extra = options.additionalPatterns ?? [];

  const context: Record<string, unknown> = { ...options.context };
  if (options.sessionId !== undefined) {
    context['sessionId'] = options.sessionId;
  }

  const loggerOptions: LoggerOptions = { ...options, context };
  if (scrubPii) {
    loggerOptions.transformContext = (ctx) => scrubRecord(Object.entries(ctx), extra, 0);
    loggerOptions.transformMessage = (message) => scrubString(message, extra);
  }

  return createLogger(loggerOptions);
}

/**
 * Throws if the given text still contains something that looks like PII.
 * Intended for tests over log output.
 */
export function assertSafeLogging(text: string): void {
  for (const { pattern, name } of PII_PATTERNS) {
    pattern.lastIndex = 0;
    if (pattern.test(text)) {
      pattern.lastIndex = 0;
      throw new Error(`Potential PII detected in log output: ${name}`);
    }
  }
}
