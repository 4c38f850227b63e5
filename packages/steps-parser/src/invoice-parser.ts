/**
 * Invoice Parser Step
 *
 * First step of a submission build: turns uploaded XML files into
 * CanonicalInvoiceRecords.
 *
 * A failure on one document never aborts the batch. The failed file still
 * yields a record (zeroed fields, parseError set) so every upload stays
 * visible to the operator.
 *
 * Privacy:
 * - No PII is logged
 * - Error messages are stripped of paths and markup
 */

import type { CanonicalInvoiceRecord, Diagnostic, UploadedFile } from '@cfdi-bundle/contracts';
import { EPOCH_SENTINEL_DATE } from '@cfdi-bundle/contracts';
import {
  defaultIdGenerator,
  generateRecordId,
  silentLogger,
  type IdGenerator,
  type Logger,
} from '@cfdi-bundle/shared';
import { parseCfdiXml } from './parse-cfdi.js';
import { XmlStructureError } from './xml-tree.js';
import type { InvoiceParserConfig, ParseOutcome } from './types.js';

export const PARSER_STEP_ID = 'steps-parser';

const DEFAULT_CONFIG: Required<InvoiceParserConfig> = {
  defaultCurrency: 'MXN',
  defaultExpenseCategory: 'Miscellaneous',
  maxDocumentSize: 10 * 1024 * 1024, // 10MB
};

export interface InvoiceParserDeps {
  logger?: Logger;
  idGenerator?: IdGenerator;
}

export interface InvoiceParser {
  /** Parse one document; never throws */
  parse(file: UploadedFile): ParseOutcome;
  /** Parse every document in upload order, isolated from one another */
  parseBatch(files: readonly UploadedFile[]): ParseOutcome[];
}

/**
 * Invoice parser factory
 *
 * @example
 * ```typescript
 * const parser = createInvoiceParser({ defaultCurrency: 'MXN' });
 * const { record, diagnostics } = parser.parse({ fileName: 'a.xml', content: bytes });
 * ```
 */
export function createInvoiceParser(
  userConfig?: InvoiceParserConfig,
  deps: InvoiceParserDeps = {},
): InvoiceParser {
  const config: Required<InvoiceParserConfig> = {
    ...DEFAULT_CONFIG,
    ...userConfig,
  };
  const logger = deps.logger ?? silentLogger;
  const idGenerator = deps.idGenerator ?? defaultIdGenerator;
  const decoder = new TextDecoder('utf-8');

  const failed = (file: UploadedFile, recordId: string, diagnostic: Diagnostic): ParseOutcome => {
    logger.debug('Structured document rejected', { code: diagnostic.code });
    return {
      record: {
        ...emptyRecord(recordId, file.fileName, config),
        parseError: diagnostic.message,
      },
      diagnostics: [diagnostic],
    };
  };

  const parse = (file: UploadedFile): ParseOutcome => {
    const recordId = generateRecordId(idGenerator);

    if (file.content.byteLength > config.maxDocumentSize) {
      return failed(file, recordId, parseDiagnostic(
        'PARSE-SIZE',
        `Document exceeds maximum size (${Math.round(config.maxDocumentSize / 1024 / 1024)}MB)`,
        file.fileName,
      ));
    }

    const xml = decoder.decode(file.content);
    if (xml.trim().length === 0) {
      return failed(file, recordId, parseDiagnostic('PARSE-EMPTY', 'Empty XML content', file.fileName));
    }

    try {
      const { fields, diagnostics } = parseCfdiXml(xml, config.defaultCurrency, PARSER_STEP_ID);
      logger.debug('Structured document parsed', {
        schemaVersion: fields.schemaVersion,
        stamped: fields.identifier !== '',
      });
      return {
        record: {
          ...emptyRecord(recordId, file.fileName, config),
          ...fields,
        },
        diagnostics: diagnostics.map((diag) => ({ ...diag, location: file.fileName })),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof XmlStructureError) {
        return failed(file, recordId, parseDiagnostic(
          error.kind === 'unsupported-root' ? 'PARSE-ROOT' : 'PARSE-XML',
          `Failed to parse invoice XML: ${sanitizeErrorMessage(message)}`,
          file.fileName,
        ));
      }
      return failed(file, recordId, {
        ...parseDiagnostic('PARSE-INTERNAL', `Internal parser error: ${sanitizeErrorMessage(message)}`, file.fileName),
        category: 'internal',
      });
    }
  };

  return {
    parse,
    parseBatch(files) {
      const outcomes = files.map((file) => parse(file));
      logger.info('Structured documents parsed', {
        total: outcomes.length,
        failed: outcomes.filter((o) => o.record.parseError !== undefined).length,
      });
      return outcomes;
    },
  };
}

function emptyRecord(
  recordId: string,
  sourceFileName: string,
  config: Required<InvoiceParserConfig>,
): CanonicalInvoiceRecord {
  return {
    recordId,
    identifier: '',
    issuerTaxId: '',
    taxAmount: '0',
    totalAmount: '0',
    currencyCode: config.defaultCurrency,
    issueDate: EPOCH_SENTINEL_DATE,
    expenseCategory: config.defaultExpenseCategory,
    sourceFileName,
  };
}

function parseDiagnostic(code: string, message: string, location: string): Diagnostic {
  return {
    code,
    message,
    severity: 'error',
    category: 'parse',
    source: PARSER_STEP_ID,
    location,
  };
}

/**
 * Sanitize error message to remove potential PII/paths
 */
function sanitizeErrorMessage(message: string): string {
  // Remove file paths
  let sanitized = message.replace(/\/[^\s]+/g, '[path]');

  // Remove potential XML content snippets
  sanitized = sanitized.replace(/<[^>]+>/g, '[xml]');

  // Truncate long messages
  if (sanitized.length > 200) {
    sanitized = sanitized.slice(0, 200) + '...';
  }

  return sanitized;
}
