/**
 * @cfdi-bundle/steps-parser
 *
 * CFDI 3.3 / 4.0 parser producing canonical invoice records.
 *
 * This package provides:
 * - Schema version detection over an ordered namespace candidate table
 * - Namespace-aware XML reading (prefix independent)
 * - A batch parser that isolates failures per document
 *
 * @packageDocumentation
 */

// Main step
export { createInvoiceParser, PARSER_STEP_ID } from './invoice-parser.js';
export type { InvoiceParser, InvoiceParserDeps } from './invoice-parser.js';

// Functions (for direct use)
export { detectCfdiVersion } from './detect-version.js';
export { parseCfdiXml, parseIssueDate } from './parse-cfdi.js';
export type { CfdiFields, CfdiParseResult } from './parse-cfdi.js';
export { parseXmlTree, XmlStructureError } from './xml-tree.js';
export type { XmlElement } from './xml-tree.js';

// Types
export type {
  CfdiNamespaceCandidate,
  InvoiceParserConfig,
  ParseOutcome,
  VersionDetection,
  VersionMatch,
} from './types.js';

// Constants (for testing and extension)
export { CFDI_NAMESPACE_CANDIDATES, TFD_NAMESPACE, IVA_TAX_CODES } from './types.js';
