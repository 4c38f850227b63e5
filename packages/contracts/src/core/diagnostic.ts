/**
 * Severity levels for diagnostics
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info' | 'hint';

/**
 * Category of the diagnostic
 */
export type DiagnosticCategory =
  | 'parse' // Structured document parsing
  | 'matching' // Invoice to scan association
  | 'identifier' // Fiscal identifier checks
  | 'amount' // Amount rendering
  | 'packaging' // Archive assembly
  | 'internal'; // Internal errors

/**
 * A single non-fatal finding raised while building a submission
 */
export interface Diagnostic {
  /**
   * Unique code for this diagnostic type
   * Format: {AREA}-{RULE}
   * Examples: 'PARSE-XML', 'MATCH-UNRESOLVED', 'ID-LENGTH'
   */
  code: string;

  /**
   * Human-readable message
   */
  message: string;

  severity: DiagnosticSeverity;

  category: DiagnosticCategory;

  /**
   * Step that produced this diagnostic
   */
  source: string;

  /**
   * File name or sequence label the finding refers to
   */
  location?: string;

  /**
   * Additional context (e.g., expected vs actual values)
   */
  context?: Record<string, unknown>;
}
