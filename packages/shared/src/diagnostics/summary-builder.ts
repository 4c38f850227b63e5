/**
 * Diagnostics Summary Builder
 *
 * Aggregates the warnings of one build action into a single summary, so the
 * operator gets one consolidated list instead of per-file interruptions.
 */

import type { Diagnostic, DiagnosticSeverity } from '@cfdi-bundle/contracts';

/**
 * Options for building diagnostics summary
 */
export interface DiagnosticsSummaryOptions {
  /**
   * Maximum number of diagnostics to process.
   * @default 500
   */
  maxDiagnostics?: number;

  /**
   * Maximum number of top codes to include in summary.
   * @default 10
   */
  maxTopCodes?: number;

  /**
   * Whether to include hints in the summary.
   * @default false
   */
  includeHints?: boolean;
}

/**
 * A code occurrence in the summary
 */
export interface TopCodeEntry {
  code: string;

  /**
   * Highest severity seen for this code
   */
  severity: DiagnosticSeverity;

  count: number;

  /**
   * Locations (file names or sequence labels) in first-seen order
   */
  locations: string[];
}

/**
 * Aggregated diagnostics summary
 */
export interface DiagnosticsSummary {
  /**
   * Most frequent codes, sorted by count descending
   */
  topCodes: TopCodeEntry[];

  totalBySeverity: Record<DiagnosticSeverity, number>;

  /**
   * Whether the diagnostics were truncated due to limits
   */
  truncated: boolean;

  /**
   * Total number of diagnostics processed
   */
  totalCount: number;
}

const DEFAULT_OPTIONS: Required<DiagnosticsSummaryOptions> = {
  maxDiagnostics: 500,
  maxTopCodes: 10,
  includeHints: false,
};

/**
 * Build a diagnostics summary.
 *
 * @example
 * const summary = buildDiagnosticsSummary(report.diagnostics);
 * summary.topCodes[0]; // { code: 'MATCH-UNRESOLVED', severity: 'warning', count: 2, locations: ['01', '04'] }
 */
export function buildDiagnosticsSummary(
  diagnostics: readonly Diagnostic[],
  options?: DiagnosticsSummaryOptions,
): DiagnosticsSummary {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const totalBySeverity: Record<DiagnosticSeverity, number> = {
    error: 0,
    warning: 0,
    info: 0,
    hint: 0,
  };

  const codeMap = new Map<string, { severity: DiagnosticSeverity; count: number; locations: string[]; order: number }>();

  const truncated = diagnostics.length > opts.maxDiagnostics;
  const toProcess = truncated ? diagnostics.slice(0, opts.maxDiagnostics) : diagnostics;

  for (const diag of toProcess) {
    if (diag.severity === 'hint' && !opts.includeHints) {
      continue;
    }

    totalBySeverity[diag.severity]++;

    const existing = codeMap.get(diag.code);
    if (existing) {
      existing.count++;
      existing.severity = higherSeverity(existing.severity, diag.severity);
      if (diag.location !== undefined && !existing.locations.includes(diag.location)) {
        existing.locations.push(diag.location);
      }
    } else {
      codeMap.set(diag.code, {
        severity: diag.severity,
        count: 1,
        locations: diag.location !== undefined ? [diag.location] : [],
        order: codeMap.size,
      });
    }
  }

  const topCodes = Array.from(codeMap.entries())
    .sort(([, a], [, b]) => {
      if (b.count !== a.count) {
        return b.count - a.count;
      }
      const bySeverity = severityRank(b.severity) - severityRank(a.severity);
      return bySeverity !== 0 ? bySeverity : a.order - b.order;
    })
    .slice(0, opts.maxTopCodes)
    .map(([code, data]) => ({
      code,
      severity: data.severity,
      count: data.count,
      locations: data.locations,
    }));

  return {
    topCodes,
    totalBySeverity,
    truncated,
    totalCount: toProcess.length,
  };
}

/**
 * Render diagnostics as one line each, most severe first, otherwise in the
 * order they were raised.
 *
 * @example "WARNING ID-LENGTH [02]: Row 02: identifier is missing"
 */
export function formatDiagnosticLines(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics
    .map((diag, index) => ({ diag, index }))
    .sort((a, b) => severityRank(b.diag.severity) - severityRank(a.diag.severity) || a.index - b.index)
    .map(({ diag }) => {
      const location = diag.location !== undefined ? ` [${diag.location}]` : '';
      return `${diag.severity.toUpperCase()} ${diag.code}${location}: ${diag.message}`;
    });
}

function higherSeverity(a: DiagnosticSeverity, b: DiagnosticSeverity): DiagnosticSeverity {
  return severityRank(a) >= severityRank(b) ? a : b;
}

/**
 * Numeric rank for severity (higher = more severe)
 */
function severityRank(severity: DiagnosticSeverity): number {
  switch (severity) {
    case 'error':
      return 4;
    case 'warning':
      return 3;
    case 'info':
      return 2;
    case 'hint':
      return 1;
  }
}
