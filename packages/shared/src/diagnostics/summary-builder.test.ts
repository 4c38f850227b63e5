import { describe, it, expect } from 'vitest';
import { buildDiagnosticsSummary, formatDiagnosticLines } from './summary-builder.js';
import type { Diagnostic } from '@cfdi-bundle/contracts';

/**
 * Helper to create a diagnostic
 */
function createDiagnostic(
  code: string,
  severity: Diagnostic['severity'] = 'warning',
  location?: string,
): Diagnostic {
  const diag: Diagnostic = {
    code,
    message: `${code} message`,
    severity,
    category: 'matching',
    source: 'test',
  };
  if (location !== undefined) diag.location = location;
  return diag;
}

describe('buildDiagnosticsSummary', () => {
  it('should count diagnostics by severity', () => {
    const summary = buildDiagnosticsSummary([
      createDiagnostic('PARSE-XML', 'error'),
      createDiagnostic('ID-LENGTH', 'warning'),
      createDiagnostic('ID-LENGTH', 'warning'),
      createDiagnostic('MATCH-UNRESOLVED', 'info'),
    ]);

    expect(summary.totalBySeverity).toEqual({ error: 1, warning: 2, info: 1, hint: 0 });
    expect(summary.totalCount).toBe(4);
    expect(summary.truncated).toBe(false);
  });

  it('should order codes by count, then severity, then first appearance', () => {
    const summary = buildDiagnosticsSummary([
      createDiagnostic('MATCH-DUPLICATE-KEY', 'warning'),
      createDiagnostic('PARSE-XML', 'error'),
      createDiagnostic('MATCH-UNRESOLVED', 'warning', '01'),
      createDiagnostic('MATCH-UNRESOLVED', 'warning', '03'),
      createDiagnostic('ID-LENGTH', 'warning'),
    ]);

    expect(summary.topCodes.map((entry) => entry.code)).toEqual([
      'MATCH-UNRESOLVED',
      'PARSE-XML',
      'MATCH-DUPLICATE-KEY',
      'ID-LENGTH',
    ]);
    expect(summary.topCodes[0]?.count).toBe(2);
    expect(summary.topCodes[0]?.locations).toEqual(['01', '03']);
  });

  it('should keep the highest severity seen for a code', () => {
    const summary = buildDiagnosticsSummary([
      createDiagnostic('PARSE-NAMESPACE', 'info'),
      createDiagnostic('PARSE-NAMESPACE', 'warning'),
    ]);

    expect(summary.topCodes[0]?.severity).toBe('warning');
  });

  it('should skip hints unless requested', () => {
    const diagnostics = [createDiagnostic('HINT-1', 'hint')];

    expect(buildDiagnosticsSummary(diagnostics).totalCount).toBe(1);
    expect(buildDiagnosticsSummary(diagnostics).topCodes).toHaveLength(0);
    expect(buildDiagnosticsSummary(diagnostics, { includeHints: true }).topCodes).toHaveLength(1);
  });

  it('should truncate beyond maxDiagnostics', () => {
    const diagnostics = Array.from({ length: 5 }, () => createDiagnostic('ID-LENGTH'));
    const summary = buildDiagnosticsSummary(diagnostics, { maxDiagnostics: 3 });

    expect(summary.truncated).toBe(true);
    expect(summary.totalCount).toBe(3);
    expect(summary.topCodes[0]?.count).toBe(3);
  });
});

describe('formatDiagnosticLines', () => {
  it('should put errors first and keep raise order within a severity', () => {
    const lines = formatDiagnosticLines([
      createDiagnostic('ID-LENGTH', 'warning', '02'),
      createDiagnostic('PARSE-XML', 'error', 'broken.xml'),
      createDiagnostic('MATCH-UNRESOLVED', 'warning'),
    ]);

    expect(lines).toEqual([
      'ERROR PARSE-XML [broken.xml]: PARSE-XML message',
      'WARNING ID-LENGTH [02]: ID-LENGTH message',
      'WARNING MATCH-UNRESOLVED: MATCH-UNRESOLVED message',
    ]);
  });
});
