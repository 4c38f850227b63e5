export {
  buildDiagnosticsSummary,
  formatDiagnosticLines,
  type DiagnosticsSummaryOptions,
  type DiagnosticsSummary,
  type TopCodeEntry,
} from './summary-builder.js';
