/**
 * @cfdi-bundle/steps-spreadsheet
 *
 * Renders sequenced invoice records into the submission workbook.
 *
 * @packageDocumentation
 */

export { buildSpreadsheet, SPREADSHEET_STEP_ID } from './build-spreadsheet.js';
export type { SpreadsheetConfig, SpreadsheetDeps, SpreadsheetResult } from './build-spreadsheet.js';
export * as layout from './layout.js';
