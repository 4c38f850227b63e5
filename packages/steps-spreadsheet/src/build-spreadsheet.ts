/**
 * Spreadsheet Builder
 *
 * Renders sequenced records into the submission workbook: title band,
 * metadata band, blue header row, one body row per record, and list /
 * length validations reaching past the data so rows added by hand are
 * checked too.
 *
 * Never fails on record content. Identifier length problems and amounts
 * that cannot be written as numbers come back as warnings.
 */

import ExcelJS from 'exceljs';
import type { Border, Cell, Worksheet } from 'exceljs';
import type { BuildConfig, Diagnostic, SequencedRecord, SubmissionMetadata } from '@cfdi-bundle/contracts';
import { assertContiguousLabels, isValidDecimalAmount, silentLogger, toNumber, type Logger } from '@cfdi-bundle/shared';
import {
  AMOUNT_NUMBER_FORMAT,
  CATEGORY_COLUMN,
  COLUMNS,
  CURRENCY_COLUMN,
  FIRST_DATA_ROW,
  HEADER_FILL_ARGB,
  HEADER_FONT_ARGB,
  HEADER_ROW,
  IDENTIFIER_COLUMN,
  ISSUER_COLUMN,
  LABEL_COLUMN,
  METADATA_FIELDS,
  METADATA_LABEL_ARGB,
  MIN_VALIDATION_PADDING_ROWS,
  TAX_COLUMN,
  TEXT_NUMBER_FORMAT,
  TITLE_CELL,
  TITLE_RANGE,
  TOTAL_COLUMN,
  type ColumnLetter,
} from './layout.js';

export const SPREADSHEET_STEP_ID = 'steps-spreadsheet';

export type SpreadsheetConfig = Pick<
  BuildConfig,
  | 'sheetName'
  | 'title'
  | 'expenseCategories'
  | 'defaultExpenseCategory'
  | 'currencies'
  | 'defaultCurrency'
  | 'identifierLength'
  | 'validationPaddingRows'
  | 'sequenceLabelWidth'
>;

export interface SpreadsheetDeps {
  logger?: Logger;
}

export interface SpreadsheetResult {
  /** .xlsx file contents */
  bytes: Uint8Array;
  diagnostics: Diagnostic[];
  /** Body rows written, including the placeholder row for an empty set */
  rowCount: number;
}

const THIN_BORDER: Partial<Border> = { style: 'thin' };
const CELL_BORDERS = { top: THIN_BORDER, left: THIN_BORDER, bottom: THIN_BORDER, right: THIN_BORDER };

/**
 * Build the submission workbook.
 *
 * @throws SequenceIntegrityError when labels are not contiguous from 1
 */
export async function buildSpreadsheet(
  records: readonly SequencedRecord[],
  metadata: SubmissionMetadata,
  config: SpreadsheetConfig,
  deps: SpreadsheetDeps = {},
): Promise<SpreadsheetResult> {
  assertContiguousLabels(records, config.sequenceLabelWidth);
  const logger = deps.logger ?? silentLogger;
  const diagnostics: Diagnostic[] = [];

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(config.sheetName);

  writeTitle(sheet, config.title);
  writeMetadata(sheet, metadata);
  writeHeader(sheet);

  records.forEach((record, index) => {
    diagnostics.push(...writeRecordRow(sheet, FIRST_DATA_ROW + index, record, config));
  });
  if (records.length === 0) {
    writePlaceholderRow(sheet, FIRST_DATA_ROW, config);
  }

  const rowCount = Math.max(records.length, 1);
  const lastValidatedRow =
    FIRST_DATA_ROW + rowCount - 1 + Math.max(config.validationPaddingRows, MIN_VALIDATION_PADDING_ROWS);
  applyValidations(sheet, lastValidatedRow, config);

  const bytes = new Uint8Array(await workbook.xlsx.writeBuffer());
  logger.info('Spreadsheet built', { rows: rowCount, warnings: diagnostics.length });

  return { bytes, diagnostics, rowCount };
}

function writeTitle(sheet: Worksheet, title: string): void {
  sheet.mergeCells(TITLE_RANGE);
  const cell = sheet.getCell(TITLE_CELL);
  cell.value = title;
  cell.font = { bold: true, size: 14 };
  cell.alignment = { horizontal: 'center', vertical: 'middle' };
}

function writeMetadata(sheet: Worksheet, metadata: SubmissionMetadata): void {
  for (const field of METADATA_FIELDS) {
    const label = sheet.getCell(`A${field.row}`);
    label.value = field.label;
    label.font = { bold: true, color: { argb: METADATA_LABEL_ARGB } };

    const value = sheet.getCell(`B${field.row}`);
    value.value = metadata[field.key];
    value.font = { bold: true };
    // Keep "0042" as typed
    value.numFmt = TEXT_NUMBER_FORMAT;
  }
}

function writeHeader(sheet: Worksheet): void {
  for (const column of COLUMNS) {
    sheet.getColumn(column.letter).width = column.width;

    const cell = sheet.getCell(`${column.letter}${HEADER_ROW}`);
    cell.value = column.header;
    cell.font = { bold: true, color: { argb: HEADER_FONT_ARGB } };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_ARGB } };
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
    cell.border = CELL_BORDERS;
  }
}

function writeRecordRow(
  sheet: Worksheet,
  row: number,
  record: SequencedRecord,
  config: SpreadsheetConfig,
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const cell = (column: ColumnLetter): Cell => bodyCell(sheet, column, row);

  const label = cell(LABEL_COLUMN);
  label.numFmt = TEXT_NUMBER_FORMAT;
  label.value = record.sequenceLabel;

  cell(IDENTIFIER_COLUMN).value = record.identifier;
  cell(ISSUER_COLUMN).value = record.issuerTaxId;

  const amounts = [
    { column: TAX_COLUMN, field: 'taxAmount', amount: record.taxAmount },
    { column: TOTAL_COLUMN, field: 'totalAmount', amount: record.totalAmount },
  ] as const;
  for (const { column, field, amount } of amounts) {
    const target = cell(column);
    if (isValidDecimalAmount(amount)) {
      target.value = toNumber(amount);
      target.numFmt = AMOUNT_NUMBER_FORMAT;
    } else {
      target.value = amount;
      diagnostics.push({
        code: 'AMOUNT-NOT-NUMERIC',
        message: `Row ${record.sequenceLabel}: ${field} "${amount}" is not a plain decimal and was written as text`,
        severity: 'warning',
        category: 'amount',
        source: SPREADSHEET_STEP_ID,
        location: record.sequenceLabel,
        context: { field },
      });
    }
  }

  cell(CATEGORY_COLUMN).value = record.expenseCategory;
  cell(CURRENCY_COLUMN).value = record.currencyCode;

  if (record.identifier.length !== config.identifierLength) {
    diagnostics.push({
      code: 'ID-LENGTH',
      message: record.identifier === ''
        ? `Row ${record.sequenceLabel}: identifier is missing`
        : `Row ${record.sequenceLabel}: identifier has ${record.identifier.length} characters, expected ${config.identifierLength}`,
      severity: 'warning',
      category: 'identifier',
      source: SPREADSHEET_STEP_ID,
      location: record.sequenceLabel,
      context: { expected: config.identifierLength, actual: record.identifier.length },
    });
  }

  return diagnostics;
}

/**
 * Bordered empty row pre-filled with the default category and currency
 */
function writePlaceholderRow(sheet: Worksheet, row: number, config: SpreadsheetConfig): void {
  for (const column of COLUMNS) {
    bodyCell(sheet, column.letter, row);
  }
  bodyCell(sheet, LABEL_COLUMN, row).numFmt = TEXT_NUMBER_FORMAT;
  bodyCell(sheet, CATEGORY_COLUMN, row).value = config.defaultExpenseCategory;
  bodyCell(sheet, CURRENCY_COLUMN, row).value = config.defaultCurrency;
}

function bodyCell(sheet: Worksheet, column: ColumnLetter, row: number): Cell {
  const cell = sheet.getCell(`${column}${row}`);
  cell.border = CELL_BORDERS;
  return cell;
}

function applyValidations(sheet: Worksheet, lastRow: number, config: SpreadsheetConfig): void {
  const categoryList = listFormula(config.expenseCategories);
  const currencyList = listFormula(config.currencies);

  for (let row = FIRST_DATA_ROW; row <= lastRow; row++) {
    sheet.getCell(`${CATEGORY_COLUMN}${row}`).dataValidation = {
      type: 'list',
      allowBlank: true,
      formulae: [categoryList],
      showErrorMessage: true,
      errorTitle: 'Invalid type',
      error: `Choose one of: ${config.expenseCategories.join(', ')}`,
    };
    sheet.getCell(`${CURRENCY_COLUMN}${row}`).dataValidation = {
      type: 'list',
      allowBlank: true,
      formulae: [currencyList],
      showErrorMessage: true,
      errorTitle: 'Invalid currency',
      error: `Choose one of: ${config.currencies.join(', ')}`,
    };
    sheet.getCell(`${IDENTIFIER_COLUMN}${row}`).dataValidation = {
      type: 'textLength',
      operator: 'equal',
      allowBlank: true,
      formulae: [config.identifierLength],
      showErrorMessage: true,
      errorTitle: 'Invalid UUID',
      error: `The UUID must be exactly ${config.identifierLength} characters`,
    };
  }
}

/**
 * Inline list source, e.g. `"Miscellaneous,Gasoline"`
 */
function listFormula(values: readonly string[]): string {
  return `"${values.join(',')}"`;
}
