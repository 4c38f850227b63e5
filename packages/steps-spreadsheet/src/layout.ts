/**
 * Cell layout of the submission sheet. Positions are part of the output
 * contract: downstream reviewers locate fields by address.
 */

export const TITLE_CELL = 'A1';
export const TITLE_RANGE = 'A1:G1';

/**
 * Metadata band: label in column A, value in column B
 */
export const METADATA_FIELDS = [
  { row: 3, label: 'Requested period:', key: 'requestedPeriod' },
  { row: 4, label: 'Claimant name:', key: 'claimantName' },
  { row: 5, label: 'Contact email:', key: 'contactEmail' },
  { row: 6, label: 'Personal ID (last 4):', key: 'personalIdLast4' },
] as const;

export const HEADER_ROW = 8;
export const FIRST_DATA_ROW = 9;

/**
 * Body columns in output order
 */
export const COLUMNS = [
  { letter: 'A', header: 'No.VDR', width: 10 },
  { letter: 'B', header: 'UUID', width: 40 },
  { letter: 'C', header: 'RFC_Emisor', width: 16 },
  { letter: 'D', header: 'Total_Impuestos', width: 16 },
  { letter: 'E', header: 'Total_Comprobante', width: 18 },
  { letter: 'F', header: 'Type', width: 16 },
  { letter: 'G', header: 'Currency', width: 10 },
] as const;

export type ColumnLetter = (typeof COLUMNS)[number]['letter'];

export const LABEL_COLUMN: ColumnLetter = 'A';
export const IDENTIFIER_COLUMN: ColumnLetter = 'B';
export const ISSUER_COLUMN: ColumnLetter = 'C';
export const TAX_COLUMN: ColumnLetter = 'D';
export const TOTAL_COLUMN: ColumnLetter = 'E';
export const CATEGORY_COLUMN: ColumnLetter = 'F';
export const CURRENCY_COLUMN: ColumnLetter = 'G';

export const HEADER_FILL_ARGB = 'FF4F81BD';
export const HEADER_FONT_ARGB = 'FFFFFFFF';
export const METADATA_LABEL_ARGB = 'FF00B050';

export const AMOUNT_NUMBER_FORMAT = '#,##0.00';
export const TEXT_NUMBER_FORMAT = '@';

/**
 * Validation rules never cover fewer rows past the data than this
 */
export const MIN_VALIDATION_PADDING_ROWS = 50;
