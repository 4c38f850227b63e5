import type { CurrencyCode, ExpenseCategory } from '../core/invoice-record.js';

/**
 * Settings shared by every step of a submission build.
 */
export interface BuildConfig {
  /**
   * Width of zero-padded sequence labels ("01" for 2)
   */
  sequenceLabelWidth: number;

  /**
   * Allowed expense categories, in display order
   */
  expenseCategories: readonly ExpenseCategory[];

  defaultExpenseCategory: ExpenseCategory;

  /**
   * Allowed currencies, in display order
   */
  currencies: readonly CurrencyCode[];

  /**
   * Currency used when a document declares none
   */
  defaultCurrency: CurrencyCode;

  /**
   * Exact length a fiscal identifier must have
   */
  identifierLength: number;

  /**
   * Rows below the data that still carry input validation, for manual additions
   */
  validationPaddingRows: number;

  spreadsheetFileName: string;

  sheetName: string;

  title: string;

  manifestFileName: string;

  /**
   * Upper bound for a single structured document, in bytes
   */
  maxDocumentSize: number;
}
