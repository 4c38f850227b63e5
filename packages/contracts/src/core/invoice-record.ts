/**
 * CanonicalInvoiceRecord is the reduced form of one CFDI used throughout
 * the bundle pipeline.
 *
 * Monetary amounts are stored as string decimal values to avoid
 * floating-point precision issues. The total keeps the exact text the
 * issuer declared.
 */

/**
 * Decimal amount represented as string to avoid floating-point issues.
 *
 * @example "1234.56", "0", "16.000000"
 */
export type DecimalAmount = string;

/**
 * ISO 4217 currency code
 * @example "MXN", "USD"
 */
export type CurrencyCode = string;

/**
 * ISO 8601 calendar date
 * @example "2024-03-01"
 */
export type ISODate = string;

/**
 * Expense category shown in the submission grid.
 * The allowed values are configuration data (see BuildConfig.expenseCategories).
 */
export type ExpenseCategory = string;

/**
 * CFDI schema versions the parser understands
 */
export type CfdiVersion = '3.3' | '4.0';

/**
 * Issue date used when the document carries none or an unparsable one.
 * Only ever used for ordering.
 */
export const EPOCH_SENTINEL_DATE: ISODate = '1970-01-01';

export interface CanonicalInvoiceRecord {
  /**
   * Session-local handle used by the review step to address this record.
   * Not part of the fiscal data.
   */
  recordId: string;

  /**
   * Fiscal folio (UUID) from the TimbreFiscalDigital stamp.
   * Empty when the document carries no stamp.
   */
  identifier: string;

  /**
   * RFC of the issuer (Emisor), empty when absent
   */
  issuerTaxId: string;

  /**
   * Sum of transferred IVA amounts; "0" when none could be read
   */
  taxAmount: DecimalAmount;

  /**
   * Declared document total, verbatim
   */
  totalAmount: DecimalAmount;

  currencyCode: CurrencyCode;

  /**
   * Ordering key only; never written to any output
   */
  issueDate: ISODate;

  expenseCategory: ExpenseCategory;

  /**
   * Name of the uploaded XML file this record came from
   */
  sourceFileName: string;

  /**
   * Schema version the parser settled on (absent when parsing failed)
   */
  schemaVersion?: CfdiVersion;

  /**
   * Set when the payload could not be read. The record is kept with
   * zeroed fields so every input file stays accounted for.
   */
  parseError?: string;
}

/**
 * A record after chronological ordering, carrying its row / file label
 */
export interface SequencedRecord extends CanonicalInvoiceRecord {
  /**
   * Zero-padded ordinal, e.g. "01"
   */
  sequenceLabel: string;

  /**
   * 1-based position in the ordered set
   */
  position: number;
}

/**
 * Fields the review step may change on a record
 */
export type RecordEdit = Partial<
  Pick<
    CanonicalInvoiceRecord,
    | 'identifier'
    | 'issuerTaxId'
    | 'taxAmount'
    | 'totalAmount'
    | 'currencyCode'
    | 'issueDate'
    | 'expenseCategory'
  >
>;
