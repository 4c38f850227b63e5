/**
 * Types and data tables for the CFDI parser
 */

import type { CanonicalInvoiceRecord, CfdiVersion, Diagnostic } from '@cfdi-bundle/contracts';

/**
 * One schema version and every namespace URI documents of that version are
 * known to declare, canonical spelling first.
 */
export interface CfdiNamespaceCandidate {
  version: CfdiVersion;
  uris: readonly string[];
  /**
   * Attribute names carrying the issuer RFC on the Emisor element, in lookup order
   */
  issuerTaxIdAttributes: readonly string[];
}

/**
 * Candidates tried in priority order; the last entry is the fallback when a
 * document declares none of the known namespaces. New variants go here.
 */
export const CFDI_NAMESPACE_CANDIDATES: readonly CfdiNamespaceCandidate[] = [
  {
    version: '4.0',
    uris: ['http://www.sat.gob.mx/cfd/4', 'http://www.sat.gobmx/cfd/4'],
    issuerTaxIdAttributes: ['Rfc', 'RfcEmisor'],
  },
  {
    version: '3.3',
    uris: ['http://www.sat.gob.mx/cfd/3', 'http://www.sat.gobmx/cfd/3'],
    issuerTaxIdAttributes: ['Rfc', 'RfcEmisor'],
  },
];

/**
 * Namespace of the TimbreFiscalDigital complement (digital stamp)
 */
export const TFD_NAMESPACE = 'http://www.sat.gob.mx/TimbreFiscalDigital';

/**
 * Impuesto codes identifying IVA in a Traslado, padded and unpadded
 */
export const IVA_TAX_CODES: readonly string[] = ['002', '2'];

/**
 * How the schema version was settled
 */
export type VersionMatch = 'root-namespace' | 'declared-namespace' | 'fallback';

export interface VersionDetection {
  candidate: CfdiNamespaceCandidate;
  matchedBy: VersionMatch;
  /**
   * Namespace URIs under which CFDI elements are looked up
   */
  documentNamespaces: ReadonlySet<string>;
}

/**
 * Options for the invoice parser
 */
export interface InvoiceParserConfig {
  /**
   * Currency used when the document declares no Moneda
   * @default 'MXN'
   */
  defaultCurrency?: string;

  /**
   * Category every freshly parsed record starts with
   * @default 'Miscellaneous'
   */
  defaultExpenseCategory?: string;

  /**
   * Maximum payload size in bytes (default: 10MB)
   */
  maxDocumentSize?: number;
}

/**
 * Result of parsing one structured document. The record is always present.
 */
export interface ParseOutcome {
  record: CanonicalInvoiceRecord;
  diagnostics: Diagnostic[];
}
