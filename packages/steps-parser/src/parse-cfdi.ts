/**
 * CFDI to CanonicalInvoiceRecord
 *
 * Reads the handful of fields the IVA submission grid needs, plus Fecha for
 * ordering. Tolerant of missing optional nodes: only a missing or foreign
 * root element is structural.
 *
 * IMPORTANT: No PII is logged during parsing.
 */

import type { CanonicalInvoiceRecord, DecimalAmount, Diagnostic, ISODate } from '@cfdi-bundle/contracts';
import { EPOCH_SENTINEL_DATE } from '@cfdi-bundle/contracts';
import { isNegative, sum, toPlainDecimal } from '@cfdi-bundle/shared';
import { detectCfdiVersion } from './detect-version.js';
import { IVA_TAX_CODES, TFD_NAMESPACE } from './types.js';
import {
  XmlStructureError,
  findAllNested,
  findChildren,
  findDescendant,
  getAttribute,
  parseXmlTree,
} from './xml-tree.js';

const TFD_NAMESPACES: ReadonlySet<string> = new Set([TFD_NAMESPACE]);

/**
 * Record fields read from the document; identity and review fields are
 * filled in by the caller.
 */
export type CfdiFields = Pick<
  CanonicalInvoiceRecord,
  'identifier' | 'issuerTaxId' | 'taxAmount' | 'totalAmount' | 'currencyCode' | 'issueDate' | 'schemaVersion'
>;

export interface CfdiParseResult {
  fields: CfdiFields;
  diagnostics: Diagnostic[];
}

/**
 * Parse CFDI XML text.
 *
 * @throws XmlStructureError when the markup is malformed or the root is not a Comprobante
 */
export function parseCfdiXml(xml: string, defaultCurrency: string, source: string): CfdiParseResult {
  const root = parseXmlTree(xml);
  const diagnostics: Diagnostic[] = [];

  const detection = detectCfdiVersion(root);
  const cfdi = detection.documentNamespaces;

  if (detection.matchedBy === 'fallback') {
    diagnostics.push({
      code: 'PARSE-NAMESPACE',
      message: `No known CFDI namespace declared; reading as CFDI ${detection.candidate.version}`,
      severity: 'warning',
      category: 'parse',
      source,
    });
  }

  if (root.localName !== 'Comprobante' || !cfdi.has(root.namespaceUri)) {
    throw new XmlStructureError(`Unsupported root element: ${root.name}`, 'unsupported-root');
  }

  const stamp = findDescendant(root, 'TimbreFiscalDigital', TFD_NAMESPACES);
  const identifier = getAttribute(stamp, 'UUID') ?? '';

  const issuer = findChildren(root, 'Emisor', cfdi)[0];
  let issuerTaxId = '';
  for (const attribute of detection.candidate.issuerTaxIdAttributes) {
    const value = getAttribute(issuer, attribute);
    if (value !== undefined) {
      issuerTaxId = value;
      break;
    }
  }

  const ivaAmounts: DecimalAmount[] = [];
  for (const transfer of findAllNested(root, 'Traslados', 'Traslado', cfdi)) {
    const code = getAttribute(transfer, 'Impuesto');
    if (code === undefined || !IVA_TAX_CODES.includes(code)) {
      continue;
    }
    const raw = getAttribute(transfer, 'Importe');
    const amount = raw !== undefined ? toPlainDecimal(raw) : undefined;
    // Transferred tax is never negative; such entries are skipped like non-numeric ones
    if (amount !== undefined && !isNegative(amount)) {
      ivaAmounts.push(amount);
    }
  }

  return {
    fields: {
      identifier,
      issuerTaxId,
      taxAmount: sum(ivaAmounts),
      totalAmount: getAttribute(root, 'Total') ?? '0',
      currencyCode: getAttribute(root, 'Moneda') ?? defaultCurrency,
      issueDate: parseIssueDate(getAttribute(root, 'Fecha')),
      schemaVersion: detection.candidate.version,
    },
    diagnostics,
  };
}

/**
 * First ten characters of Fecha as a calendar date, or the epoch sentinel.
 */
export function parseIssueDate(raw: string | undefined): ISODate {
  const candidate = (raw ?? '').slice(0, 10);
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(candidate);
  if (!match) {
    return EPOCH_SENTINEL_DATE;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return EPOCH_SENTINEL_DATE;
  }

  return candidate;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}
