/**
 * Matching strategies, tried in order until one yields a hit.
 *
 * Each strategy is a pure function of one record and the upload list.
 * Uploads are always scanned in the order given; the first hit wins.
 */

import type { CanonicalInvoiceRecord, MatchStrategy } from '@cfdi-bundle/contracts';
import { normalizeFileName } from './normalize-filename.js';

/**
 * The record fields a strategy may look at
 */
export type MatchableRecord = Pick<CanonicalInvoiceRecord, 'recordId' | 'identifier' | 'sourceFileName'>;

/**
 * Uploaded scan with its key computed once
 */
export interface ScanCandidate {
  fileName: string;
  key: string;
}

export interface MatchHit {
  fileName: string;
  strategy: Exclude<MatchStrategy, 'none'>;
}

export type MatchStrategyFn = (
  record: MatchableRecord,
  uploads: readonly ScanCandidate[],
) => MatchHit | undefined;

/**
 * Upload whose key equals the key of the record's source file name
 */
export const normalizedKeyStrategy: MatchStrategyFn = (record, uploads) => {
  const key = normalizeFileName(record.sourceFileName);
  if (key === '') {
    return undefined;
  }
  const upload = uploads.find((candidate) => candidate.key === key);
  return upload ? { fileName: upload.fileName, strategy: 'normalized-key' } : undefined;
};

/**
 * Upload whose key contains the lower-cased identifier or its first 8 characters
 */
export const identifierSubstringStrategy: MatchStrategyFn = (record, uploads) => {
  const identifier = record.identifier.toLowerCase();
  if (identifier === '') {
    return undefined;
  }
  const needles = [identifier, identifier.slice(0, 8)];
  const upload = uploads.find((candidate) => needles.some((needle) => candidate.key.includes(needle)));
  return upload ? { fileName: upload.fileName, strategy: 'identifier-substring' } : undefined;
};

export const DEFAULT_MATCH_STRATEGIES: readonly MatchStrategyFn[] = [
  normalizedKeyStrategy,
  identifierSubstringStrategy,
];
