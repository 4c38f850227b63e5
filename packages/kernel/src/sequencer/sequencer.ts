/**
 * Sequencer
 *
 * Orders records by issue date (ascending, ties keep input order) and
 * labels them 1..n. Labels are derived from scratch on every call; a label
 * carried by an input record is discarded.
 */

import type { CanonicalInvoiceRecord, SequencedRecord } from '@cfdi-bundle/contracts';
import { formatSequenceLabel } from '@cfdi-bundle/shared';

export const DEFAULT_SEQUENCE_LABEL_WIDTH = 2;

export function sequenceRecords(
  records: readonly CanonicalInvoiceRecord[],
  labelWidth: number = DEFAULT_SEQUENCE_LABEL_WIDTH,
): SequencedRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => compareIssueDates(a.record.issueDate, b.record.issueDate) || a.index - b.index)
    .map(({ record }, index) => ({
      ...record,
      sequenceLabel: formatSequenceLabel(index + 1, labelWidth),
      position: index + 1,
    }));
}

/**
 * ISO calendar dates order lexicographically
 */
function compareIssueDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
