/**
 * Sequence label helpers shared by the sequencer and its two consumers
 * (spreadsheet and archive), which must agree on every label.
 */

import { SequenceIntegrityError } from '../errors/errors.js';

/**
 * Zero-padded ordinal: `formatSequenceLabel(3, 2) === '03'`.
 * Positions wider than `width` are written in full.
 */
export function formatSequenceLabel(position: number, width: number): string {
  return String(position).padStart(width, '0');
}

/**
 * Throws SequenceIntegrityError unless positions run 1..n in order and every
 * label is the formatted position.
 */
export function assertContiguousLabels(
  records: readonly { sequenceLabel: string; position: number }[],
  width: number,
): void {
  records.forEach((record, index) => {
    const expected = formatSequenceLabel(index + 1, width);
    if (record.position !== index + 1 || record.sequenceLabel !== expected) {
      throw new SequenceIntegrityError(
        `Sequence label at index ${index} is "${record.sequenceLabel}" (position ${record.position}); expected "${expected}"`,
        { index, expected, actual: record.sequenceLabel },
      );
    }
  });
}
