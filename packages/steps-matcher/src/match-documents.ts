/**
 * Document Matcher
 *
 * Pairs every invoice record with at most one uploaded scan. Unmatched
 * records get strategy 'none'; that is reported downstream, never fatal.
 *
 * Two conditions are flagged without changing the outcome:
 * - several uploads normalise to one key (the first in upload order wins)
 * - one upload is matched to several records
 */

import type { Association, Diagnostic } from '@cfdi-bundle/contracts';
import { normalizeFileName } from './normalize-filename.js';
import { DEFAULT_MATCH_STRATEGIES } from './strategies.js';
import type { MatchableRecord, MatchStrategyFn, ScanCandidate } from './strategies.js';

export const MATCHER_STEP_ID = 'steps-matcher';

export interface MatchOptions {
  /**
   * Strategies in priority order
   * @default DEFAULT_MATCH_STRATEGIES
   */
  strategies?: readonly MatchStrategyFn[];
}

export interface MatchResult {
  /** One per record, in record order */
  associations: Association[];
  diagnostics: Diagnostic[];
}

export function matchDocuments(
  records: readonly MatchableRecord[],
  uploadFileNames: readonly string[],
  options: MatchOptions = {},
): MatchResult {
  const strategies = options.strategies ?? DEFAULT_MATCH_STRATEGIES;
  const uploads: ScanCandidate[] = uploadFileNames.map((fileName) => ({
    fileName,
    key: normalizeFileName(fileName),
  }));

  const associations = records.map((record): Association => {
    for (const strategy of strategies) {
      const hit = strategy(record, uploads);
      if (hit) {
        return { recordId: record.recordId, matchedFileName: hit.fileName, strategy: hit.strategy };
      }
    }
    return { recordId: record.recordId, strategy: 'none' };
  });

  return {
    associations,
    diagnostics: [...duplicateKeyDiagnostics(uploads), ...sharedDocumentDiagnostics(associations)],
  };
}

function duplicateKeyDiagnostics(uploads: readonly ScanCandidate[]): Diagnostic[] {
  const byKey = groupBy(
    uploads.filter((upload) => upload.key !== ''),
    (upload) => upload.key,
  );

  const diagnostics: Diagnostic[] = [];
  for (const [key, group] of byKey) {
    if (group.length < 2) {
      continue;
    }
    const fileNames = group.map((upload) => upload.fileName);
    diagnostics.push({
      code: 'MATCH-DUPLICATE-KEY',
      message: `${fileNames.length} uploaded documents normalise to "${key}"; only "${fileNames[0] ?? ''}" can be matched`,
      severity: 'warning',
      category: 'matching',
      source: MATCHER_STEP_ID,
      context: { key, fileNames },
    });
  }
  return diagnostics;
}

function sharedDocumentDiagnostics(associations: readonly Association[]): Diagnostic[] {
  const byFile = groupBy(
    associations.filter((association) => association.matchedFileName !== undefined),
    (association) => association.matchedFileName ?? '',
  );

  const diagnostics: Diagnostic[] = [];
  for (const [fileName, group] of byFile) {
    if (group.length < 2) {
      continue;
    }
    diagnostics.push({
      code: 'MATCH-SHARED-DOCUMENT',
      message: `Uploaded document "${fileName}" is matched to ${group.length} records`,
      severity: 'warning',
      category: 'matching',
      source: MATCHER_STEP_ID,
      location: fileName,
      context: { recordIds: group.map((association) => association.recordId) },
    });
  }
  return diagnostics;
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}
