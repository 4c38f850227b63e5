/**
 * Plain-text manifest written into every archive.
 *
 * Lists each sequenced record with the entry it produced (or UNRESOLVED),
 * then the unresolved labels on one line. Claimant data stays out of it.
 */

import type { MatchStrategy } from '@cfdi-bundle/contracts';

export interface ManifestHeader {
  generatedAt: string;
  sessionId: string;
  requestedPeriod: string;
  configHash: string;
  spreadsheetFileName: string;
}

export interface ManifestLine {
  sequenceLabel: string;
  /** Archive entry name, absent when unresolved */
  entryName?: string;
  strategy: MatchStrategy;
  sourceFileName: string;
}

export const MANIFEST_TITLE = 'SUBMISSION PACKAGE MANIFEST';
export const UNRESOLVED_MARKER = 'UNRESOLVED';

export function renderManifest(header: ManifestHeader, lines: readonly ManifestLine[]): string {
  const unresolved = lines.filter((line) => line.entryName === undefined).map((line) => line.sequenceLabel);

  return [
    MANIFEST_TITLE,
    `Generated: ${header.generatedAt}`,
    `Session: ${header.sessionId}`,
    `Requested period: ${header.requestedPeriod}`,
    `Config: ${header.configHash}`,
    `Spreadsheet: ${header.spreadsheetFileName}`,
    '',
    `Documents (${lines.length}):`,
    ...lines.map((line) =>
      [line.sequenceLabel, line.entryName ?? UNRESOLVED_MARKER, line.strategy, line.sourceFileName].join('\t'),
    ),
    '',
    `Unresolved: ${unresolved.length > 0 ? unresolved.join(', ') : 'none'}`,
    '',
  ].join('\n');
}
