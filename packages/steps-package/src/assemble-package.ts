/**
 * Package Assembler
 *
 * Writes the submission archive: the spreadsheet at the root, each matched
 * scan renamed to `<sequence label><original extension>`, and a manifest.
 * Records without a scan are left out of the archive and reported.
 *
 * Labels and associations must come from the same build as the
 * spreadsheet; anything else is rejected with SequenceIntegrityError.
 */

import JSZip from 'jszip';
import type {
  Association,
  BuildConfig,
  Diagnostic,
  SequencedRecord,
  UnresolvedEntry,
  UploadedFile,
} from '@cfdi-bundle/contracts';
import {
  MissingUploadSetError,
  SequenceIntegrityError,
  assertContiguousLabels,
  silentLogger,
  type Logger,
} from '@cfdi-bundle/shared';
import { fileExtension } from '@cfdi-bundle/steps-matcher';
import { renderManifest, type ManifestHeader, type ManifestLine } from './manifest.js';

export const PACKAGE_STEP_ID = 'steps-package';

export type PackageConfig = Pick<BuildConfig, 'spreadsheetFileName' | 'manifestFileName' | 'sequenceLabelWidth'>;

export interface PackageInput {
  records: readonly SequencedRecord[];
  associations: readonly Association[];
  uploads: readonly UploadedFile[];
  spreadsheet: Uint8Array;
}

export type PackageHeader = Omit<ManifestHeader, 'spreadsheetFileName'>;

export interface PackageDeps {
  logger?: Logger;
}

export interface PackageResult {
  /** .zip file contents */
  bytes: Uint8Array;
  /** Entry names in write order */
  entries: string[];
  unresolved: UnresolvedEntry[];
  diagnostics: Diagnostic[];
  manifest: string;
}

/**
 * Build the submission archive.
 *
 * @throws MissingUploadSetError when no scanned documents were uploaded
 * @throws SequenceIntegrityError when labels, associations and uploads disagree
 */
export async function assemblePackage(
  input: PackageInput,
  header: PackageHeader,
  config: PackageConfig,
  deps: PackageDeps = {},
): Promise<PackageResult> {
  if (input.uploads.length === 0) {
    throw new MissingUploadSetError();
  }
  assertContiguousLabels(input.records, config.sequenceLabelWidth);
  const logger = deps.logger ?? silentLogger;

  const associationsById = indexAssociations(input.records, input.associations);
  const uploadsByName = new Map<string, UploadedFile>();
  for (const upload of input.uploads) {
    if (!uploadsByName.has(upload.fileName)) {
      uploadsByName.set(upload.fileName, upload);
    }
  }

  const date = new Date(header.generatedAt);
  const zip = new JSZip();
  const entries: string[] = [];
  const addEntry = (name: string, data: Uint8Array | string): void => {
    zip.file(name, data, { compression: 'DEFLATE', date });
    entries.push(name);
  };

  addEntry(config.spreadsheetFileName, input.spreadsheet);

  const lines: ManifestLine[] = [];
  const unresolved: UnresolvedEntry[] = [];

  for (const record of input.records) {
    const association = associationsById.get(record.recordId);
    const matched = association?.matchedFileName;
    const line: ManifestLine = {
      sequenceLabel: record.sequenceLabel,
      strategy: association?.strategy ?? 'none',
      sourceFileName: record.sourceFileName,
    };

    if (matched === undefined) {
      unresolved.push({
        sequenceLabel: record.sequenceLabel,
        recordId: record.recordId,
        identifier: record.identifier,
        sourceFileName: record.sourceFileName,
      });
      lines.push(line);
      continue;
    }

    const upload = uploadsByName.get(matched);
    if (!upload) {
      throw new SequenceIntegrityError(
        `Row ${record.sequenceLabel} is associated with "${matched}", which is not in the upload set`,
        { sequenceLabel: record.sequenceLabel, fileName: matched },
      );
    }

    const entryName = `${record.sequenceLabel}${fileExtension(upload.fileName)}`;
    addEntry(entryName, upload.content);
    lines.push({ ...line, entryName });
  }

  const manifest = renderManifest({ ...header, spreadsheetFileName: config.spreadsheetFileName }, lines);
  addEntry(config.manifestFileName, manifest);

  const bytes = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });

  const diagnostics: Diagnostic[] = [];
  if (unresolved.length > 0) {
    const labels = unresolved.map((entry) => entry.sequenceLabel);
    diagnostics.push({
      code: 'MATCH-UNRESOLVED',
      message: `No scanned document for ${labels.length} record(s): ${labels.join(', ')}`,
      severity: 'warning',
      category: 'matching',
      source: PACKAGE_STEP_ID,
      context: { labels },
    });
  }

  logger.info('Archive assembled', {
    entries: entries.length,
    unresolved: unresolved.length,
  });

  return { bytes, entries, unresolved, diagnostics, manifest };
}

/**
 * Associations keyed by record id; exactly one per sequenced record
 */
function indexAssociations(
  records: readonly SequencedRecord[],
  associations: readonly Association[],
): Map<string, Association> {
  const byId = new Map(associations.map((association) => [association.recordId, association]));
  const recordIds = new Set(records.map((record) => record.recordId));

  const stale = associations.filter((association) => !recordIds.has(association.recordId));
  const missing = records.filter((record) => !byId.has(record.recordId));
  if (stale.length > 0 || missing.length > 0 || byId.size !== associations.length) {
    throw new SequenceIntegrityError('Associations do not belong to the sequenced record set', {
      staleAssociations: stale.length,
      recordsWithoutAssociation: missing.length,
    });
  }

  return byId;
}
