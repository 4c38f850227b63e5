/**
 * Submission review/build session.
 *
 * Holds the parsed records and uploaded scans for one operator session,
 * applies review edits, and runs the two build actions. Every mutation bumps
 * the revision; associations and labels are cached per revision, so a build
 * always reflects the current record set and never a stale labelling.
 *
 * The spreadsheet inside an archive is rendered from the same sequence as
 * the renamed scans.
 */

import type {
  Association,
  BuildConfig,
  CanonicalInvoiceRecord,
  Diagnostic,
  RecordEdit,
  SequencedRecord,
  SubmissionMetadata,
  UnresolvedEntry,
  UploadedFile,
} from '@cfdi-bundle/contracts';
import {
  MissingUploadSetError,
  SubmissionError,
  ValidationError,
  buildDiagnosticsSummary,
  createSafeLogger,
  defaultIdGenerator,
  formatDiagnosticLines,
  generateSessionId,
  isNegative,
  isValidDecimalAmount,
  type DiagnosticsSummary,
  type IdGenerator,
  type Logger,
} from '@cfdi-bundle/shared';
import { createInvoiceParser, parseIssueDate, type InvoiceParser, type ParseOutcome } from '@cfdi-bundle/steps-parser';
import { matchDocuments, type MatchStrategyFn } from '@cfdi-bundle/steps-matcher';
import { buildSpreadsheet } from '@cfdi-bundle/steps-spreadsheet';
import { assemblePackage } from '@cfdi-bundle/steps-package';
import { defaultClock, type Clock } from '../context/clock.js';
import {
  buildEffectiveConfig,
  type BuildOverrides,
  type EffectiveConfig,
  type OperatorConfig,
} from '../config/effective-config.js';
import { NoopEventHooks, type BuildAction, type SessionEventHooks } from '../events/hooks.js';
import { sequenceRecords } from '../sequencer/sequencer.js';

export interface SessionInit {
  /** Operator configuration merged over the defaults */
  config?: OperatorConfig;
  /** Build-level overrides (output naming) */
  overrides?: BuildOverrides;
  /**
   * Defaults to a PII-scrubbing logger at warn level
   */
  logger?: Logger;
  hooks?: SessionEventHooks;
  clock?: Clock;
  idGenerator?: IdGenerator;
  /** Matching strategies in priority order */
  matchStrategies?: readonly MatchStrategyFn[];
}

/**
 * Consolidated findings of one build action
 */
export interface BuildReport {
  buildId: string;
  action: BuildAction;
  revision: number;
  configHash: string;
  diagnostics: Diagnostic[];
  summary: DiagnosticsSummary;
  /** One line per diagnostic, errors first */
  lines: string[];
}

export interface SpreadsheetBuild {
  fileName: string;
  bytes: Uint8Array;
  records: SequencedRecord[];
  report: BuildReport;
}

export interface PackageBuild {
  bytes: Uint8Array;
  /** Archive entry names in write order */
  entries: string[];
  records: SequencedRecord[];
  associations: Association[];
  unresolved: UnresolvedEntry[];
  manifest: string;
  report: BuildReport;
}

interface RevisionCache {
  revision: number;
  associations: Association[];
  matchDiagnostics: Diagnostic[];
  sequenced: SequencedRecord[];
}

/**
 * Session state a build reads, captured before its first await
 */
interface BuildSnapshot {
  revision: number;
  sequenced: SequencedRecord[];
  associations: Association[];
  matchDiagnostics: Diagnostic[];
  parseDiagnostics: Diagnostic[];
  uploads: UploadedFile[];
}

interface BuildOutcome<T> {
  diagnostics: Diagnostic[];
  unresolvedCount: number;
  /** Assemble the action's result once its report exists */
  complete(report: BuildReport): T;
}

export class SubmissionSession {
  readonly sessionId: string;
  readonly effectiveConfig: EffectiveConfig;

  private readonly logger: Logger;
  private readonly hooks: SessionEventHooks;
  private readonly clock: Clock;
  private readonly idGenerator: IdGenerator;
  private readonly parser: InvoiceParser;
  private readonly matchStrategies: readonly MatchStrategyFn[] | undefined;

  private records: CanonicalInvoiceRecord[] = [];
  private readonly parseDiagnostics = new Map<string, Diagnostic[]>();
  private uploads: UploadedFile[] = [];
  private revisionCounter = 0;
  private cache: RevisionCache | undefined;

  /**
   * @throws ConfigurationError when the merged configuration is unusable
   */
  constructor(init: SessionInit = {}) {
    this.idGenerator = init.idGenerator ?? defaultIdGenerator;
    this.sessionId = generateSessionId(this.idGenerator);
    this.effectiveConfig = buildEffectiveConfig(init.config, init.overrides);
    this.logger = init.logger ?? createSafeLogger({ sessionId: this.sessionId, level: 'warn' });
    this.hooks = init.hooks ?? new NoopEventHooks();
    this.clock = init.clock ?? defaultClock;
    this.matchStrategies = init.matchStrategies;

    const { defaultCurrency, defaultExpenseCategory, maxDocumentSize } = this.config;
    this.parser = createInvoiceParser(
      { defaultCurrency, defaultExpenseCategory, maxDocumentSize },
      { logger: this.logger, idGenerator: this.idGenerator },
    );
  }

  get config(): BuildConfig {
    return this.effectiveConfig.config;
  }

  /** Incremented on every mutation */
  get revision(): number {
    return this.revisionCounter;
  }

  /**
   * Parse structured documents and add them in upload order. Failed
   * documents are added too, with parseError set.
   */
  addInvoices(files: readonly UploadedFile[]): ParseOutcome[] {
    const outcomes = this.parser.parseBatch(files);
    for (const { record, diagnostics } of outcomes) {
      this.records.push(record);
      this.parseDiagnostics.set(record.recordId, diagnostics);
    }
    this.touch();
    return outcomes;
  }

  addScannedDocuments(files: readonly UploadedFile[]): void {
    this.uploads.push(...files);
    this.touch();
  }

  replaceScannedDocuments(files: readonly UploadedFile[]): void {
    this.uploads = [...files];
    this.touch();
  }

  /**
   * Records in the order they were added
   */
  listRecords(): readonly CanonicalInvoiceRecord[] {
    return [...this.records];
  }

  listScannedDocuments(): readonly string[] {
    return this.uploads.map((upload) => upload.fileName);
  }

  /**
   * Apply a review edit.
   *
   * @throws ValidationError for an unknown record or a value outside the configuration
   */
  updateRecord(recordId: string, edit: RecordEdit): CanonicalInvoiceRecord {
    const index = this.indexOf(recordId);
    this.validateEdit(edit);

    const current = this.records[index];
    if (!current) {
      throw new ValidationError(`Unknown record: ${recordId}`, 'recordId');
    }
    const updated: CanonicalInvoiceRecord = { ...current, ...edit };
    this.records[index] = updated;
    this.touch();
    this.logger.debug('Record updated', { fields: Object.keys(edit) });
    return updated;
  }

  /**
   * @throws ValidationError for an unknown record
   */
  removeRecord(recordId: string): void {
    this.records.splice(this.indexOf(recordId), 1);
    this.parseDiagnostics.delete(recordId);
    this.touch();
  }

  /**
   * Associations for the current revision, one per record in record order
   */
  associations(): Association[] {
    return [...this.current().associations];
  }

  /**
   * Records in submission order with labels for the current revision
   */
  sequence(): SequencedRecord[] {
    return [...this.current().sequenced];
  }

  /**
   * Build the spreadsheet on its own. Available without any scans.
   */
  async buildSpreadsheet(metadata: SubmissionMetadata): Promise<SpreadsheetBuild> {
    return this.runBuild('spreadsheet', async ({ sequenced, parseDiagnostics }) => {
      const sheet = await buildSpreadsheet(sequenced, metadata, this.config, { logger: this.logger });
      const diagnostics = [...parseDiagnostics, ...sheet.diagnostics];

      return {
        diagnostics,
        unresolvedCount: 0,
        complete: (report) => ({
          fileName: this.config.spreadsheetFileName,
          bytes: sheet.bytes,
          records: sequenced,
          report,
        }),
      };
    });
  }

  /**
   * Build the archive: spreadsheet, renamed scans and manifest.
   *
   * @throws MissingUploadSetError when no scans were uploaded
   */
  async buildPackage(metadata: SubmissionMetadata): Promise<PackageBuild> {
    return this.runBuild('package', async ({ sequenced, associations, matchDiagnostics, parseDiagnostics, uploads }) => {
      if (uploads.length === 0) {
        throw new MissingUploadSetError();
      }

      const sheet = await buildSpreadsheet(sequenced, metadata, this.config, { logger: this.logger });
      const archive = await assemblePackage(
        { records: sequenced, associations, uploads, spreadsheet: sheet.bytes },
        {
          generatedAt: this.clock.now().toISOString(),
          sessionId: this.sessionId,
          requestedPeriod: metadata.requestedPeriod,
          configHash: this.effectiveConfig.configHash,
        },
        this.config,
        { logger: this.logger },
      );

      const diagnostics = [
        ...parseDiagnostics,
        ...matchDiagnostics,
        ...sheet.diagnostics,
        ...archive.diagnostics,
      ];

      return {
        diagnostics,
        unresolvedCount: archive.unresolved.length,
        complete: (report) => ({
          bytes: archive.bytes,
          entries: archive.entries,
          records: sequenced,
          associations,
          unresolved: archive.unresolved,
          manifest: archive.manifest,
          report,
        }),
      };
    });
  }

  /**
   * Run a build action between start/complete events. Failures are reported
   * to the hooks and rethrown. The work reads a snapshot taken before the
   * first await; edits made while it runs land in the next build.
   */
  private async runBuild<T>(
    action: BuildAction,
    work: (snapshot: BuildSnapshot) => Promise<BuildOutcome<T>>,
  ): Promise<T> {
    const snapshot = this.snapshot();
    const { revision } = snapshot;
    const buildId = this.idGenerator.generate('bld');
    const startedAt = this.clock.now();

    this.logger.info('Build started', {
      buildId,
      action,
      records: snapshot.sequenced.length,
      uploads: snapshot.uploads.length,
    });
    await this.hooks.onBuildStart?.({
      sessionId: this.sessionId,
      buildId,
      action,
      timestamp: startedAt.toISOString(),
      revision,
      recordCount: snapshot.sequenced.length,
      uploadCount: snapshot.uploads.length,
    });

    let outcome: BuildOutcome<T>;
    try {
      outcome = await work(snapshot);
    } catch (error) {
      const errorCode = error instanceof SubmissionError ? error.code : 'INTERNAL_ERROR';
      this.logger.warn('Build failed', { buildId, action, errorCode });
      await this.hooks.onBuildComplete?.({
        sessionId: this.sessionId,
        buildId,
        action,
        timestamp: this.clock.now().toISOString(),
        durationMs: this.clock.now().getTime() - startedAt.getTime(),
        status: 'failed',
        diagnosticCount: 0,
        unresolvedCount: 0,
        errorCode,
      });
      await this.hooks.flush?.();
      throw error;
    }

    const report: BuildReport = {
      buildId,
      action,
      revision,
      configHash: this.effectiveConfig.configHash,
      diagnostics: outcome.diagnostics,
      summary: buildDiagnosticsSummary(outcome.diagnostics),
      lines: formatDiagnosticLines(outcome.diagnostics),
    };

    const finishedAt = this.clock.now();
    this.logger.info('Build finished', {
      buildId,
      action,
      diagnostics: outcome.diagnostics.length,
      unresolved: outcome.unresolvedCount,
    });
    await this.hooks.onBuildComplete?.({
      sessionId: this.sessionId,
      buildId,
      action,
      timestamp: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      status: 'success',
      diagnosticCount: outcome.diagnostics.length,
      unresolvedCount: outcome.unresolvedCount,
    });
    await this.hooks.flush?.();

    return outcome.complete(report);
  }

  private snapshot(): BuildSnapshot {
    const { revision, sequenced, associations, matchDiagnostics } = this.current();
    return {
      revision,
      sequenced,
      associations,
      matchDiagnostics,
      parseDiagnostics: this.collectParseDiagnostics(sequenced),
      uploads: [...this.uploads],
    };
  }

  private current(): RevisionCache {
    if (this.cache?.revision === this.revisionCounter) {
      return this.cache;
    }

    const options = this.matchStrategies ? { strategies: this.matchStrategies } : {};
    const match = matchDocuments(
      this.records,
      this.uploads.map((upload) => upload.fileName),
      options,
    );
    this.cache = {
      revision: this.revisionCounter,
      associations: match.associations,
      matchDiagnostics: match.diagnostics,
      sequenced: sequenceRecords(this.records, this.config.sequenceLabelWidth),
    };
    return this.cache;
  }

  /**
   * Parse findings in submission order, located at the sequence label
   */
  private collectParseDiagnostics(sequenced: readonly SequencedRecord[]): Diagnostic[] {
    return sequenced.flatMap((record) =>
      (this.parseDiagnostics.get(record.recordId) ?? []).map((diagnostic) => ({
        ...diagnostic,
        location: record.sequenceLabel,
        context: { ...diagnostic.context, sourceFileName: record.sourceFileName },
      })),
    );
  }

  private indexOf(recordId: string): number {
    const index = this.records.findIndex((record) => record.recordId === recordId);
    if (index < 0) {
      throw new ValidationError(`Unknown record: ${recordId}`, 'recordId');
    }
    return index;
  }

  private validateEdit(edit: RecordEdit): void {
    const { expenseCategories, currencies } = this.config;

    if (edit.expenseCategory !== undefined && !expenseCategories.includes(edit.expenseCategory)) {
      throw new ValidationError(
        `Expense category must be one of: ${expenseCategories.join(', ')}`,
        'expenseCategory',
      );
    }
    if (edit.currencyCode !== undefined && !currencies.includes(edit.currencyCode)) {
      throw new ValidationError(`Currency must be one of: ${currencies.join(', ')}`, 'currencyCode');
    }
    if (edit.issueDate !== undefined && parseIssueDate(edit.issueDate) !== edit.issueDate) {
      throw new ValidationError('Issue date must be a calendar date (YYYY-MM-DD)', 'issueDate');
    }
    if (
      edit.taxAmount !== undefined &&
      (!isValidDecimalAmount(edit.taxAmount) || isNegative(edit.taxAmount))
    ) {
      throw new ValidationError('Tax amount must be a non-negative decimal', 'taxAmount');
    }
    if (edit.totalAmount !== undefined && !isValidDecimalAmount(edit.totalAmount)) {
      throw new ValidationError('Total amount must be a decimal', 'totalAmount');
    }
  }

  private touch(): void {
    this.revisionCounter++;
  }
}
