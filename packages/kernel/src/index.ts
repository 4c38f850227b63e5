/**
 * @cfdi-bundle/kernel
 *
 * Sequencing, build configuration and the review/build session that ties
 * the parser, matcher, spreadsheet and package steps together.
 *
 * @packageDocumentation
 */

export { SubmissionSession } from './session/submission-session.js';
export type {
  SessionInit,
  BuildReport,
  SpreadsheetBuild,
  PackageBuild,
} from './session/submission-session.js';

export { sequenceRecords, DEFAULT_SEQUENCE_LABEL_WIDTH } from './sequencer/sequencer.js';

// Determinism support: injectable clock for testing/audits
export { defaultClock } from './context/clock.js';
export type { Clock } from './context/clock.js';

export {
  buildEffectiveConfig,
  validateBuildConfig,
  DEFAULT_BUILD_CONFIG,
} from './config/effective-config.js';
export type { OperatorConfig, BuildOverrides, EffectiveConfig } from './config/effective-config.js';

// Event Hooks
export { CompositeEventHooks, NoopEventHooks, ConsoleEventHooks } from './events/hooks.js';
export type {
  SessionEventHooks,
  BuildAction,
  BuildStartEvent,
  BuildCompleteEvent,
} from './events/hooks.js';

// Re-export commonly used types
export type {
  BuildConfig,
  CanonicalInvoiceRecord,
  SequencedRecord,
  SubmissionMetadata,
  UploadedFile,
} from '@cfdi-bundle/contracts';
