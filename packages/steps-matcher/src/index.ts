/**
 * @cfdi-bundle/steps-matcher
 *
 * File name normalisation and invoice-to-scan matching.
 *
 * @packageDocumentation
 */

export { normalizeFileName, fileExtension } from './normalize-filename.js';
export { matchDocuments, MATCHER_STEP_ID } from './match-documents.js';
export type { MatchOptions, MatchResult } from './match-documents.js';
export {
  normalizedKeyStrategy,
  identifierSubstringStrategy,
  DEFAULT_MATCH_STRATEGIES,
} from './strategies.js';
export type { MatchableRecord, MatchHit, MatchStrategyFn, ScanCandidate } from './strategies.js';
