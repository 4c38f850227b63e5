/**
 * How a record was paired with a scanned document
 */
export type MatchStrategy = 'normalized-key' | 'identifier-substring' | 'none';

/**
 * Result of matching one invoice record against the uploaded scans
 */
export interface Association {
  recordId: string;

  /**
   * Uploaded scan file name, absent when strategy is 'none'
   */
  matchedFileName?: string;

  strategy: MatchStrategy;
}

/**
 * Record that could not be paired with a scanned document at packaging time
 */
export interface UnresolvedEntry {
  sequenceLabel: string;
  recordId: string;
  identifier: string;
  sourceFileName: string;
}
