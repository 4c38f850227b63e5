/**
 * Free-text header data printed above the submission grid
 */
export interface SubmissionMetadata {
  /**
   * Requested period label, computed by the caller
   * @example "March 2024"
   */
  requestedPeriod: string;

  claimantName: string;

  contactEmail: string;

  /**
   * Last four characters of the claimant's personal identifier
   */
  personalIdLast4: string;
}
