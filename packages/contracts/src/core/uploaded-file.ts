/**
 * A file handed to the pipeline, read fully into memory
 */
export interface UploadedFile {
  /** Name as uploaded (may include a client-side path) */
  fileName: string;

  /** Raw bytes */
  content: Uint8Array;
}
