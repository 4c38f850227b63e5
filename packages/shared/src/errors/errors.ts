/**
 * Base error class for the submission bundle pipeline
 */
export class SubmissionError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SubmissionError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error thrown when a review edit is rejected
 */
export class ValidationError extends SubmissionError {
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', field === undefined ? context : { ...context, field });
    this.name = 'ValidationError';
    if (field !== undefined) {
      this.field = field;
    }
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends SubmissionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when an archive is requested but no scanned documents were uploaded.
 * Building the spreadsheet alone stays available.
 */
export class MissingUploadSetError extends SubmissionError {
  constructor() {
    super(
      'No scanned documents were uploaded; upload the PDF copies before building the archive',
      'MISSING_UPLOAD_SET',
    );
    this.name = 'MissingUploadSetError';
  }
}

/**
 * Error thrown when the spreadsheet and archive would disagree on labels
 */
export class SequenceIntegrityError extends SubmissionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SEQUENCE_INTEGRITY', context);
    this.name = 'SequenceIntegrityError';
  }
}
