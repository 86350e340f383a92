/**
 * Error taxonomy for a sweep run
 *
 * ConfigurationError and RetrievalError are fatal. ReconciliationError is
 * caught per document and counted. A validator rejecting a candidate is not
 * an error at all: the candidate is dropped.
 */

export class PiiSweepError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad detector definition, rule id, field map or run configuration.
 * Raised before any network call.
 */
export class ConfigurationError extends PiiSweepError {
  readonly detector?: string;

  constructor(message: string, options?: { detector?: string; cause?: unknown }) {
    super(
      options?.detector ? `Detector "${options.detector}": ${message}` : message,
      { cause: options?.cause },
    );
    this.detector = options?.detector;
  }
}

/**
 * A page of the scroll could not be fetched after all retries.
 */
export class RetrievalError extends PiiSweepError {
  readonly index: string;
  readonly page: number;

  constructor(index: string, page: number, cause: unknown) {
    super(
      `Failed to retrieve page ${page} of index "${index}": ${describeError(cause)}`,
      { cause },
    );
    this.index = index;
    this.page = page;
  }
}

/**
 * One document's update could not be applied.
 */
export class ReconciliationError extends PiiSweepError {
  readonly documentId: string;

  constructor(documentId: string, reason: string, options?: { cause?: unknown }) {
    super(`Update failed for document "${documentId}": ${reason}`, options);
    this.documentId = documentId;
  }
}

/**
 * HTTP-level failure talking to the document store.
 * `status` is 0 for network errors and timeouts.
 */
export class StoreRequestError extends PiiSweepError {
  readonly status: number;
  readonly retryable: boolean;

  constructor(message: string, status: number, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
    this.retryable = retryable;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
