// ============ Error Taxonomy ============

/**
 * Base class for every error the clients raise. Catch this to handle all
 * PaperHub failures in one place; check `name` or `instanceof` to branch.
 */
export class PaperHubError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PaperHubError';
  }
}

/** Bad input shape. Raised before any request is made and never retried. */
export class ValidationError extends PaperHubError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Transport failure that outlived the retry budget. */
export class NetworkError extends PaperHubError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'NetworkError';
  }
}

/** Non-2xx HTTP response. */
export class ApiError extends PaperHubError {
  constructor(
    public readonly status: number,
    public readonly body: string = ''
  ) {
    super(`API error ${status}${body ? `: ${body.slice(0, 500)}` : ''}`);
    this.name = 'ApiError';
  }
}

export interface EntryParseFailure {
  index: number;
  message: string;
}

/**
 * Response could not be decoded, or at least one entry in it was malformed.
 * A batch with any failed entry fails as a whole.
 */
export class ParseError extends PaperHubError {
  public readonly failures: EntryParseFailure[];
  public readonly totalCount: number;

  constructor(message: string, failures: EntryParseFailure[] = [], totalCount = 0) {
    super(message);
    this.name = 'ParseError';
    this.failures = failures;
    this.totalCount = totalCount;
  }

  get failureCount(): number {
    return this.failures.length;
  }

  static fromFailures(failures: EntryParseFailure[], totalCount: number): ParseError {
    const first = failures[0];
    const detail = first ? ` (first at index ${first.index}): ${first.message}` : '';
    return new ParseError(
      `${failures.length} of ${totalCount} entries failed to parse${detail}`,
      failures,
      totalCount
    );
  }
}

export class DownloadError extends PaperHubError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DownloadError';
  }
}
