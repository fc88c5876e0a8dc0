/**
 * Base class for every error raised by the client.
 */
export class MentionClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MentionClientError';
  }
}

export interface FieldIssue {
  /** Argument name as the caller supplied it, e.g. `before_date` */
  field: string;
  message: string;
}

/**
 * Raised while building a request, before anything is sent. Collects every
 * failing field of one build.
 */
export class ValidationError extends MentionClientError {
  readonly issues: readonly FieldIssue[];

  constructor(issues: readonly FieldIssue[]) {
    super(`Invalid arguments: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export interface TransportErrorDetails {
  method: string;
  url: string;
  status?: number;
  statusText?: string;
  body?: string;
  cause?: unknown;
}

/**
 * Raised for a non-2xx response, a network failure (no `status`) or a 2xx
 * response whose body is not valid JSON.
 */
export class TransportError extends MentionClientError {
  readonly method: string;
  readonly url: string;
  readonly status: number | undefined;
  readonly statusText: string | undefined;
  readonly body: string | undefined;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TransportError';
    this.method = details.method;
    this.url = details.url;
    this.status = details.status;
    this.statusText = details.statusText;
    this.body = details.body;
  }
}
