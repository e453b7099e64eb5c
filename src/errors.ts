/** The source database could not be opened or queried. Fatal for the run. */
export class SourceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Delivery to the remote service failed.
 *
 * `status` is absent when the request never got a response (DNS, refused
 * connection, TLS). The watermark is left untouched, so the next run
 * resubmits the same highlights.
 */
export class DeliveryError extends Error {
  readonly status?: number;
  readonly responseBody?: string;

  constructor(message: string, details: { status?: number; responseBody?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = 'DeliveryError';
    this.status = details.status;
    this.responseBody = details.responseBody;
  }
}

/** Missing credential or invalid environment. Checked before any I/O. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type SyncError = SourceUnavailableError | DeliveryError | ConfigurationError;

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SourceUnavailableError
    || err instanceof DeliveryError
    || err instanceof ConfigurationError;
}

/** One-line diagnostic, including status for delivery failures */
export function describeError(err: unknown): string {
  if (err instanceof DeliveryError) {
    const status = err.status !== undefined ? ` (status ${err.status})` : '';
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.name}${status}: ${err.message}${cause}`;
  }
  if (err instanceof SourceUnavailableError) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.name}: ${err.message}${cause}`;
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
