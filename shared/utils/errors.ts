/**
 * Error taxonomy shared by the CAISO client and the API gateway.
 *
 * Usage errors (bad market, bad time string) are raised before any request is
 * made. Upstream errors describe what came back from CAISO.
 */

export class CaisoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request never produced an HTTP response (DNS, socket, TLS). */
export class NetworkError extends CaisoError {
  constructor(readonly url: string, cause: unknown) {
    super(`Request to ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class HttpStatusError extends CaisoError {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly attempts = 1
  ) {
    super(`HTTP ${status} from ${url} after ${attempts} attempt${attempts > 1 ? 's' : ''}`);
  }
}

export class MalformedArchiveError extends CaisoError {}

export class SchemaError extends CaisoError {
  constructor(readonly missingColumns: string[], readonly availableColumns: string[]) {
    super(`Missing expected columns: ${missingColumns.join(', ')} (found: ${availableColumns.join(', ') || 'none'})`);
  }
}

export class UnsupportedMarketError extends CaisoError {
  constructor(readonly market: string) {
    super(`LMP market is not supported: ${market}`);
  }
}

export class FormatError extends CaisoError {}

export class InvalidTimeError extends CaisoError {}

export function isUsageError(error: unknown): boolean {
  return (
    error instanceof UnsupportedMarketError ||
    error instanceof FormatError ||
    error instanceof InvalidTimeError
  );
}

export function isUpstreamError(error: unknown): boolean {
  return (
    error instanceof NetworkError ||
    error instanceof HttpStatusError ||
    error instanceof MalformedArchiveError ||
    error instanceof SchemaError
  );
}
