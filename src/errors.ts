export type ErrorCode =
  | 'configuration'
  | 'invalid_argument'
  | 'rate_limit_exhausted'
  | 'endpoint_unavailable'
  | 'upstream_error'
  | 'network_error'
  | 'parse_error';

export abstract class OrbitCatalogError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid credentials/settings. Raised before any request goes out. */
export class ConfigurationError extends OrbitCatalogError {
  readonly code = 'configuration';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

export class InvalidArgumentError extends OrbitCatalogError {
  readonly code = 'invalid_argument';

  constructor(readonly argument: string, message: string) {
    super(`Invalid ${argument}: ${message}`);
  }
}

/**
 * Every retry on a 429 was consumed.
 *
 * `attempts` counts the initial request plus the retries; `totalWaitMs` is the
 * time spent in backoff, not counting normal pacing.
 */
export class RateLimitExhaustedError extends OrbitCatalogError {
  readonly code = 'rate_limit_exhausted';

  constructor(
    readonly endpoint: string,
    readonly attempts: number,
    readonly totalWaitMs: number,
    readonly requestsPerSecond: number
  ) {
    super(
      `Rate limit exceeded on ${endpoint} after ${attempts} attempts ` +
        `(${totalWaitMs} ms spent in backoff). The client is paced at ` +
        `${requestsPerSecond} request(s)/second; wait before sending more requests ` +
        `or lower the ceiling with setRateLimit() to match your subscription tier.`
    );
  }
}

/**
 * A tier-gated endpoint answered 404: the subscription does not include it.
 * Not the same thing as "no such satellite".
 */
export class EndpointUnavailableError extends OrbitCatalogError {
  readonly code = 'endpoint_unavailable';

  constructor(readonly endpoint: string) {
    super(
      `Endpoint ${endpoint} is not available for this API subscription (HTTP 404). ` +
        'Check that your plan includes it and that it is enabled in the provider dashboard.'
    );
  }
}

export class UpstreamError extends OrbitCatalogError {
  readonly code = 'upstream_error';

  constructor(
    readonly endpoint: string,
    readonly status: number,
    readonly body: string,
    message?: string
  ) {
    super(message ?? `HTTP ${status} from ${endpoint}: ${body.slice(0, 200)}`);
  }
}

export class NetworkError extends OrbitCatalogError {
  readonly code = 'network_error';

  constructor(
    readonly endpoint: string,
    readonly timedOut: boolean,
    cause: unknown
  ) {
    super(
      timedOut
        ? `Request to ${endpoint} timed out`
        : `Request to ${endpoint} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

/** A raw record that could not become an OrbitalObject. Reported, never thrown by batch parsing. */
export class ParseError extends OrbitCatalogError {
  readonly code = 'parse_error';

  constructor(
    readonly reason: string,
    readonly record: unknown,
    readonly index?: number
  ) {
    super(index === undefined ? `Unparseable record: ${reason}` : `Unparseable record #${index}: ${reason}`);
  }
}

/** Returned, not thrown, when a lookup exhausts its search bound. */
export interface NotFound {
  status: 'not-found';
  pagesScanned: number;
}

export function isOrbitCatalogError(err: unknown): err is OrbitCatalogError {
  return err instanceof OrbitCatalogError;
}

export function httpStatusFor(err: unknown): number {
  if (!isOrbitCatalogError(err)) {
    return 500;
  }
  switch (err.code) {
    case 'invalid_argument':
      return 400;
    case 'endpoint_unavailable':
      return 404;
    case 'rate_limit_exhausted':
      return 429;
    case 'upstream_error':
    case 'parse_error':
      return 502;
    case 'network_error':
      return err instanceof NetworkError && err.timedOut ? 504 : 502;
    case 'configuration':
      return 500;
  }
}
