/**
 * Route errors raised while building or fetching route geometry
 */

export enum RouteErrorCode {
  ROUTE_MALFORMED = 'ROUTE_MALFORMED',
  ROUTE_INVALID = 'ROUTE_INVALID',
  ROUTE_FETCH_FAILED = 'ROUTE_FETCH_FAILED'
}

export class RouteError extends Error {
  readonly code: RouteErrorCode;

  constructor(code: RouteErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RouteError';
    this.code = code;
  }

  /** Geometry breaks an invariant (lengths, ordering, indices) */
  static malformed(detail: string): RouteError {
    return new RouteError(RouteErrorCode.ROUTE_MALFORMED, `Malformed route geometry: ${detail}`);
  }

  /** A route document does not have the expected shape */
  static invalid(detail: string): RouteError {
    return new RouteError(RouteErrorCode.ROUTE_INVALID, `Invalid route document: ${detail}`);
  }

  static fetchFailed(source: string, cause?: unknown): RouteError {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    return new RouteError(RouteErrorCode.ROUTE_FETCH_FAILED, `Failed to fetch route from ${source}${reason}`, cause);
  }
}

export const isRouteError = (error: unknown): error is RouteError => error instanceof RouteError;
