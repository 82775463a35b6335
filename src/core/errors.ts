export type ErrorResponse<TDetails = unknown> = {
  error: string;
  code?: string;
  details?: TDetails;
};

export type HttpErrorOptions<TDetails = unknown> = {
  code?: string;
  details?: TDetails;
};

/**
 * Error carrying an HTTP status, thrown by handlers to short-circuit
 * a request that runs through the fetch adapter.
 */
export class HttpError<TDetails = unknown> extends Error {
  public readonly status: number;
  public readonly code: string | undefined;
  public readonly details: TDetails | undefined;

  constructor(status: number, message: string, options: HttpErrorOptions<TDetails> = {}) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = options.code;
    this.details = options.details;
  }
}

/**
 * Route misconfiguration surfaced while invoking a matched handler:
 * unusable handler shape, unknown controller type or missing controller method.
 */
export class HandlerError extends Error {
  public readonly code = "INVALID_HANDLER";

  constructor(message: string) {
    super(message);
    this.name = "HandlerError";
  }
}

/** Raised at registration when a route path cannot be compiled. */
export class RouteError extends Error {
  public readonly code = "INVALID_ROUTE";
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RouteError";
    this.path = path;
  }
}
