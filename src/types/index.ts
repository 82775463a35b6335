import type { Handler, RouteCallback } from "../core/handler.js";

export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

/**
 * Anchored matcher derived from a route path.
 * `paramNames` lists placeholders in the order they appear in the path.
 */
export type CompiledPattern = {
  readonly source: string;
  readonly regex: RegExp;
  readonly paramNames: readonly string[];
};

export type Route = {
  readonly method: HttpMethod;
  readonly originalPath: string;
  readonly pattern: CompiledPattern;
  readonly handler: Handler;
};

export type RouteTable = Record<HttpMethod, readonly Route[]>;

export type RouteParams = Record<string, string>;

export type OverrideSource = string | (() => string | undefined);

export type DispatchInput = {
  method: string;
  path: string;
  /** Submitted method-override field, consulted only for POST. */
  override?: OverrideSource | undefined;
};

export type MatchResult =
  | { matched: true; route: Route; handler: Handler; params: RouteParams }
  | { matched: false };

/** Response data handed to whatever renders the HTTP response. */
export type RouteResponse = {
  status: number;
  headers: Record<string, string>;
  body: string;
};

export type NotFoundHandler = RouteCallback;
