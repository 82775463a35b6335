import {
  HTTP_METHODS,
  isHttpMethod,
  type DispatchInput,
  type HttpMethod,
  type MatchResult,
  type NotFoundHandler,
  type OverrideSource,
  type Route,
  type RouteParams,
  type RouteResponse,
  type RouteTable,
} from "../types/index.js";
import { invokeHandler, type Handler } from "./handler.js";
import { resolveRouterOptions, type ResolvedRouterOptions, type RouterOptions } from "./options.js";
import { applyPrefix, compilePattern, extractPath } from "./pattern.js";

export const NOT_FOUND_BODY = JSON.stringify({ error: "Route not found" });

/** Default outcome when no route matches and no not-found handler is set. */
export function notFoundResponse(): RouteResponse {
  return {
    status: 404,
    headers: { "content-type": "application/json" },
    body: NOT_FOUND_BODY,
  };
}

function matchRoute(route: Route, path: string): RouteParams | null {
  const result = route.pattern.regex.exec(path);
  if (!result) {
    return null;
  }

  const groups: Record<string, string> = result.groups ?? {};
  return Object.fromEntries(route.pattern.paramNames.map((name) => [name, groups[name] ?? ""]));
}

/**
 * In-memory method/path router.
 *
 * Resolution strategy:
 * - routes are kept per method in registration order
 * - the first route whose pattern matches the whole path wins
 */
export class Router {
  private routes: { [M in HttpMethod]: Route[] } = {
    GET: [],
    POST: [],
    PUT: [],
    PATCH: [],
    DELETE: [],
  };
  private groups: string[] = [];
  private notFoundHandler: NotFoundHandler | undefined;
  private options: ResolvedRouterOptions;

  constructor(options: RouterOptions = {}) {
    this.options = resolveRouterOptions(options);
  }

  get(path: string, handler: Handler): this {
    return this.register("GET", path, handler);
  }

  post(path: string, handler: Handler): this {
    return this.register("POST", path, handler);
  }

  put(path: string, handler: Handler): this {
    return this.register("PUT", path, handler);
  }

  patch(path: string, handler: Handler): this {
    return this.register("PATCH", path, handler);
  }

  delete(path: string, handler: Handler): this {
    return this.register("DELETE", path, handler);
  }

  /** Registers the handler separately under every supported method. */
  any(path: string, handler: Handler): this {
    for (const method of HTTP_METHODS) {
      this.register(method, path, handler);
    }
    return this;
  }

  /**
   * Registers everything `callback` declares under `prefix`.
   * The prefix is removed again even if the callback throws.
   */
  group(prefix: string, callback: (router: this) => void): this {
    this.groups.push(prefix);
    try {
      callback(this);
    } finally {
      this.groups.pop();
    }
    return this;
  }

  setNotFoundHandler(handler: NotFoundHandler): this {
    this.notFoundHandler = handler;
    return this;
  }

  /** Compiles the (prefixed) path and appends the route to its method's list. */
  register(method: HttpMethod, path: string, handler: Handler): this {
    const originalPath = applyPrefix(this.groups, path);
    const pattern = compilePattern(originalPath, {
      escapeLiterals: this.options.escapeLiterals,
    });

    this.routes[method].push(Object.freeze({ method, originalPath, pattern, handler }));
    return this;
  }

  /** Snapshot of the route table, for introspection and debugging. */
  getRoutes(): RouteTable {
    return {
      GET: [...this.routes.GET],
      POST: [...this.routes.POST],
      PUT: [...this.routes.PUT],
      PATCH: [...this.routes.PATCH],
      DELETE: [...this.routes.DELETE],
    };
  }

  /** Method used for matching once the POST override field is applied (ASCII upper-cased). */
  resolveMethod(method: string, override?: OverrideSource): string {
    if (method !== "POST" || !this.options.methodOverride || override === undefined) {
      return method;
    }

    const value = typeof override === "function" ? override() : override;
    return value === undefined ? method : value.replace(/[a-z]/g, (letter) => letter.toUpperCase());
  }

  /** Finds the first registered route matching the request, without invoking it. */
  match(input: DispatchInput): MatchResult {
    const method = this.resolveMethod(input.method, input.override);
    if (!isHttpMethod(method)) {
      return { matched: false };
    }

    const path = extractPath(input.path);
    for (const route of this.routes[method]) {
      const params = matchRoute(route, path);
      if (params) {
        return { matched: true, route, handler: route.handler, params };
      }
    }

    return { matched: false };
  }

  /**
   * Runs the outcome of `match`: the matched handler with its parameters,
   * or the not-found handler / default not-found response.
   */
  handle(result: MatchResult): unknown {
    if (!result.matched) {
      return this.notFoundHandler ? this.notFoundHandler() : notFoundResponse();
    }

    return invokeHandler(result.handler, result.params, this.options.controllers);
  }

  dispatch(input: DispatchInput): unknown {
    return this.handle(this.match(input));
  }
}
