import { z } from "zod";
import type {
  NotFoundHandler,
  Route,
  RouteParams,
  RouteTable,
} from "../types/index.js";
import { HandlerError, HttpError, type ErrorResponse } from "./errors.js";
import type { Handler } from "./handler.js";
import { resolveOverrideField, type RouterOptions } from "./options.js";
import { extractPath } from "./pattern.js";
import { Router } from "./router.js";

export type RequestEvent = {
  request: Request;
  method: string;
  /** Method used for matching after the override field is applied. */
  effectiveMethod: string;
  path: string;
  startedAt: number;
  route?: Route;
  params?: RouteParams;
};

export type ResponseEvent = RequestEvent & {
  response: Response;
  durationMs: number;
};

export type ErrorEvent = RequestEvent & {
  error: unknown;
  durationMs: number;
};

export type AppHooks = {
  onRequest?: (event: RequestEvent) => void | Promise<void>;
  onResponse?: (event: ResponseEvent) => void | Promise<void>;
  onError?: (event: ErrorEvent) => void | Promise<void>;
};

export type AppOptions = RouterOptions & {
  /** Form field read from POST bodies as the method override. Defaults to `_method`. */
  overrideField?: string;
  hooks?: AppHooks;
};

type RequestTraceState = {
  request: Request;
  method: string;
  effectiveMethod: string;
  path: string;
  startedAt: number;
  route?: Route;
  params?: RouteParams;
};

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

const routeResponseSchema = z.object({
  status: z.number().int().min(200).max(599),
  headers: z.record(z.string(), z.string()),
  body: z.string(),
});

/**
 * Fetch API front for a Router.
 *
 * Responsibilities:
 * - read method, path and the override field from a Request
 * - dispatch through the owned router
 * - render handler results and errors as Responses
 * - report the request lifecycle to hooks
 */
export class App {
  readonly router: Router;
  private overrideField: string;
  private hooks: AppHooks;

  constructor(options: AppOptions = {}) {
    const { overrideField, hooks, ...routerOptions } = options;
    this.router = new Router(routerOptions);
    this.overrideField = resolveOverrideField(overrideField);
    this.hooks = hooks ?? {};
  }

  get(path: string, handler: Handler): this {
    this.router.get(path, handler);
    return this;
  }

  post(path: string, handler: Handler): this {
    this.router.post(path, handler);
    return this;
  }

  put(path: string, handler: Handler): this {
    this.router.put(path, handler);
    return this;
  }

  patch(path: string, handler: Handler): this {
    this.router.patch(path, handler);
    return this;
  }

  delete(path: string, handler: Handler): this {
    this.router.delete(path, handler);
    return this;
  }

  any(path: string, handler: Handler): this {
    this.router.any(path, handler);
    return this;
  }

  group(prefix: string, callback: (app: this) => void): this {
    this.router.group(prefix, () => callback(this));
    return this;
  }

  setNotFoundHandler(handler: NotFoundHandler): this {
    this.router.setNotFoundHandler(handler);
    return this;
  }

  getRoutes(): RouteTable {
    return this.router.getRoutes();
  }

  /** Handles a Fetch API request end-to-end and returns a response. */
  async fetch(request: Request): Promise<Response> {
    const trace: RequestTraceState = {
      request,
      method: request.method,
      effectiveMethod: request.method,
      path: extractPath(request.url),
      startedAt: Date.now(),
    };
    let requestReported = false;

    try {
      const override = await this.readOverride(request);
      trace.effectiveMethod = this.router.resolveMethod(request.method, override);
      requestReported = true;
      await this.invokeHook(this.hooks.onRequest, () => this.createRequestEvent(trace));

      const match = this.router.match({ method: request.method, path: trace.path, override });
      if (match.matched) {
        trace.route = match.route;
        trace.params = match.params;
      }

      const result: unknown = await this.router.handle(match);
      const response = this.toResponse(result);
      await this.invokeHook(this.hooks.onResponse, () => this.createResponseEvent(trace, response));
      return response;
    } catch (error: unknown) {
      if (!requestReported) {
        await this.invokeHook(this.hooks.onRequest, () => this.createRequestEvent(trace));
      }
      await this.invokeHook(this.hooks.onError, () => this.createErrorEvent(trace, error));

      const response = this.errorFromException(error);
      await this.invokeHook(this.hooks.onResponse, () => this.createResponseEvent(trace, response));
      return response;
    }
  }

  /** Reads the override field from urlencoded or multipart POST bodies, leaving the body unread. */
  private async readOverride(request: Request): Promise<string | undefined> {
    if (request.method !== "POST" || !request.body) {
      return undefined;
    }

    const contentType = (request.headers.get("content-type") || "").toLowerCase();

    if (contentType.includes("application/x-www-form-urlencoded")) {
      const form = new URLSearchParams(await request.clone().text());
      return form.get(this.overrideField) ?? undefined;
    }

    if (contentType.includes("multipart/form-data")) {
      const form = await request
        .clone()
        .formData()
        .catch(() => undefined);
      // An unparsable body carries no override field.
      const value = form?.get(this.overrideField);
      return typeof value === "string" ? value : undefined;
    }

    return undefined;
  }

  private toResponse(result: unknown): Response {
    if (result instanceof Response) {
      return result;
    }

    const routeResponse = routeResponseSchema.safeParse(result);
    if (routeResponse.success) {
      const { status, headers, body } = routeResponse.data;
      return new Response(NULL_BODY_STATUSES.has(status) ? null : body, { status, headers });
    }

    if (result === undefined || result === null) {
      return new Response(null, { status: 204 });
    }

    if (typeof result === "string") {
      return new Response(result, {
        status: 200,
        headers: { "content-type": "text/plain; charset=utf-8" },
      });
    }

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { "content-type": "application/json" },
    });
  }

  private createRequestEvent(trace: RequestTraceState): RequestEvent {
    const event: RequestEvent = {
      request: trace.request,
      method: trace.method,
      effectiveMethod: trace.effectiveMethod,
      path: trace.path,
      startedAt: trace.startedAt,
    };

    if (trace.route !== undefined) {
      event.route = trace.route;
    }
    if (trace.params !== undefined) {
      event.params = trace.params;
    }

    return event;
  }

  private createResponseEvent(trace: RequestTraceState, response: Response): ResponseEvent {
    return {
      ...this.createRequestEvent(trace),
      // Hooks may consume this copy.
      response: response.clone(),
      durationMs: Date.now() - trace.startedAt,
    };
  }

  private createErrorEvent(trace: RequestTraceState, error: unknown): ErrorEvent {
    return {
      ...this.createRequestEvent(trace),
      error,
      durationMs: Date.now() - trace.startedAt,
    };
  }

  private async invokeHook<TEvent>(
    hook: ((event: TEvent) => void | Promise<void>) | undefined,
    createEvent: () => TEvent
  ): Promise<void> {
    if (!hook) {
      return;
    }

    try {
      await hook(createEvent());
    } catch {
      // Hook failures must never break request processing.
    }
  }

  private errorFromException(error: unknown): Response {
    if (error instanceof HttpError) {
      const options: { code?: string; details?: unknown } = {};
      if (error.code !== undefined) {
        options.code = error.code;
      }
      if (error.details !== undefined) {
        options.details = error.details;
      }
      return this.errorResponse(error.status, error.message || "Internal Server Error", options);
    }

    if (error instanceof HandlerError) {
      return this.errorResponse(500, error.message, { code: error.code });
    }

    if (error instanceof Error) {
      return this.errorResponse(500, error.message || "Internal Server Error");
    }

    return this.errorResponse(500, "Internal Server Error");
  }

  private errorResponse(status: number, error: string, options: { code?: string; details?: unknown } = {}): Response {
    const payload: ErrorResponse = { error };
    if (options.code !== undefined) {
      payload.code = options.code;
    }
    if (options.details !== undefined) {
      payload.details = options.details;
    }
    return new Response(JSON.stringify(payload), {
      status: this.normalizeStatusCode(status),
      headers: { "content-type": "application/json" },
    });
  }

  private normalizeStatusCode(status: number): number {
    if (Number.isInteger(status) && status >= 200 && status <= 599) {
      return status;
    }

    return 500;
  }
}

/** Creates a new application instance. */
export function createApp(options?: AppOptions): App {
  return new App(options);
}
