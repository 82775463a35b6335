// Types
export {
  HTTP_METHODS,
  isHttpMethod,
  type HttpMethod,
  type CompiledPattern,
  type Route,
  type RouteTable,
  type RouteParams,
  type OverrideSource,
  type DispatchInput,
  type MatchResult,
  type RouteResponse,
  type NotFoundHandler,
} from "./types/index.js";

// Core
export { Router, notFoundResponse, NOT_FOUND_BODY } from "./core/router.js";
export { applyPrefix, compilePattern, extractPath, type CompileOptions } from "./core/pattern.js";
export {
  controller,
  createControllerRegistry,
  invokeHandler,
  type ControllerClass,
  type ControllerRef,
  type ControllerRegistry,
  type Handler,
  type RouteCallback,
} from "./core/handler.js";
export {
  DEFAULT_OVERRIDE_FIELD,
  type RouterOptions,
  type ResolvedRouterOptions,
} from "./core/options.js";
export {
  createApp,
  App,
  type AppHooks,
  type AppOptions,
  type RequestEvent,
  type ResponseEvent,
  type ErrorEvent,
} from "./core/app.js";
export {
  HandlerError,
  HttpError,
  RouteError,
  type ErrorResponse,
  type HttpErrorOptions,
} from "./core/errors.js";
