import { z } from "zod";
import type { RouteParams } from "../types/index.js";
import { HandlerError } from "./errors.js";

/**
 * Directly invocable handler. Receives the route parameters positionally,
 * in the order their placeholders appear in the route path.
 */
export type RouteCallback = (...params: string[]) => unknown;

export type ControllerClass = new () => object;

/**
 * Controller reference resolved at dispatch time: the controller is looked up
 * (by name through a registry, or used directly when given as a class),
 * a fresh instance is constructed and the named method invoked on it.
 */
export type ControllerRef = readonly [type: string | ControllerClass, method: string];

export type Handler = RouteCallback | ControllerRef;

/** Lookup supplied by the embedding application for name-based controller refs. */
export interface ControllerRegistry {
  resolve(name: string): ControllerClass | undefined;
}

type MethodKeys<T> = {
  [K in keyof T]: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

const controllerRefSchema = z.tuple([
  z.union([
    z.string().min(1),
    z.custom<ControllerClass>(
      (value) => typeof value === "function" && typeof value.prototype === "object"
    ),
  ]),
  z.string().min(1),
]);

/** Builds a registry from a name-to-class record. */
export function createControllerRegistry(
  controllers: Record<string, ControllerClass>
): ControllerRegistry {
  const entries = new Map(Object.entries(controllers));
  return {
    resolve: (name) => entries.get(name),
  };
}

/**
 * Typed helper for class-based controller refs.
 * Only methods of the controller are accepted as the action name.
 */
export function controller<T extends object>(
  type: new () => T,
  method: MethodKeys<T>
): ControllerRef {
  return [type, method];
}

function isClass(value: Function): boolean {
  return /^class[\s{]/.test(Function.prototype.toString.call(value));
}

function isRouteCallback(value: unknown): value is RouteCallback {
  return typeof value === "function" && !isClass(value);
}

/** Looks a member up on the instance and its prototypes, stopping before Object.prototype. */
function findAction(instance: object, name: string): unknown {
  if (name === "constructor") {
    return undefined;
  }

  let target: object | null = instance;
  while (target !== null && target !== Object.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(target, name);
    if (descriptor) {
      return descriptor.value;
    }
    target = Object.getPrototypeOf(target);
  }
  return undefined;
}

function resolveController(name: string, registry: ControllerRegistry | undefined): ControllerClass {
  if (!registry) {
    throw new HandlerError(`Cannot resolve controller "${name}": no controller registry configured`);
  }
  const type = registry.resolve(name);
  if (!type) {
    throw new HandlerError(`Controller "${name}" does not exist`);
  }
  return type;
}

/**
 * Invokes a matched route handler with the extracted parameters.
 * Anything that is neither a callable nor a resolvable controller ref
 * is rejected with a HandlerError.
 */
export function invokeHandler(
  handler: unknown,
  params: RouteParams,
  registry?: ControllerRegistry
): unknown {
  const args = Object.values(params);

  if (isRouteCallback(handler)) {
    return handler(...args);
  }

  const ref = controllerRefSchema.safeParse(handler);
  if (!ref.success) {
    throw new HandlerError("Invalid route handler");
  }

  const [type, methodName] = ref.data;
  const Controller = typeof type === "string" ? resolveController(type, registry) : type;
  const instance = new Controller();
  const action = findAction(instance, methodName);

  if (typeof action !== "function") {
    const typeName = typeof type === "string" ? type : type.name;
    throw new HandlerError(`Method "${methodName}" does not exist on controller "${typeName}"`);
  }

  return Reflect.apply(action, instance, args);
}
