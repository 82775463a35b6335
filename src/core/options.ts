import { z } from "zod";
import type { ControllerRegistry } from "./handler.js";

export const DEFAULT_OVERRIDE_FIELD = "_method";

const routerOptionsSchema = z.object({
  escapeLiterals: z.boolean().default(true),
  methodOverride: z.boolean().default(true),
});

const overrideFieldSchema = z.string().min(1).default(DEFAULT_OVERRIDE_FIELD);

export type RouterOptions = {
  /**
   * Escape regular-expression metacharacters in literal path text.
   * Disable only for compatibility with routes written as raw expressions.
   */
  escapeLiterals?: boolean;
  /** Honor the method-override field on POST requests. */
  methodOverride?: boolean;
  /** Resolves name-based controller refs. */
  controllers?: ControllerRegistry;
};

export type ResolvedRouterOptions = z.output<typeof routerOptionsSchema> & {
  controllers: ControllerRegistry | undefined;
};

export function resolveRouterOptions(options: RouterOptions = {}): ResolvedRouterOptions {
  const { controllers, ...settings } = options;
  return {
    ...routerOptionsSchema.parse(settings),
    controllers,
  };
}

export function resolveOverrideField(field: string | undefined): string {
  return overrideFieldSchema.parse(field);
}
