import type { CompiledPattern } from "../types/index.js";
import { RouteError } from "./errors.js";

/** Splits a path into alternating literal text and placeholder names. */
const PLACEHOLDER = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;
const ABSOLUTE_URL = /^[a-zA-Z][a-zA-Z\d+\-.]*:\/\//;

export type CompileOptions = {
  /** Match literal text verbatim instead of as regular-expression source. */
  escapeLiterals?: boolean;
};

/**
 * Joins the open group prefixes onto a route path and makes the result absolute.
 * Normalization runs after prefixing, so `["api"]` + `"/users"` becomes `/api/users`.
 */
export function applyPrefix(prefixes: readonly string[], path: string): string {
  const full = prefixes.join("") + path;
  return full === "" || !full.startsWith("/") ? `/${full}` : full;
}

/**
 * Compiles a route path into an anchored pattern.
 *
 * Each `{name}` placeholder becomes a named group matching one or more
 * characters other than `/`. The result depends only on the inputs.
 */
export function compilePattern(path: string, options: CompileOptions = {}): CompiledPattern {
  const escapeLiterals = options.escapeLiterals ?? true;
  const parts = path.split(PLACEHOLDER);
  const paramNames: string[] = [];
  let body = "";

  parts.forEach((part, index) => {
    if (index % 2 === 0) {
      body += escapeLiterals ? part.replace(REGEX_SPECIALS, "\\$&") : part;
      return;
    }

    if (paramNames.includes(part)) {
      throw new RouteError(path, `Duplicate route parameter "${part}" in "${path}"`);
    }
    paramNames.push(part);
    body += `(?<${part}>[^/]+)`;
  });

  const source = `^${body}$`;
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (error) {
    throw new RouteError(path, `Route path "${path}" does not compile to a valid pattern`, {
      cause: error,
    });
  }

  return Object.freeze({ source, regex, paramNames: Object.freeze(paramNames) });
}

/** Returns the path component of a URL or request target, without query or fragment. */
export function extractPath(rawUrl: string): string {
  if (ABSOLUTE_URL.test(rawUrl) && URL.canParse(rawUrl)) {
    return new URL(rawUrl).pathname;
  }

  const end = rawUrl.search(/[?#]/);
  return end === -1 ? rawUrl : rawUrl.slice(0, end);
}
