/**
 * URI pattern compiler.
 *
 * A declaration like `/user/{userId}/details?filter=*&version=1` compiles to:
 *   - a full-path matcher: `{name}` placeholders capture one path segment,
 *     everything else is regular-expression source (`/hello/[0-9]/.*`)
 *   - the ordered list of path parameter names
 *   - the query constraints declared after the first `?`
 */

import { ConfigurationError } from "./errors.js";

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g;

/** Query constraint value that accepts any non-empty value. */
export const QUERY_WILDCARD = "*";

export interface UriPattern {
  /** The declaration as given */
  readonly source: string;
  readonly pathParams: readonly string[];
  /** name → expected value ("*" = any non-empty value) */
  readonly queryConstraints: ReadonlyMap<string, string>;
  matches(path: string): boolean;
  /** Values of the named placeholders; empty when the path does not match */
  extractPathParams(path: string): Record<string, string>;
}

export interface RequestTarget {
  path: string;
  /** Everything after the first "?", without it ("" when absent) */
  query: string;
}

export function splitTarget(target: string): RequestTarget {
  const index = target.indexOf("?");
  if (index === -1) return { path: target, query: "" };
  return { path: target.slice(0, index), query: target.slice(index + 1) };
}

/**
 * Request-side query parser. Values are kept as sent (no percent-decoding);
 * a pair without "=" maps to "". Later duplicates overwrite earlier ones.
 */
export function parseQueryString(query: string): Map<string, string> {
  const params = new Map<string, string>();
  if (query.length === 0) return params;

  for (const pair of query.split("&")) {
    if (pair.length === 0) continue;
    const eq = pair.indexOf("=");
    if (eq === -1) {
      params.set(pair, "");
    } else {
      params.set(pair.slice(0, eq), pair.slice(eq + 1));
    }
  }
  return params;
}

/** Every declared key must be present; "*" needs a non-empty value, anything else an exact match. */
export function queryConstraintsSatisfied(
  constraints: ReadonlyMap<string, string>,
  actual: ReadonlyMap<string, string>,
): boolean {
  for (const [name, expected] of constraints) {
    const value = actual.get(name);
    if (value === undefined) return false;
    if (expected === QUERY_WILDCARD) {
      if (value.length === 0) return false;
    } else if (value !== expected) {
      return false;
    }
  }
  return true;
}

function parseQueryDeclaration(declaration: string, uri: string): Map<string, string> {
  const constraints = new Map<string, string>();
  if (declaration.length === 0) return constraints;

  for (const pair of declaration.split("&")) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ConfigurationError(
        `Invalid query declaration "${pair}" in "${uri}": expected name=value or name=*`,
      );
    }
    constraints.set(pair.slice(0, eq), pair.slice(eq + 1));
  }
  return constraints;
}

export function compileUriPattern(uri: string): UriPattern {
  const { path, query } = splitTarget(uri);
  const queryConstraints = parseQueryDeclaration(query, uri);

  const pathParams: string[] = [];
  const source = path.replace(PLACEHOLDER, (_match, name: string) => {
    if (pathParams.includes(name)) {
      throw new ConfigurationError(`Duplicate path parameter "{${name}}" in "${uri}"`);
    }
    pathParams.push(name);
    return "([^/]+)";
  });

  let matcher: RegExp;
  try {
    matcher = new RegExp(`^(?:${source})$`);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Malformed URI pattern "${uri}": ${reason}`);
  }

  // Regex fragments may bring their own groups; placeholders are located by
  // counting capture groups that precede them.
  const groupIndexes = placeholderGroupIndexes(source, pathParams.length);

  return {
    source: uri,
    pathParams,
    queryConstraints,
    matches(requestPath: string): boolean {
      return matcher.test(requestPath);
    },
    extractPathParams(requestPath: string): Record<string, string> {
      const match = matcher.exec(requestPath);
      const params: Record<string, string> = {};
      if (!match) return params;
      pathParams.forEach((name, i) => {
        const value = match[groupIndexes[i]];
        if (value !== undefined) params[name] = value;
      });
      return params;
    },
  };
}

/**
 * 1-based capture group index of each `([^/]+)` inserted for a placeholder,
 * skipping escaped parens, character classes and non-capturing groups.
 */
function placeholderGroupIndexes(source: string, count: number): number[] {
  const indexes: number[] = [];
  const marker = "([^/]+)";
  let group = 0;
  let inClass = false;

  for (let i = 0; i < source.length && indexes.length < count; i++) {
    const ch = source[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (inClass) {
      if (ch === "]") inClass = false;
      continue;
    }
    if (source.startsWith(marker, i)) {
      group++;
      indexes.push(group);
      i += marker.length - 1;
      continue;
    }
    if (ch === "[") {
      inClass = true;
    } else if (ch === "(" && source[i + 1] !== "?") {
      group++;
    } else if (ch === "(" && source.startsWith("(?<", i) && source[i + 3] !== "=" && source[i + 3] !== "!") {
      group++;
    }
  }
  return indexes;
}
