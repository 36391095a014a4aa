/**
 * Request methods understood by the parser.
 */

export enum Method {
  GET = 'GET',
  HEAD = 'HEAD',
  POST = 'POST',
  PUT = 'PUT',
  DELETE = 'DELETE',
  CONNECT = 'CONNECT',
  OPTIONS = 'OPTIONS',
  TRACE = 'TRACE',
  PATCH = 'PATCH',
}

const METHODS: ReadonlyMap<string, Method> = new Map(
  Object.values(Method).map((method): [string, Method] => [method, method])
);

/**
 * Upper-case ASCII letters only, so non-ASCII look-alikes never fold into a method name
 */
function toAsciiUpperCase(token: string): string {
  return token.replace(/[a-z]/g, (c) => c.toUpperCase());
}

/**
 * Look up a method token case-insensitively.
 * Returns null for anything outside the closed set.
 */
export function parseMethod(token: string): Method | null {
  return METHODS.get(toAsciiUpperCase(token)) ?? null;
}
