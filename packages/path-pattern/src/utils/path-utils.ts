import { PATH_SEPARATOR } from '../constants';

const ESCAPABLE_PATTERN = /[\\{}*]/g;
const REPEATED_SLASHES = /\/+/g;

/**
 * Backslash-escapes `\`, `{`, `}` and `*` so arbitrary text can sit inside a pattern as a literal.
 *
 * @example
 * escape('a*b') // 'a\\*b'
 */
export function escape(segment: string): string {
  return segment.replace(ESCAPABLE_PATTERN, char => `\\${char}`);
}

/**
 * Trims, collapses repeated slashes, drops a trailing slash (except for the root) and ensures a
 * leading slash. Blank input normalizes to `/`.
 */
export function normalizePath(path: string): string {
  let normalized = path.trim();
  if (!normalized) {
    return PATH_SEPARATOR;
  }

  normalized = normalized.replace(REPEATED_SLASHES, PATH_SEPARATOR);

  if (normalized.length > 1 && normalized.endsWith(PATH_SEPARATOR)) {
    normalized = normalized.slice(0, -1);
  }

  if (!normalized.startsWith(PATH_SEPARATOR)) {
    normalized = PATH_SEPARATOR + normalized;
  }

  return normalized;
}

/**
 * Joins two path fragments with exactly one separator between them. Either side may be empty.
 */
export function joinPaths(left: string, right: string): string {
  if (!left) {
    return right;
  }
  if (!right) {
    return left;
  }

  const head = left.endsWith(PATH_SEPARATOR) ? left.slice(0, -1) : left;
  const tail = right.startsWith(PATH_SEPARATOR) ? right : PATH_SEPARATOR + right;

  return head + tail;
}

/**
 * Combines a context path, a base path and an endpoint path into one normalized path.
 */
export function combinePaths(contextPath: string, basePath: string, endpointPath: string): string {
  const combined = [contextPath, basePath, endpointPath].filter(part => part.length > 0).join(PATH_SEPARATOR);
  return normalizePath(combined);
}

/**
 * Whether the path ends with a separator, the root path excluded.
 */
export function hasTrailingSlash(path: string): boolean {
  return path.length > 1 && path.endsWith(PATH_SEPARATOR);
}
