/**
 * Longest-prefix path router
 *
 * The table is fixed at construction. Lookups never fail: a path that no
 * prefix covers goes to the backend.
 */

import type { DynamicRoute, Route } from './types.js';

/**
 * Result of a lookup when no registered prefix matches
 */
export const DEFAULT_ROUTE: DynamicRoute = Object.freeze({ prefix: '', kind: 'dynamic' });

export interface Router {
  readonly routes: readonly Route[];
  route(path: string): Route;
}

/**
 * Drop trailing slashes so "/static/" and "/static" register the same prefix
 */
export function normalizePrefix(prefix: string): string {
  if (!prefix.startsWith('/')) {
    throw new Error(`Route prefix must start with "/": ${prefix}`);
  }
  const trimmed = prefix.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

/**
 * A prefix covers a path when the path equals it or continues it at a
 * segment boundary, so "/static" covers "/static/x" but not "/staticfoo"
 */
export function prefixMatches(prefix: string, path: string): boolean {
  if (prefix === '/') {
    return true;
  }
  if (!path.startsWith(prefix)) {
    return false;
  }
  return path.length === prefix.length || path.charAt(prefix.length) === '/';
}

export function createRouter(routes: readonly Route[]): Router {
  const table: readonly Route[] = Object.freeze(
    routes.map((route) => Object.freeze({ ...route, prefix: normalizePrefix(route.prefix) }))
  );

  return {
    routes: table,
    route(path: string): Route {
      let best: Route = DEFAULT_ROUTE;
      let bestLength = -1;

      for (const candidate of table) {
        // Strictly longer only: on equal length the earlier registration stays
        if (candidate.prefix.length > bestLength && prefixMatches(candidate.prefix, path)) {
          best = candidate;
          bestLength = candidate.prefix.length;
        }
      }

      return best;
    },
  };
}
