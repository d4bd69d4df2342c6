import type { UserId } from '../store/user-store.js';

export type RouteIntent =
  | { kind: 'index' }
  | { kind: 'list-users' }
  | { kind: 'user'; id: UserId | null }
  | { kind: 'unmatched' };

interface RouteRule {
  matches: (path: string) => boolean;
  intent: (path: string) => RouteIntent;
}

const INDEX_PATHS = new Set(['/', '/index', '/index.htm', '/index.html']);
const USERS_PATHS = new Set(['/users', '/users/']);
const USER_PREFIX = '/user/';
const DIGITS = /^\d+$/;

/**
 * The segment after `/user/` with one trailing slash dropped.
 * Returns '' for a bare `/user/`, null when the path is not a user path.
 */
function userSegment(path: string): string | null {
  if (!path.startsWith(USER_PREFIX)) return null;
  const rest = path.slice(USER_PREFIX.length);
  if (rest === '') return '';
  const segment = rest.endsWith('/') ? rest.slice(0, -1) : rest;
  return DIGITS.test(segment) ? segment : null;
}

// Ids are unsigned 64-bit on the wire
const MAX_USER_ID = 0xffffffffffffffffn;

/**
 * Parse a digit segment into a user id. Empty segments, and values past the
 * 64-bit range, give null. Ids beyond the safe integer range are still ids;
 * they just never name an occupied slot.
 */
export function parseUserId(segment: string): UserId | null {
  if (!DIGITS.test(segment)) return null;
  if (BigInt(segment) > MAX_USER_ID) return null;
  return Number(segment);
}

/**
 * Evaluated in order; the first rule that matches wins.
 */
export const ROUTE_TABLE: readonly RouteRule[] = [
  {
    matches: (path) => INDEX_PATHS.has(path),
    intent: () => ({ kind: 'index' }),
  },
  {
    matches: (path) => USERS_PATHS.has(path),
    intent: () => ({ kind: 'list-users' }),
  },
  {
    matches: (path) => userSegment(path) !== null,
    intent: (path) => ({ kind: 'user', id: parseUserId(userSegment(path) ?? '') }),
  },
];

/**
 * Classify a request path into the route it addresses.
 */
export function classifyRoute(path: string): RouteIntent {
  for (const rule of ROUTE_TABLE) {
    if (rule.matches(path)) {
      return rule.intent(path);
    }
  }
  return { kind: 'unmatched' };
}
