import { type UserId, type UserStore, createUserRecord, formatUserRecord } from '../store/user-store.js';
import { getIndexHTML } from './index-page.js';
import { classifyRoute } from './routes.js';

export const HttpStatus = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export const HTML_CONTENT_TYPE = 'text/html';
export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

export interface DispatchResult {
  status: number;
  body: string;
  contentType: string;
}

function ok(body = '', contentType = TEXT_CONTENT_TYPE): DispatchResult {
  return { status: HttpStatus.OK, body, contentType };
}

function withStatus(status: number): DispatchResult {
  return { status, body: '', contentType: TEXT_CONTENT_TYPE };
}

function dispatchUser(store: UserStore, method: string, id: UserId | null): DispatchResult {
  if (method === 'POST') {
    // Ids are allocated by the store, never chosen by the client
    if (id !== null) return withStatus(HttpStatus.BAD_REQUEST);
    return ok(String(store.insert(createUserRecord())));
  }

  if (id === null) return withStatus(HttpStatus.METHOD_NOT_ALLOWED);

  switch (method) {
    case 'GET': {
      const user = store.get(id);
      return user !== null ? ok(formatUserRecord(user)) : withStatus(HttpStatus.NOT_FOUND);
    }
    case 'PUT':
      return store.update(id, createUserRecord()) ? ok() : withStatus(HttpStatus.NOT_FOUND);
    case 'DELETE':
      return store.remove(id) ? ok() : withStatus(HttpStatus.NOT_FOUND);
    default:
      return withStatus(HttpStatus.METHOD_NOT_ALLOWED);
  }
}

/**
 * Resolve one request against the store.
 *
 * Runs synchronously from classification to response body, so the store
 * operation it performs never interleaves with another request.
 */
export function dispatch(store: UserStore, method: string, path: string): DispatchResult {
  const route = classifyRoute(path);

  switch (route.kind) {
    case 'index':
      return method === 'GET' ? ok(getIndexHTML(), HTML_CONTENT_TYPE) : withStatus(HttpStatus.METHOD_NOT_ALLOWED);
    case 'list-users':
      return method === 'GET' ? ok(store.list().join(',')) : withStatus(HttpStatus.METHOD_NOT_ALLOWED);
    case 'user':
      return dispatchUser(store, method, route.id);
    case 'unmatched':
      return withStatus(HttpStatus.NOT_FOUND);
  }
}
