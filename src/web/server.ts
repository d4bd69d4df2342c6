import * as http from 'node:http';
import type { UserStore } from '../store/user-store.js';
import { HttpStatus, TEXT_CONTENT_TYPE, dispatch } from './dispatcher.js';

export interface RequestLogEntry {
  method: string;
  path: string;
  status: number;
  durationMs: number;
}

export interface ServerOptions {
  /** Called once per request after the response has been written */
  onRequest?: (entry: RequestLogEntry) => void;
}

/**
 * Raw request path with the query string dropped. No normalization, so
 * `//users` or `/foo/..` are routed exactly as sent.
 */
export function requestPath(target: string): string {
  const queryStart = target.indexOf('?');
  return queryStart === -1 ? target : target.slice(0, queryStart);
}

/**
 * Create the HTTP server that serves the user API from `store`
 */
export function createServer(store: UserStore, options: ServerOptions = {}): http.Server {
  const server = http.createServer((req, res) => {
    const startedAt = performance.now();
    const method = req.method || 'GET';
    let path = req.url || '/';

    let status: number;
    try {
      path = requestPath(path);
      const result = dispatch(store, method, path);
      status = result.status;
      res.writeHead(result.status, { 'Content-Type': result.contentType });
      res.end(result.body);
    } catch (error) {
      console.error('Error handling request:', error);
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      res.writeHead(status, { 'Content-Type': TEXT_CONTENT_TYPE });
      res.end();
    }

    options.onRequest?.({ method, path, status, durationMs: performance.now() - startedAt });
  });

  return server;
}

/**
 * Start the HTTP server
 */
export function startServer(server: http.Server, port: number, host?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.on('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

/**
 * Stop accepting connections and resolve once the server has closed
 */
export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
    server.closeIdleConnections();
  });
}
