import chalk from 'chalk';
import type { RequestLogEntry } from '../../web/server.js';

function colorStatus(status: number): string {
  const s = String(status);
  if (status >= 500) return chalk.red(s);
  if (status >= 400) return chalk.yellow(s);
  return chalk.green(s);
}

/**
 * Format one request log line, e.g. `GET /user/0 200 0.4ms`.
 */
export function formatRequestLine(entry: RequestLogEntry): string {
  return `${chalk.bold(entry.method)} ${entry.path} ${colorStatus(entry.status)} ${chalk.gray(
    `${entry.durationMs.toFixed(1)}ms`
  )}`;
}

/**
 * Base URL a client would use to reach the server.
 */
export function formatServerUrl(host: string, port: number): string {
  const hostname = host.includes(':') ? `[${host}]` : host;
  return `http://${hostname}:${port}`;
}
