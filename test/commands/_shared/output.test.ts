import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { formatRequestLine, formatServerUrl } from '../../../src/commands/_shared/output.js';

describe('output utilities', () => {
  describe('formatRequestLine', () => {
    let level: typeof chalk.level;

    beforeEach(() => {
      level = chalk.level;
      chalk.level = 0;
    });

    afterEach(() => {
      chalk.level = level;
    });

    it('formats method, path, status and duration', () => {
      expect(formatRequestLine({ method: 'POST', path: '/user/', status: 200, durationMs: 0.4321 })).toBe(
        'POST /user/ 200 0.4ms'
      );
    });

    it('colors statuses by class when colors are enabled', () => {
      chalk.level = 1;

      expect(formatRequestLine({ method: 'GET', path: '/x', status: 404, durationMs: 1 })).toContain(
        chalk.yellow('404')
      );
      expect(formatRequestLine({ method: 'GET', path: '/x', status: 500, durationMs: 1 })).toContain(chalk.red('500'));
      expect(formatRequestLine({ method: 'GET', path: '/x', status: 200, durationMs: 1 })).toContain(
        chalk.green('200')
      );
    });
  });

  describe('formatServerUrl', () => {
    it('builds an http URL', () => {
      expect(formatServerUrl('127.0.0.1', 8080)).toBe('http://127.0.0.1:8080');
    });

    it('brackets IPv6 hosts', () => {
      expect(formatServerUrl('::1', 3000)).toBe('http://[::1]:3000');
    });
  });
});
