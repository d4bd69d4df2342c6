import { describe, expect, it } from 'vitest';
import { classifyRoute, parseUserId } from '../../src/web/routes.js';

describe('routes', () => {
  describe('classifyRoute', () => {
    it.each(['/', '/index', '/index.htm', '/index.html'])('classifies %s as the index page', (path) => {
      expect(classifyRoute(path)).toEqual({ kind: 'index' });
    });

    it.each(['/users', '/users/'])('classifies %s as the user list', (path) => {
      expect(classifyRoute(path)).toEqual({ kind: 'list-users' });
    });

    it('classifies a bare /user/ as a user route without id', () => {
      expect(classifyRoute('/user/')).toEqual({ kind: 'user', id: null });
    });

    it('extracts the id from /user/{id} with or without a trailing slash', () => {
      expect(classifyRoute('/user/12')).toEqual({ kind: 'user', id: 12 });
      expect(classifyRoute('/user/12/')).toEqual({ kind: 'user', id: 12 });
      expect(classifyRoute('/user/007')).toEqual({ kind: 'user', id: 7 });
    });

    it('keeps the user route but drops an id past the 64-bit range', () => {
      expect(classifyRoute('/user/18446744073709551616')).toEqual({ kind: 'user', id: null });
    });

    it('keeps the largest 64-bit id as present', () => {
      expect(classifyRoute('/user/18446744073709551615')).toEqual({
        kind: 'user',
        id: Number('18446744073709551615'),
      });
    });

    it.each(['/user', '/user//', '/user/abc', '/user/1/2', '/user/-1', '/users/1', '/index.php', '/unknown/path', ''])(
      'leaves %s unmatched',
      (path) => {
        expect(classifyRoute(path)).toEqual({ kind: 'unmatched' });
      }
    );
  });

  describe('parseUserId', () => {
    it('parses decimal digits', () => {
      expect(parseUserId('0')).toBe(0);
      expect(parseUserId('42')).toBe(42);
    });

    it('returns null for empty, non-digit or out-of-range values', () => {
      expect(parseUserId('')).toBeNull();
      expect(parseUserId('4a')).toBeNull();
      expect(parseUserId(' 4')).toBeNull();
      expect(parseUserId('18446744073709551616')).toBeNull();
    });

    it('accepts ids beyond the safe integer range up to the 64-bit maximum', () => {
      expect(parseUserId('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
      expect(parseUserId('9007199254740992')).toBe(9007199254740992);
      expect(parseUserId('18446744073709551615')).not.toBeNull();
    });
  });
});
