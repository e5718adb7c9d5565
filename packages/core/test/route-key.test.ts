/**
 * Tests for route key parsing and path patterns
 */

import { describe, it, expect } from 'vitest';
import {
    InvalidRouteError,
    compilePattern,
    matchPattern,
    normalizePath,
    normalizeRouteKey,
    parseRouteKey,
} from '../src/index.js';

describe('parseRouteKey', () => {
    it('treats a bare path as having no explicit method', () => {
        expect(parseRouteKey('/api/users')).toEqual({
            method: undefined,
            path: '/api/users',
        });
    });

    it('extracts a bracketed method regardless of casing', () => {
        expect(parseRouteKey('[post] /api/users')).toEqual({
            method: 'POST',
            path: '/api/users',
        });
        expect(parseRouteKey('[Delete]/api/users/:id')).toEqual({
            method: 'DELETE',
            path: '/api/users/:id',
        });
    });

    it('trims whitespace inside the brackets', () => {
        expect(parseRouteKey('[ put ]  /x').method).toBe('PUT');
    });

    it('rejects an unclosed bracket', () => {
        expect(() => parseRouteKey('[GET /api')).toThrow(InvalidRouteError);
    });

    it('rejects an empty method', () => {
        expect(() => parseRouteKey('[] /api')).toThrow('method is empty');
    });

    it('rejects an unknown method', () => {
        expect(() => parseRouteKey('[FETCH] /api')).toThrow(
            "unsupported method 'FETCH'",
        );
    });

    it('rejects an empty path', () => {
        expect(() => parseRouteKey('[GET]')).toThrow('path is empty');
    });
});

describe('compilePattern', () => {
    it('splits literal and parameter segments', () => {
        const pattern = compilePattern('k', '/api/users/:id');

        expect(pattern.segments).toEqual([
            { type: 'literal', value: 'api' },
            { type: 'literal', value: 'users' },
            { type: 'param', name: 'id' },
        ]);
        expect(pattern.paramNames).toEqual(['id']);
        expect(pattern.leadingLiterals).toBe(2);
    });

    it('treats {name} like :name', () => {
        const braces = compilePattern('k', '/api/{group}/items/{id}');

        expect(braces.source).toBe('/api/:group/items/:id');
        expect(braces.paramNames).toEqual(['group', 'id']);
        expect(braces.leadingLiterals).toBe(1);
    });

    it('normalizes slashes', () => {
        expect(compilePattern('k', 'api/users/').source).toBe('/api/users');
        expect(compilePattern('k', '/').source).toBe('/');
        expect(compilePattern('k', '/').segments).toEqual([]);
    });

    it('rejects repeated parameter names', () => {
        expect(() => compilePattern('k', '/a/:id/b/{id}')).toThrow(
            "parameter 'id' appears more than once",
        );
    });

    it('returns a frozen pattern', () => {
        const pattern = compilePattern('k', '/a/:b');

        expect(Object.isFrozen(pattern)).toBe(true);
        expect(Object.isFrozen(pattern.segments)).toBe(true);
    });
});

describe('normalizeRouteKey', () => {
    it('defaults the method to GET', () => {
        const identity = normalizeRouteKey('/api/users/{id}');

        expect(identity.method).toBe('GET');
        expect(identity.identifier).toBe('[GET] /api/users/:id');
    });

    it('uses the declared method when the key has no prefix', () => {
        expect(normalizeRouteKey('/api/users', 'POST').identifier).toBe(
            '[POST] /api/users',
        );
    });

    it('accepts a declared method equal to the prefix', () => {
        expect(normalizeRouteKey('[patch] /a', 'PATCH').method).toBe('PATCH');
    });

    it('rejects a declared method that conflicts with the prefix', () => {
        const error = (() => {
            try {
                normalizeRouteKey('[GET] /a', 'POST');
            } catch (e) {
                return e;
            }
        })();

        expect(error).toBeInstanceOf(InvalidRouteError);
        expect(error).toMatchObject({ key: '[GET] /a', field: 'method' });
    });

    it('gives equivalent keys the same identifier', () => {
        expect(normalizeRouteKey('[get] /api/users/').identifier).toBe(
            normalizeRouteKey('/api/users').identifier,
        );
    });
});

describe('matchPattern', () => {
    const pattern = compilePattern('k', '/api/users/:id');

    it('binds parameter segments', () => {
        expect(matchPattern(pattern, '/api/users/2')).toEqual({ id: '2' });
    });

    it('ignores a trailing slash on the request path', () => {
        expect(matchPattern(pattern, '/api/users/2/')).toEqual({ id: '2' });
    });

    it('requires literal segments to match exactly', () => {
        expect(matchPattern(pattern, '/api/people/2')).toBeNull();
    });

    it('requires the same number of segments', () => {
        expect(matchPattern(pattern, '/api/users')).toBeNull();
        expect(matchPattern(pattern, '/api/users/2/posts')).toBeNull();
    });

    it('does not match empty segments', () => {
        expect(matchPattern(pattern, '/api//users/2')).toBeNull();
        expect(matchPattern(pattern, '/api/users//')).toBeNull();
    });

    it('decodes parameter values', () => {
        expect(matchPattern(pattern, '/api/users/a%20b')).toEqual({
            id: 'a b',
        });
    });

    it('keeps malformed escapes as written', () => {
        expect(matchPattern(pattern, '/api/users/%E0%A4%A')).toEqual({
            id: '%E0%A4%A',
        });
    });

    it('matches the root path', () => {
        expect(matchPattern(compilePattern('k', '/'), '/')).toEqual({});
    });
});

describe('normalizePath', () => {
    it('adds a leading slash and strips a trailing one', () => {
        expect(normalizePath('api/users')).toBe('/api/users');
        expect(normalizePath('/api/users/')).toBe('/api/users');
        expect(normalizePath('/')).toBe('/');
    });
});
