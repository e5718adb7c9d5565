/**
 * Route key parsing and path pattern matching.
 *
 * A route key is either a bare path (`/api/users/:id`, implying `GET`) or a
 * bracketed form (`[POST] /api/users`). Paths compile once into an immutable
 * {@link PathPattern}; matching walks the segments instead of building a
 * regular expression per request.
 *
 * @packageDocumentation
 */

import { InvalidRouteError } from './errors.js';
import { createRecord } from './record.js';
import {
    HTTP_METHODS,
    type HttpMethod,
    type PathPattern,
    type PatternSegment,
    type RouteIdentity,
} from './types.js';

const PARAM_NAME = '[A-Za-z_][A-Za-z0-9_]*';
const COLON_PARAM = new RegExp(`^:(${PARAM_NAME})$`);
const BRACE_PARAM = new RegExp(`^\\{(${PARAM_NAME})\\}$`);

/**
 * A route key split into its parts, before the path is compiled.
 */
export interface ParsedRouteKey {
    /** Method from the bracketed prefix, if the key has one. */
    method?: HttpMethod;
    path: string;
}

/**
 * Checks whether a string is a supported HTTP method (upper case).
 */
export function isHttpMethod(value: string): value is HttpMethod {
    return HTTP_METHODS.some((method) => method === value);
}

/**
 * Upper-cases and validates a method name.
 *
 * @param key - Route key, for the error message
 * @param field - Field the method came from
 * @param raw - Method as written
 * @throws \{InvalidRouteError\} When the method is empty or unknown
 */
export function parseMethod(key: string, field: string, raw: string): HttpMethod {
    const method = raw.trim().toUpperCase();
    if (method === '') {
        throw new InvalidRouteError(key, field, 'method is empty');
    }
    if (!isHttpMethod(method)) {
        throw new InvalidRouteError(
            key,
            field,
            `unsupported method '${raw.trim()}'; expected one of ${HTTP_METHODS.join(', ')}`,
        );
    }
    return method;
}

/**
 * Normalizes a URL path by ensuring consistent formatting.
 *
 * - Adds a leading slash if missing
 * - Removes trailing slash (except for root path `/`)
 *
 * @param path - The path to normalize
 * @returns Normalized path string
 *
 * @example
 * ```typescript
 * normalizePath('api/users'); // '/api/users'
 * normalizePath('/api/users/'); // '/api/users'
 * normalizePath('/'); // '/'
 * ```
 */
export function normalizePath(path: string): string {
    let normalized = path;

    if (!normalized.startsWith('/')) {
        normalized = '/' + normalized;
    }

    if (normalized.length > 1 && normalized.endsWith('/')) {
        normalized = normalized.slice(0, -1);
    }

    return normalized;
}

/**
 * Splits a route key into an optional method and a path.
 *
 * Method casing is ignored; whitespace around both parts is trimmed.
 *
 * @param key - Route key as written in the configuration
 * @throws \{InvalidRouteError\} When the bracket is unclosed, the method is
 * unknown or the path is empty
 *
 * @example
 * ```typescript
 * parseRouteKey('[post] /api/users'); // { method: 'POST', path: '/api/users' }
 * parseRouteKey('/api/users');        // { path: '/api/users' }
 * ```
 */
export function parseRouteKey(key: string): ParsedRouteKey {
    const trimmed = key.trim();
    let method: HttpMethod | undefined;
    let path = trimmed;

    if (trimmed.startsWith('[')) {
        const end = trimmed.indexOf(']');
        if (end === -1) {
            throw new InvalidRouteError(key, 'key', "missing closing ']'");
        }
        method = parseMethod(key, 'key', trimmed.slice(1, end));
        path = trimmed.slice(end + 1).trim();
    }

    if (path === '') {
        throw new InvalidRouteError(key, 'key', 'path is empty');
    }

    return { method, path };
}

/**
 * Compiles a path into an immutable pattern.
 *
 * `:name` and `{name}` segments are equivalent parameters. Empty segments
 * (`//`) are dropped.
 *
 * @param key - Route key, for error messages
 * @param path - Path to compile
 * @throws \{InvalidRouteError\} When a parameter name repeats within the path
 */
export function compilePattern(key: string, path: string): PathPattern {
    const segments: PatternSegment[] = [];
    const paramNames: string[] = [];

    for (const part of normalizePath(path).split('/')) {
        if (part === '') continue;

        const param = COLON_PARAM.exec(part) ?? BRACE_PARAM.exec(part);
        if (param) {
            const name = param[1];
            if (paramNames.includes(name)) {
                throw new InvalidRouteError(
                    key,
                    'key',
                    `parameter '${name}' appears more than once`,
                );
            }
            paramNames.push(name);
            const segment: PatternSegment = { type: 'param', name };
            segments.push(Object.freeze(segment));
        } else {
            const segment: PatternSegment = { type: 'literal', value: part };
            segments.push(Object.freeze(segment));
        }
    }

    const firstParam = segments.findIndex((s) => s.type === 'param');
    const source =
        '/' +
        segments
            .map((s) => (s.type === 'param' ? `:${s.name}` : s.value))
            .join('/');

    return Object.freeze({
        source,
        segments: Object.freeze(segments),
        paramNames: Object.freeze(paramNames),
        leadingLiterals: firstParam === -1 ? segments.length : firstParam,
    });
}

/**
 * Formats the canonical identifier of a route, e.g. `[GET] /api/users/:id`.
 */
export function formatRouteIdentifier(
    method: HttpMethod,
    pattern: PathPattern,
): string {
    return `[${method}] ${pattern.source}`;
}

/**
 * Normalizes a route key into its method, compiled pattern and identifier.
 *
 * @param key - Route key as written in the configuration
 * @param declaredMethod - Method from the route's `method` field, if any
 * @throws \{InvalidRouteError\} When the key is invalid, or the key prefix and
 * the declared method disagree
 *
 * @example
 * ```typescript
 * normalizeRouteKey('/api/users/{id}').identifier; // '[GET] /api/users/:id'
 * ```
 */
export function normalizeRouteKey(
    key: string,
    declaredMethod?: HttpMethod,
): RouteIdentity {
    const parsed = parseRouteKey(key);

    if (
        parsed.method !== undefined &&
        declaredMethod !== undefined &&
        parsed.method !== declaredMethod
    ) {
        throw new InvalidRouteError(
            key,
            'method',
            `method '${declaredMethod}' conflicts with key prefix '${parsed.method}'`,
        );
    }

    const method = parsed.method ?? declaredMethod ?? 'GET';
    const pattern = compilePattern(key, parsed.path);

    return {
        method,
        pattern,
        identifier: formatRouteIdentifier(method, pattern),
    };
}

function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}

/**
 * Matches a concrete path against a pattern and extracts parameters.
 *
 * Literal segments must match exactly; a parameter matches any single
 * non-empty segment. Parameter values are URI-decoded.
 *
 * @param pattern - Compiled pattern
 * @param path - The actual URL path to match
 * @returns Object mapping parameter names to values, or `null` if no match
 *
 * @example
 * ```typescript
 * matchPattern(compilePattern(key, '/api/users/:id'), '/api/users/2'); // { id: '2' }
 * ```
 */
export function matchPattern(
    pattern: PathPattern,
    path: string,
): Record<string, string> | null {
    const normalized = normalizePath(path);
    const parts = normalized === '/' ? [] : normalized.slice(1).split('/');

    if (parts.length !== pattern.segments.length) {
        return null;
    }

    const params: Record<string, string> = createRecord();

    for (let i = 0; i < parts.length; i++) {
        const segment = pattern.segments[i];
        // empty segments (`//`) match neither literals nor parameters
        if (parts[i] === '') return null;
        if (segment.type === 'literal') {
            if (decodeSegment(parts[i]) !== segment.value) return null;
        } else {
            params[segment.name] = decodeSegment(parts[i]);
        }
    }

    return params;
}
