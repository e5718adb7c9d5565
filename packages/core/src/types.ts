/**
 * Type definitions for json-echo.
 *
 * Shared types for configuration, route definitions, compiled path patterns
 * and the models held by the route store.
 *
 * @packageDocumentation
 */

// ============================================================================
// JSON VALUES
// ============================================================================

/**
 * Any value that can appear in a JSON document. Integers too large for a
 * double are held as `bigint`.
 */
export type JsonValue =
    | string
    | number
    | bigint
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * A JSON object (the only shape that can carry an identifier field).
 */
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// HTTP
// ============================================================================

/**
 * HTTP methods a route can be declared for.
 */
export const HTTP_METHODS = [
    'GET',
    'POST',
    'PUT',
    'PATCH',
    'DELETE',
    'HEAD',
    'OPTIONS',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

// ============================================================================
// PATH PATTERNS
// ============================================================================

/**
 * One segment of a compiled path pattern.
 *
 * `:name` and `{name}` segments both compile to a `param` segment.
 */
export type PatternSegment =
    | { readonly type: 'literal'; readonly value: string }
    | { readonly type: 'param'; readonly name: string };

/**
 * An immutable, pre-compiled path pattern such as `/api/users/:id`.
 */
export interface PathPattern {
    /** Canonical source with every parameter written as `:name`. */
    readonly source: string;

    /** Segments between slashes, in order. The root path has none. */
    readonly segments: readonly PatternSegment[];

    /** Names of all parameter segments, in order. */
    readonly paramNames: readonly string[];

    /** Number of literal segments before the first parameter. */
    readonly leadingLiterals: number;
}

/**
 * The normalized identity of a route key.
 */
export interface RouteIdentity {
    method: HttpMethod;
    pattern: PathPattern;

    /** Canonical `[METHOD] /path` form, usable as a route key again. */
    identifier: string;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * A response written inline in the configuration file.
 */
export interface InlineResponse {
    kind: 'inline';
    status: number;
    body: JsonValue;
}

/**
 * A response stored in a separate JSON file, named by a path relative to the
 * project root.
 */
export interface FileReferenceResponse {
    kind: 'file';
    path: string;
}

/**
 * A route response as it appears in the file, before references are read.
 */
export type RouteResponse = InlineResponse | FileReferenceResponse;

/**
 * A validated route entry.
 *
 * `TResponse` is {@link RouteResponse} while file references are pending
 * and {@link InlineResponse} once the loader has resolved them.
 */
export interface RouteDefinition<TResponse extends RouteResponse = InlineResponse> {
    /** Method from the `method` field or the key prefix, `GET` when neither is given. */
    method: HttpMethod;

    description?: string;

    /** Extra response headers emitted by the HTTP layer. */
    headers?: Record<string, string>;

    /** Field compared against a bound identifier parameter. Defaults to `id`. */
    idField: string;

    /** Field of the body that holds the searchable collection. */
    resultsField?: string;

    response: TResponse;
}

/**
 * A fully loaded configuration. Every response is inline.
 *
 * @example
 * ```typescript
 * const config: Configuration = {
 *     port: 3001,
 *     hostname: 'localhost',
 *     routes: {
 *         '/api/users/:id': {
 *             method: 'GET',
 *             idField: 'id',
 *             response: { kind: 'inline', status: 200, body: [] },
 *         },
 *     },
 * };
 * ```
 */
export interface Configuration<TResponse extends RouteResponse = InlineResponse> {
    port: number;
    hostname: string;

    /** Folder of static assets, relative to the root. Not interpreted by the core. */
    staticFolder?: string;

    /** URL prefix the static folder is served under. Not interpreted by the core. */
    staticRoute?: string;

    /** Route definitions keyed by the route key as written in the file. */
    routes: Record<string, RouteDefinition<TResponse>>;
}

// ============================================================================
// ROUTE STORE
// ============================================================================

/**
 * The resolved, queryable form of one route definition.
 *
 * Models are frozen when the store is populated.
 */
export interface Model {
    readonly identifier: string;
    readonly method: HttpMethod;
    readonly pattern: PathPattern;
    readonly description?: string;
    readonly headers: Readonly<Record<string, string>>;
    readonly idField: string;
    readonly resultsField?: string;
    readonly status: number;
    readonly data: JsonValue;
}

/**
 * Result of matching a concrete request path against the stored patterns.
 */
export interface MatchedModel {
    model: Model;

    /** Bound parameters, e.g. `/api/users/:id` on `/api/users/2` gives `{ id: '2' }`. */
    params: Record<string, string>;
}

/**
 * A status and body ready to be written by the HTTP layer.
 */
export interface ModelResponse {
    status: number;
    body: JsonValue;
}
