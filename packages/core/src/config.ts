/**
 * Configuration loading, validation and saving.
 *
 * This module turns the bytes of a `json-echo.json` file into a validated
 * {@link Configuration}: defaults are filled, every route key is normalized,
 * and responses written as file paths are read once and inlined. Any
 * violation aborts the whole load with a single error.
 *
 * @packageDocumentation
 */

import { isInteger, isSafeNumber, parse, stringify } from 'lossless-json';

import {
    ExternalResponseError,
    FileSystemError,
    InvalidConfigError,
    InvalidRouteError,
    MalformedConfigError,
    DuplicateRouteError,
} from './errors.js';
import type { FileOperationOptions, FileSystemManager } from './filesystem.js';
import { createRecord } from './record.js';
import { normalizeRouteKey, parseMethod } from './route-key.js';
import type {
    Configuration,
    HttpMethod,
    InlineResponse,
    JsonValue,
    RouteDefinition,
    RouteResponse,
} from './types.js';

/** Port used when the file does not set one. */
export const DEFAULT_PORT = 3001;

/** Hostname used when the file does not set one. */
export const DEFAULT_HOSTNAME = 'localhost';

/** Identifier field used when a route does not set `id_field`. */
export const DEFAULT_ID_FIELD = 'id';

/** Status used when a response does not set one. */
export const DEFAULT_STATUS = 200;

// ============================================================================
// RAW FILE TYPES (before validation)
// ============================================================================

/**
 * A configuration document before validation.
 * All fields are typed as unknown to allow validation of any input.
 */
export interface RawConfiguration {
    port?: unknown;
    hostname?: unknown;
    static_folder?: unknown;
    static_route?: unknown;
    routes?: unknown;
    [key: string]: unknown;
}

/**
 * A route entry before validation.
 */
export interface RawRouteDefinition {
    method?: unknown;
    description?: unknown;
    headers?: unknown;
    id_field?: unknown;
    results_field?: unknown;
    response?: unknown;
    [key: string]: unknown;
}

/**
 * A route entry as written back to disk.
 */
export interface RouteDefinitionFile {
    method: HttpMethod;
    description?: string;
    headers?: Record<string, string>;
    id_field: string;
    results_field?: string;
    response: { status: number; body: JsonValue };
}

/**
 * A configuration document as written back to disk.
 */
export interface ConfigurationFile {
    port: number;
    hostname: string;
    static_folder?: string;
    static_route?: string;
    routes: Record<string, RouteDefinitionFile>;
}

// ============================================================================
// GUARDS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks that a value is made only of JSON types.
 */
export function isJsonValue(value: unknown): value is JsonValue {
    if (value === null) return true;
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(value);
        case 'bigint':
            return true;
        case 'object':
            if (Array.isArray(value)) {
                return value.every(isJsonValue);
            }
            return Object.values(value).every(isJsonValue);
        default:
            return false;
    }
}

// integers beyond 2^53 stay exact as bigint; every other number is a double
function parseNumber(value: string): number | bigint {
    return isInteger(value) && !isSafeNumber(value)
        ? BigInt(value)
        : parseFloat(value);
}

function rejectProtoKey(key: string, value: unknown): unknown {
    if (key === '__proto__') {
        throw new SyntaxError("Object key '__proto__' is not supported");
    }
    return value;
}

/**
 * Parses JSON text, reporting failures as {@link MalformedConfigError}.
 *
 * Integers too large for a double are returned as `bigint` so they keep
 * every digit. Duplicate keys with different values and `__proto__` keys
 * are rejected.
 *
 * @param path - Path of the document, for the error
 * @param bytes - Raw file contents
 */
export function parseJson(path: string, bytes: Uint8Array | string): JsonValue {
    const text = (
        typeof bytes === 'string' ? bytes : Buffer.from(bytes).toString('utf-8')
    ).replace(/^\uFEFF/, '');
    let parsed: unknown;

    try {
        JSON.parse(text, rejectProtoKey);
        parsed = parse(text, undefined, parseNumber);
    } catch (error) {
        throw new MalformedConfigError(
            path,
            error instanceof Error ? error : new Error(String(error)),
        );
    }

    if (!isJsonValue(parsed)) {
        throw new MalformedConfigError(path, new Error('not a JSON value'));
    }
    return parsed;
}

/**
 * Serializes a JSON value, writing `bigint` values as their digits.
 *
 * @param value - Value to serialize
 * @param space - Indentation, as for `JSON.stringify`
 */
export function stringifyJson(value: unknown, space?: number): string {
    const text = stringify(value, undefined, space);
    if (text === undefined) {
        throw new TypeError('Value has no JSON representation');
    }
    return text;
}

// ============================================================================
// FIELD VALIDATORS
// ============================================================================

function optionalString(
    key: string,
    field: string,
    value: unknown,
): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== 'string' || value.trim() === '') {
        throw new InvalidRouteError(key, field, 'expected a non-empty string');
    }
    return value;
}

function parseHeaders(
    key: string,
    value: unknown,
): Record<string, string> | undefined {
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        throw new InvalidRouteError(
            key,
            'headers',
            'expected an object of header names to string values',
        );
    }

    const headers = createRecord<string>();
    for (const [name, headerValue] of Object.entries(value)) {
        if (typeof headerValue !== 'string') {
            throw new InvalidRouteError(
                key,
                'headers',
                `value of header '${name}' must be a string`,
            );
        }
        headers[name] = headerValue;
    }
    return headers;
}

/**
 * Validates a route's `response` field into the {@link RouteResponse} union.
 *
 * @param key - Route key, for error messages
 * @param value - The raw `response` value
 * @throws \{InvalidRouteError\} When the response is missing or has another shape
 */
export function parseRouteResponse(key: string, value: unknown): RouteResponse {
    if (value === undefined) {
        throw new InvalidRouteError(key, 'response', 'missing response');
    }

    if (typeof value === 'string') {
        if (value.trim() === '') {
            throw new InvalidRouteError(key, 'response', 'file path is empty');
        }
        return { kind: 'file', path: value };
    }

    if (!isRecord(value)) {
        throw new InvalidRouteError(
            key,
            'response',
            'expected an object with a body, or a path to a JSON file',
        );
    }

    if (!('body' in value) || value.body === undefined) {
        throw new InvalidRouteError(key, 'response.body', 'missing body');
    }
    const body = value.body;
    if (!isJsonValue(body)) {
        throw new InvalidRouteError(key, 'response.body', 'not a JSON value');
    }

    let status = DEFAULT_STATUS;
    const rawStatus = value.status;
    if (rawStatus !== undefined) {
        if (
            typeof rawStatus !== 'number' ||
            !Number.isInteger(rawStatus) ||
            rawStatus < 100 ||
            rawStatus > 599
        ) {
            throw new InvalidRouteError(
                key,
                'response.status',
                'expected an integer HTTP status between 100 and 599',
            );
        }
        status = rawStatus;
    }

    return { kind: 'inline', status, body };
}

/**
 * Validates one route entry.
 *
 * @param key - Route key as written in the file
 * @param value - The raw route value
 * @throws \{InvalidRouteError\} On the first invalid field
 */
export function parseRouteDefinition(
    key: string,
    value: unknown,
): RouteDefinition<RouteResponse> {
    if (!isRecord(value)) {
        throw new InvalidRouteError(key, 'route', 'expected an object');
    }
    const raw: RawRouteDefinition = value;

    let declaredMethod: HttpMethod | undefined;
    const rawMethod = raw.method;
    if (rawMethod !== undefined) {
        if (typeof rawMethod !== 'string') {
            throw new InvalidRouteError(key, 'method', 'expected a string');
        }
        declaredMethod = parseMethod(key, 'method', rawMethod);
    }

    const { method } = normalizeRouteKey(key, declaredMethod);

    const definition: RouteDefinition<RouteResponse> = {
        method,
        idField: optionalString(key, 'id_field', raw.id_field) ?? DEFAULT_ID_FIELD,
        response: parseRouteResponse(key, raw.response),
    };

    const description = raw.description;
    if (description !== undefined) {
        if (typeof description !== 'string') {
            throw new InvalidRouteError(key, 'description', 'expected a string');
        }
        definition.description = description;
    }

    const headers = parseHeaders(key, raw.headers);
    if (headers) definition.headers = headers;

    const resultsField = optionalString(key, 'results_field', raw.results_field);
    if (resultsField !== undefined) definition.resultsField = resultsField;

    return definition;
}

/**
 * Validates a parsed configuration document and fills defaults.
 *
 * File-reference responses are validated but left unresolved.
 *
 * @param document - Parsed JSON document
 * @returns Configuration whose responses may still be file references
 * @throws \{InvalidConfigError\} When a top-level field has the wrong shape
 * @throws \{InvalidRouteError\} When a route entry is invalid
 * @throws \{DuplicateRouteError\} When two keys normalize to the same route
 *
 * @example
 * ```typescript
 * const config = parseConfiguration({ routes: { '/health': { response: { body: 'ok' } } } });
 * config.port; // 3001
 * ```
 */
export function parseConfiguration(
    document: unknown,
): Configuration<RouteResponse> {
    if (!isRecord(document)) {
        throw new InvalidConfigError('(root)', 'expected a JSON object');
    }
    const raw: RawConfiguration = document;

    let port = DEFAULT_PORT;
    const rawPort = raw.port;
    if (rawPort !== undefined) {
        if (
            typeof rawPort !== 'number' ||
            !Number.isInteger(rawPort) ||
            rawPort < 1 ||
            rawPort > 65535
        ) {
            throw new InvalidConfigError(
                'port',
                'expected an integer between 1 and 65535',
            );
        }
        port = rawPort;
    }

    let hostname = DEFAULT_HOSTNAME;
    const rawHostname = raw.hostname;
    if (rawHostname !== undefined) {
        if (typeof rawHostname !== 'string' || rawHostname.trim() === '') {
            throw new InvalidConfigError('hostname', 'expected a non-empty string');
        }
        hostname = rawHostname;
    }

    const config: Configuration<RouteResponse> = {
        port,
        hostname,
        routes: createRecord(),
    };

    for (const field of ['static_folder', 'static_route'] as const) {
        const value = raw[field];
        if (value === undefined) continue;
        if (typeof value !== 'string') {
            throw new InvalidConfigError(field, 'expected a string');
        }
        if (field === 'static_folder') {
            config.staticFolder = value;
        } else {
            config.staticRoute = value;
        }
    }

    const routes = raw.routes === undefined ? {} : raw.routes;
    if (!isRecord(routes)) {
        throw new InvalidConfigError('routes', 'expected an object of route keys');
    }

    const seen = new Set<string>();
    for (const [key, value] of Object.entries(routes)) {
        const definition = parseRouteDefinition(key, value);
        const { identifier } = normalizeRouteKey(key, definition.method);
        if (seen.has(identifier)) {
            throw new DuplicateRouteError(identifier);
        }
        seen.add(identifier);
        config.routes[key] = definition;
    }

    return config;
}

/**
 * Converts a loaded configuration to its on-disk shape.
 *
 * Responses are written inline; references that were resolved at load time
 * are not turned back into file paths.
 */
export function serializeConfiguration(config: Configuration): ConfigurationFile {
    const file: ConfigurationFile = {
        port: config.port,
        hostname: config.hostname,
        routes: createRecord(),
    };
    if (config.staticFolder !== undefined) file.static_folder = config.staticFolder;
    if (config.staticRoute !== undefined) file.static_route = config.staticRoute;

    for (const [key, route] of Object.entries(config.routes)) {
        const entry: RouteDefinitionFile = {
            method: route.method,
            id_field: route.idField,
            response: { status: route.response.status, body: route.response.body },
        };
        if (route.description !== undefined) entry.description = route.description;
        if (route.headers !== undefined) entry.headers = { ...route.headers };
        if (route.resultsField !== undefined) entry.results_field = route.resultsField;
        file.routes[key] = entry;
    }

    return file;
}

/**
 * Creates the configuration written by `json-echo init`.
 */
export function createDefaultConfiguration(): Configuration {
    return {
        port: DEFAULT_PORT,
        hostname: DEFAULT_HOSTNAME,
        routes: createRecord(),
    };
}

/**
 * Loads and saves configuration files through a {@link FileSystemManager}.
 *
 * @example
 * ```typescript
 * const manager = new ConfigManager(await FileSystemManager.create());
 * const config = await manager.load('json-echo.json');
 * const store = RouteStore.fromConfiguration(config);
 * ```
 */
export class ConfigManager {
    constructor(public readonly fileSystem: FileSystemManager) {}

    /**
     * Reads, validates and fully resolves a configuration file.
     *
     * Each call returns a fresh value; nothing is cached between calls.
     *
     * @param path - Configuration path relative to the root, or absolute
     * @param options - Abort signal for the file reads
     * @throws \{FileSystemError\} When the configuration file cannot be read
     * @throws \{MalformedConfigError\} When it is not valid JSON
     * @throws \{ConfigurationError\} On the first validation failure or
     * unresolvable response file
     */
    async load(
        path: string,
        options: FileOperationOptions = {},
    ): Promise<Configuration> {
        const bytes = await this.fileSystem.loadFile(path, options);
        const parsed = parseConfiguration(
            parseJson(this.fileSystem.resolvePath(path), bytes),
        );

        const routes = createRecord<RouteDefinition>();
        for (const [key, route] of Object.entries(parsed.routes)) {
            routes[key] = {
                ...route,
                response: await this.resolveResponse(key, route.response, options),
            };
        }

        return { ...parsed, routes };
    }

    /**
     * Writes a configuration file, with every response inline.
     *
     * @param path - Target path relative to the root, or absolute
     * @param config - Configuration to write
     * @param options - Abort signal for the write
     */
    async save(
        path: string,
        config: Configuration,
        options: FileOperationOptions = {},
    ): Promise<void> {
        const text = stringifyJson(serializeConfiguration(config), 2) + '\n';
        await this.fileSystem.saveFile(path, text, options);
    }

    /**
     * Resolves a response to its inline form, reading file references.
     *
     * @param key - Route key, for error messages
     * @param response - Parsed response
     * @param options - Abort signal for the file read
     * @throws \{ExternalResponseError\} When a referenced file cannot be read or parsed
     */
    async resolveResponse(
        key: string,
        response: RouteResponse,
        options: FileOperationOptions = {},
    ): Promise<InlineResponse> {
        switch (response.kind) {
            case 'inline':
                return response;
            case 'file': {
                try {
                    const bytes = await this.fileSystem.loadFile(
                        response.path,
                        options,
                    );
                    const body = parseJson(
                        this.fileSystem.resolvePath(response.path),
                        bytes,
                    );
                    return { kind: 'inline', status: DEFAULT_STATUS, body };
                } catch (error) {
                    if (
                        error instanceof FileSystemError ||
                        error instanceof MalformedConfigError
                    ) {
                        throw new ExternalResponseError(key, response.path, error);
                    }
                    throw error;
                }
            }
            default: {
                const unreachable: never = response;
                throw new Error(`Unknown response kind: ${JSON.stringify(unreachable)}`);
            }
        }
    }
}
