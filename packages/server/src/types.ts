/**
 * Type definitions for the json-echo server.
 *
 * @packageDocumentation
 */

import type { LogLevel } from './logger.js';

export type {
    Configuration,
    HttpMethod,
    JsonValue,
    MatchedModel,
    Model,
    ModelResponse,
} from '@json-echo/core';

/**
 * Configuration options for the mock server.
 *
 * `port` and `host` override the values from the configuration file.
 *
 * @example
 * ```typescript
 * const options: ServerOptions = {
 *     config: 'json-echo.json',
 *     port: 4000,
 *     watch: true,
 * };
 * ```
 */
export interface ServerOptions {
    /**
     * Configuration file, relative to the project root or absolute. When
     * omitted the first configuration file found in the root is used.
     */
    config?: string;

    /** Port to listen on. */
    port?: number;

    /** Host to bind to. */
    host?: string;

    /** Send CORS headers. Defaults to `true`. */
    cors?: boolean;

    /** Enable per-request logging. */
    verbose?: boolean;

    /** Reload routes when the configuration file changes. */
    watch?: boolean;

    /** Minimum level of log messages to print. Defaults to `info`. */
    logLevel?: LogLevel;
}

/**
 * Where a configuration file lives.
 */
export interface ConfigLocation {
    /** Project root every relative path resolves against. */
    root: string;

    /** Configuration file path, relative to the root or absolute. */
    file: string;
}
