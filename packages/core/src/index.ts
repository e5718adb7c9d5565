/**
 * `@json-echo/core` - Configuration loading and the in-memory route store.
 *
 * ## Features
 *
 * - Project root discovery and root-relative file access with atomic writes
 * - Configuration validation with defaults and one-time resolution of
 *   responses stored in separate JSON files
 * - A read-only route store that matches request paths and resolves records
 *   by identifier, optionally inside a nested results field
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *     ConfigManager,
 *     FileSystemManager,
 *     RouteStore,
 * } from '@json-echo/core';
 *
 * const manager = new ConfigManager(await FileSystemManager.create());
 * const config = await manager.load('json-echo.json');
 * const store = RouteStore.fromConfiguration(config);
 *
 * const match = store.findMatching('GET', '/api/users/2');
 * const response = match && store.resolveResponse(match);
 * ```
 *
 * @packageDocumentation
 */

/**
 * The current version of json-echo.
 */
export const VERSION = '0.1.0';

export {
    CONFIG_FILE_NAMES,
    FileSystemManager,
    directoryExists,
    fileExists,
    resolveRoot,
    toFileSystemError,
    type FileOperationOptions,
} from './filesystem.js';
export {
    ConfigManager,
    DEFAULT_HOSTNAME,
    DEFAULT_ID_FIELD,
    DEFAULT_PORT,
    DEFAULT_STATUS,
    createDefaultConfiguration,
    isJsonValue,
    parseConfiguration,
    parseJson,
    parseRouteDefinition,
    parseRouteResponse,
    serializeConfiguration,
    stringifyJson,
    type ConfigurationFile,
    type RawConfiguration,
    type RawRouteDefinition,
    type RouteDefinitionFile,
} from './config.js';
export {
    compilePattern,
    formatRouteIdentifier,
    isHttpMethod,
    matchPattern,
    normalizePath,
    normalizeRouteKey,
    parseMethod,
    parseRouteKey,
    type ParsedRouteKey,
} from './route-key.js';
export { RouteStore, StoreHandle, createModel } from './store.js';
export * from './errors.js';
export * from './types.js';
