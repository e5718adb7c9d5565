/**
 * `@json-echo/server` - Serve mock JSON API responses over HTTP.
 *
 * This package puts the route store of `@json-echo/core` behind a Hono
 * application and ships the `json-echo` command line tool.
 *
 * ## Features
 *
 * - Answers requests from the current store, so reloads take effect on the
 *   next request
 * - Route headers and content-type aware bodies
 * - CORS, static assets, request logging
 * - Reload on configuration change and graceful shutdown
 *
 * ## Usage
 *
 * ### CLI
 *
 * ```bash
 * json-echo init
 * json-echo serve --port 4000 --watch
 * json-echo routes --json
 * ```
 *
 * ### Programmatic
 *
 * ```typescript
 * import { createApp, runServer } from '@json-echo/server';
 * import { RouteStore, StoreHandle } from '@json-echo/core';
 *
 * // Option 1: Use runServer for simple cases
 * const server = await runServer({ config: 'json-echo.json' });
 *
 * // Option 2: Use createApp for more control
 * const handle = new StoreHandle(RouteStore.fromConfiguration(config));
 * const app = createApp(handle);
 * const res = await app.request('/api/users');
 * ```
 *
 * @packageDocumentation
 */

export {
    CORS_METHODS,
    DEFAULT_STATIC_ROUTE,
    createApp,
    getServerInfo,
    staticOptions,
    type AppOptions,
    type ServerInfo,
} from './server/app.js';
export { mediaType, renderResponse, serializeBody } from './server/response.js';
export { formatMethod, loggerMiddleware } from './middleware/index.js';
export {
    LOG_LEVELS,
    createLogger,
    isLogLevel,
    silentLogger,
    type LogLevel,
    type LogSink,
    type Logger,
} from './logger.js';
export {
    DEFAULT_CONFIG_FILE,
    RELOAD_DEBOUNCE_MS,
    loadStore,
    resolveConfigLocation,
    runServer,
    type LoadedStore,
    type RunningServer,
} from './runner.js';
export * from './types.js';
