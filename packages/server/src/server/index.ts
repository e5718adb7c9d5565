/**
 * Core server functionality for the mock server.
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
} from './app.js';
export { mediaType, renderResponse, serializeBody } from './response.js';
