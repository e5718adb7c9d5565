/**
 * Hono middleware for the mock server.
 *
 * @packageDocumentation
 */

export { formatMethod, loggerMiddleware } from './logger.js';
