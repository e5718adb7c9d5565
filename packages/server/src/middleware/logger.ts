/**
 * Logger middleware for request logging.
 *
 * This module provides Hono middleware that logs HTTP requests with
 * colorized output showing method, path, status code, and response time.
 *
 * @packageDocumentation
 */

import type { Context, Next } from 'hono';
import pc from 'picocolors';
import { isHttpMethod, type HttpMethod } from '@json-echo/core';
import type { Logger } from '../logger.js';

type Colorize = (text: string) => string;

const METHOD_COLORS: Partial<Record<HttpMethod, Colorize>> = {
    GET: pc.green,
    HEAD: pc.green,
    POST: pc.yellow,
    PUT: pc.blue,
    PATCH: pc.magenta,
    DELETE: pc.red,
};

/**
 * Colors an HTTP method; methods without a color of their own are gray.
 */
export function formatMethod(method: string): string {
    const color = isHttpMethod(method) ? METHOD_COLORS[method] : undefined;
    return (color ?? pc.gray)(method);
}

/**
 * Colors a status code by class: 2xx green, 3xx cyan, 4xx yellow, 5xx red.
 */
function formatStatus(status: number): string {
    const colors: Colorize[] = [pc.green, pc.cyan, pc.yellow, pc.red];
    const color: Colorize | undefined = colors[Math.floor(status / 100) - 2];
    return color ? color(String(status)) : String(status);
}

// under 100ms green, under 500ms yellow, otherwise red
function formatTime(ms: number): string {
    const text = `${ms.toFixed(0)}ms`;
    if (ms < 100) return pc.green(text);
    return ms < 500 ? pc.yellow(text) : pc.red(text);
}

/**
 * Creates a Hono middleware that logs each request after its response is
 * produced, at `info` level.
 *
 * @param logger - Logger to write to
 * @returns A Hono middleware function
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware(createLogger('info')));
 *
 * // Output example:
 * //   info  GET /api/users 200 3ms
 * ```
 */
export function loggerMiddleware(logger: Logger) {
    return async (c: Context, next: Next) => {
        const start = Date.now();
        const method = c.req.method;
        const path = new URL(c.req.url).pathname;

        await next();

        const elapsed = Date.now() - start;
        logger.info(
            `${formatMethod(method)} ${path} ${formatStatus(c.res.status)} ${formatTime(elapsed)}`,
        );
    };
}
