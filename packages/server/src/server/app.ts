/**
 * Hono app factory - creates the mock server application
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serveStatic } from '@hono/node-server/serve-static';
import { join, relative } from 'path';

import {
    isHttpMethod,
    normalizePath,
    type Configuration,
    type MatchedModel,
    type RouteStore,
    type StoreHandle,
} from '@json-echo/core';
import { silentLogger, type Logger } from '../logger.js';
import { loggerMiddleware } from '../middleware/logger.js';
import { renderResponse } from './response.js';

/** URL prefix static files are served under when none is configured. */
export const DEFAULT_STATIC_ROUTE = '/static';

/** Methods advertised in CORS preflight responses. */
export const CORS_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

/**
 * Options for {@link createApp}.
 */
export interface AppOptions {
    /** Project root the static folder is resolved against. */
    root?: string;

    /** Static asset settings, usually taken from the configuration. */
    staticFolder?: string;
    staticRoute?: string;

    /** Send CORS headers. Defaults to `true`. */
    cors?: boolean;

    /** Log every request at `info`. */
    verbose?: boolean;

    logger?: Logger;
}

/**
 * Picks the static asset settings out of a configuration.
 */
export function staticOptions(
    config: Pick<Configuration, 'staticFolder' | 'staticRoute'>,
): Pick<AppOptions, 'staticFolder' | 'staticRoute'> {
    return { staticFolder: config.staticFolder, staticRoute: config.staticRoute };
}

function findRoute(
    store: RouteStore,
    method: string,
    path: string,
): MatchedModel | undefined {
    if (!isHttpMethod(method)) {
        return undefined;
    }
    const match = store.findMatching(method, path);
    if (match === undefined && method === 'HEAD') {
        return store.findMatching('GET', path);
    }
    return match;
}

/**
 * Create a Hono app answering requests from the store held by `handle`.
 *
 * The store is read on every request, so swapping it on the handle takes
 * effect for the next request.
 *
 * @example
 * ```typescript
 * const handle = new StoreHandle(RouteStore.fromConfiguration(config));
 * const app = createApp(handle, { verbose: true });
 * const res = await app.request('/api/users/1');
 * ```
 */
export function createApp(handle: StoreHandle, options: AppOptions = {}): Hono {
    const app = new Hono();
    const logger = options.logger ?? silentLogger;

    if (options.verbose) {
        app.use('*', loggerMiddleware(logger));
    }

    if (options.cors ?? true) {
        app.use('*', cors({ origin: '*', allowMethods: CORS_METHODS }));
    }

    app.all('*', async (c, next) => {
        const store = handle.current;
        const path = normalizePath(new URL(c.req.url).pathname);
        const matched = findRoute(store, c.req.method, path);

        if (matched === undefined) {
            return next();
        }

        const { model } = matched;
        logger.debug(`${c.req.method} ${path} -> ${model.identifier}`);

        const response = store.resolveResponse(matched);
        if (response === undefined) {
            return c.json({ error: 'Record not found' }, 404);
        }

        return renderResponse(response.body, response.status, model.headers);
    });

    if (options.staticFolder !== undefined) {
        const route = normalizePath(options.staticRoute ?? DEFAULT_STATIC_ROUTE);
        const folder = join(options.root ?? process.cwd(), options.staticFolder);
        const prefix = route === '/' ? '' : route;

        app.use(
            `${prefix}/*`,
            serveStatic({
                root: relative(process.cwd(), folder),
                rewriteRequestPath: (path) => path.slice(prefix.length),
            }),
        );
    }

    app.notFound((c) => {
        return c.json(
            {
                error: 'No route defined',
                message: `No route matches ${c.req.method} ${new URL(c.req.url).pathname}`,
            },
            404,
        );
    });

    app.onError((err, c) => {
        logger.error(`${c.req.method} ${new URL(c.req.url).pathname}: ${err.message}`);
        return c.json(
            {
                error: 'Internal Server Error',
                message: err.message,
            },
            500,
        );
    });

    return app;
}

/**
 * Summary of a running server, for display
 */
export interface ServerInfo {
    configFile: string;
    routeCount: number;
    url: string;
    staticFolder?: string;
    staticRoute?: string;
    watch?: boolean;
}

/**
 * Get server info for display
 */
export function getServerInfo(info: ServerInfo): string[] {
    const lines: string[] = [];

    lines.push(`Config: ${info.configFile}`);
    lines.push(`Routes: ${info.routeCount}`);
    lines.push('');
    lines.push(`Listening on: ${info.url}`);

    if (info.staticFolder !== undefined) {
        lines.push(
            `Static: ${info.staticFolder} -> ${info.staticRoute ?? DEFAULT_STATIC_ROUTE}`,
        );
    }

    if (info.watch) {
        lines.push('Watching for changes');
    }

    return lines;
}
