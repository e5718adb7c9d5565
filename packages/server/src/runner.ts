/**
 * Programmatic interface for running the mock server.
 *
 * This module loads a configuration into a {@link StoreHandle}, serves it
 * over HTTP, and optionally reloads it when the configuration file changes.
 *
 * @packageDocumentation
 */

import { serve, type ServerType } from '@hono/node-server';
import type { EventEmitter } from 'events';
import { watch, type FSWatcher } from 'fs';
import { basename, dirname, isAbsolute } from 'path';
import pc from 'picocolors';

import {
    ConfigManager,
    FileSystemManager,
    RouteStore,
    StoreHandle,
    VERSION,
    resolveRoot,
    type Configuration,
    type FileOperationOptions,
} from '@json-echo/core';
import { createLogger, type Logger } from './logger.js';
import { createApp, getServerInfo, staticOptions } from './server/app.js';
import type { ConfigLocation, ServerOptions } from './types.js';

/** Configuration file used when none is named and none is found. */
export const DEFAULT_CONFIG_FILE = 'json-echo.json';

/** Quiet period after a file change before reloading. */
export const RELOAD_DEBOUNCE_MS = 100;

/**
 * Works out the project root and configuration file.
 *
 * An absolute `config` makes its directory the root. Otherwise the root is
 * discovered from `cwd`; without `config` the first configuration file found
 * in the root is used, falling back to {@link DEFAULT_CONFIG_FILE}.
 *
 * @param config - Configuration path as given on the command line
 * @param cwd - Directory to start root discovery from
 */
export async function resolveConfigLocation(
    config?: string,
    cwd: string = process.cwd(),
): Promise<ConfigLocation> {
    if (config !== undefined && isAbsolute(config)) {
        return { root: dirname(config), file: config };
    }

    const root = await resolveRoot(cwd);
    if (config !== undefined) {
        return { root, file: config };
    }

    const found = await new FileSystemManager(root).findConfigFile();
    return { root, file: found ?? DEFAULT_CONFIG_FILE };
}

/**
 * A loaded configuration and the store built from it.
 */
export interface LoadedStore {
    config: Configuration;
    store: RouteStore;
}

/**
 * Loads a configuration file and populates a fresh store from it.
 *
 * @param manager - Configuration manager rooted at the project root
 * @param file - Configuration path relative to the root, or absolute
 * @param options - Abort signal for the file reads
 */
export async function loadStore(
    manager: ConfigManager,
    file: string,
    options: FileOperationOptions = {},
): Promise<LoadedStore> {
    const config = await manager.load(file, options);
    return { config, store: RouteStore.fromConfiguration(config) };
}

/**
 * Handle on a server started by {@link runServer}.
 */
export interface RunningServer {
    /** Holds the store the server answers from. */
    handle: StoreHandle;

    /** Address the server listens on. */
    url: string;

    /** Reloads the configuration, keeping the current store on failure. */
    reload(): Promise<void>;

    /** Stops watching and closes the listening socket. */
    close(): Promise<void>;
}

function listen(
    fetch: (request: Request) => Response | Promise<Response>,
    port: number,
    hostname: string,
): Promise<ServerType> {
    return new Promise((resolve, reject) => {
        const server = serve({ fetch, port, hostname }, () => {
            events.off('error', reject);
            resolve(server);
        });
        const events: EventEmitter = server;
        events.once('error', reject);
    });
}

function closeServer(server: ServerType): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error?: Error) => (error ? reject(error) : resolve()));
    });
}

/**
 * Runs the mock server programmatically.
 *
 * Prints a banner, loads the configuration, and listens until
 * {@link RunningServer.close} is called or the process receives SIGINT or
 * SIGTERM.
 *
 * @param options - Server configuration options
 * @throws \{FileSystemError\} When the configuration file cannot be read
 * @throws \{ConfigurationError\} When the configuration is invalid
 *
 * @example
 * ```typescript
 * import { runServer } from '@json-echo/server';
 *
 * const server = await runServer({ config: 'json-echo.json', watch: true });
 * // later
 * await server.close();
 * ```
 */
export async function runServer(
    options: ServerOptions,
    logger: Logger = createLogger(options.logLevel),
): Promise<RunningServer> {
    console.log(pc.bold(pc.cyan(`\n  json-echo v${VERSION}`)));
    console.log(pc.gray('  ' + '─'.repeat(30)));
    console.log();

    const location = await resolveConfigLocation(options.config);
    const fileSystem = await FileSystemManager.create(location.root);
    const manager = new ConfigManager(fileSystem);
    const configPath = fileSystem.resolvePath(location.file);

    const { config, store } = await loadStore(manager, location.file);
    const handle = new StoreHandle(store);

    const app = createApp(handle, {
        ...staticOptions(config),
        root: location.root,
        cors: options.cors,
        verbose: options.verbose,
        logger,
    });

    const port = options.port ?? config.port;
    const hostname = options.host ?? config.hostname;
    const server = await listen(app.fetch, port, hostname);
    const url = `http://${hostname}:${port}`;

    const info = getServerInfo({
        configFile: configPath,
        routeCount: store.count,
        url,
        staticFolder: config.staticFolder,
        staticRoute: config.staticRoute,
        watch: options.watch,
    });
    for (const line of info) {
        console.log(`  ${line}`);
    }
    console.log();

    const controller = new AbortController();
    let reloading: Promise<void> = Promise.resolve();

    const reload = (): Promise<void> => {
        reloading = reloading.then(async () => {
            try {
                const next = await handle.reload(
                    async () =>
                        (await loadStore(manager, location.file, {
                            signal: controller.signal,
                        })).store,
                );
                logger.info(`Reloaded ${next.count} routes`);
            } catch (error) {
                if (controller.signal.aborted) return;
                const message = error instanceof Error ? error.message : String(error);
                logger.error(`Reload failed, keeping previous routes: ${message}`);
            }
        });
        return reloading;
    };

    let watcher: FSWatcher | undefined;
    let timer: NodeJS.Timeout | undefined;
    if (options.watch) {
        const fileName = basename(configPath);
        watcher = watch(dirname(configPath), (_event, changed) => {
            if (changed !== null && changed !== fileName) return;
            clearTimeout(timer);
            timer = setTimeout(() => {
                logger.debug(`${fileName} changed`);
                void reload();
            }, RELOAD_DEBOUNCE_MS);
        });
        watcher.on('error', (error) => {
            logger.warn(`Stopped watching ${configPath}: ${error.message}`);
        });
    }

    let closing: Promise<void> | undefined;
    const close = (): Promise<void> => {
        closing ??= (async () => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
            clearTimeout(timer);
            watcher?.close();
            controller.abort();
            await reloading;
            await closeServer(server);
        })();
        return closing;
    };

    const onSignal = (signal: NodeJS.Signals): void => {
        logger.info(`Received ${signal}, shutting down`);
        close().then(
            () => process.exit(0),
            (error: unknown) => {
                const message = error instanceof Error ? error.message : String(error);
                logger.error(`Shutdown failed: ${message}`);
                process.exit(1);
            },
        );
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    console.log(pc.green(`  Server started!`));
    console.log();
    console.log(pc.gray(`  Press ${pc.bold('Ctrl+C')} to stop`));
    console.log();

    return { handle, url, reload, close };
}
