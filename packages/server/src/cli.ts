#!/usr/bin/env node

/**
 * CLI for json-echo
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import pc from 'picocolors';

import {
    ConfigManager,
    FileSystemManager,
    HTTP_METHODS,
    VERSION,
    createDefaultConfiguration,
    fileExists,
    type Model,
} from '@json-echo/core';
import { LOG_LEVELS, createLogger, type LogLevel } from './logger.js';
import { formatMethod } from './middleware/logger.js';
import { loadStore, resolveConfigLocation, runServer } from './runner.js';

type GlobalOptions = {
    config?: string;
    logLevel: LogLevel;
};

type InitOptions = {
    force: boolean;
};

type ServeOptions = {
    port?: number;
    host?: string;
    watch: boolean;
    cors: boolean;
    verbose: boolean;
};

type RoutesOptions = {
    json: boolean;
};

function parsePort(value: string): number {
    const port = Number(value);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new InvalidArgumentError('Port must be an integer from 1 to 65535.');
    }
    return port;
}

function fail(error: unknown): never {
    const message = error instanceof Error ? error.message : String(error);
    console.error(pc.red(`\nError: ${message}`));
    process.exit(1);
}

const program = new Command();

program
    .name('json-echo')
    .description('Serve mock JSON API responses from a configuration file')
    .version(VERSION)
    .option(
        '-c, --config <path>',
        'Configuration file (default: first of json-echo.json, db.json, .db.json in the project root)',
    )
    .addOption(
        new Option('--log-level <level>', 'Minimum level of log messages')
            .choices(LOG_LEVELS)
            .default('info'),
    );

/**
 * Init command - write a starter configuration
 */
program
    .command('init')
    .description('Write a default configuration file')
    .option('-f, --force', 'Overwrite an existing file', false)
    .action(async (_opts: InitOptions, command: Command) => {
        try {
            const opts = command.optsWithGlobals<GlobalOptions & InitOptions>();
            const location = await resolveConfigLocation(opts.config);
            const fileSystem = await FileSystemManager.create(location.root);
            const path = fileSystem.resolvePath(location.file);

            if (!opts.force && (await fileExists(path))) {
                throw new Error(
                    `${path} already exists; pass --force to overwrite it`,
                );
            }

            await new ConfigManager(fileSystem).save(
                location.file,
                createDefaultConfiguration(),
            );
            console.log(pc.green(`\n  Created ${path}\n`));
        } catch (error) {
            fail(error);
        }
    });

/**
 * Serve command - start the mock server
 */
program
    .command('serve', { isDefault: true })
    .description('Start the mock server')
    .option('-p, --port <number>', 'Port to listen on (overrides the config file)', parsePort)
    .option('-H, --host <string>', 'Host to bind to (overrides the config file)')
    .option('-w, --watch', 'Reload routes when the config file changes', false)
    .option('--no-cors', 'Disable CORS headers')
    .option('-v, --verbose', 'Log every request', false)
    .action(async (_opts: ServeOptions, command: Command) => {
        try {
            const opts = command.optsWithGlobals<GlobalOptions & ServeOptions>();
            await runServer(
                {
                    config: opts.config,
                    port: opts.port,
                    host: opts.host,
                    cors: opts.cors,
                    verbose: opts.verbose,
                    watch: opts.watch,
                    logLevel: opts.logLevel,
                },
                createLogger(opts.logLevel),
            );
        } catch (error) {
            fail(error);
        }
    });

/**
 * Routes command - list configured routes
 */
program
    .command('routes')
    .description('List configured routes')
    .option('--json', 'Output as JSON', false)
    .action(async (_opts: RoutesOptions, command: Command) => {
        try {
            const opts = command.optsWithGlobals<GlobalOptions & RoutesOptions>();
            const location = await resolveConfigLocation(opts.config);
            const manager = new ConfigManager(
                await FileSystemManager.create(location.root),
            );
            const { store } = await loadStore(manager, location.file);
            const models = store.getModels();

            if (opts.json) {
                console.log(
                    JSON.stringify(
                        models.map((model) => ({
                            identifier: model.identifier,
                            method: model.method,
                            path: model.pattern.source,
                            description: model.description,
                            status: model.status,
                        })),
                        null,
                        2,
                    ),
                );
                return;
            }

            console.log(pc.bold(pc.cyan('\n  Routes')));
            console.log(pc.gray('  ' + '─'.repeat(40)));
            console.log();

            // Group by method
            const byMethod = new Map<string, Model[]>();
            for (const model of models) {
                const existing = byMethod.get(model.method) ?? [];
                existing.push(model);
                byMethod.set(model.method, existing);
            }

            for (const method of HTTP_METHODS) {
                const group = byMethod.get(method);
                if (group === undefined) continue;

                console.log(`  ${pc.bold(formatMethod(method))}`);
                for (const model of group) {
                    const description = model.description
                        ? pc.gray(`  ${model.description}`)
                        : '';
                    console.log(`    ${model.pattern.source}${description}`);
                }
                console.log();
            }

            console.log(pc.gray(`  Total: ${models.length} routes`));
            console.log();
        } catch (error) {
            fail(error);
        }
    });

await program.parseAsync(process.argv);
