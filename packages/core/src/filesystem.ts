/**
 * Project root discovery and file access.
 *
 * The {@link FileSystemManager} resolves every relative path against a
 * project root found by walking up from a starting directory, and translates
 * Node errno codes into the {@link FileSystemError} family.
 *
 * @packageDocumentation
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { basename, dirname, isAbsolute, join, resolve } from 'path';
import {
    FileIOError,
    FileSystemError,
    IsADirectoryError,
    NotFoundError,
    PermissionDeniedError,
} from './errors.js';

/**
 * File names that mark a directory as a json-echo project root, in lookup order.
 */
export const CONFIG_FILE_NAMES = [
    'json-echo.json',
    'db.json',
    '.db.json',
] as const;

/**
 * Options accepted by file operations.
 */
export interface FileOperationOptions {
    /** Aborts the read or write. An aborted write never replaces the target. */
    signal?: AbortSignal;
}

/**
 * Checks if a directory exists at the given path.
 *
 * @param path - Path to check
 * @returns `true` if a directory exists at the path, `false` otherwise
 */
export async function directoryExists(path: string): Promise<boolean> {
    try {
        const stats = await stat(path);
        return stats.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Checks if a file exists at the given path.
 *
 * @param path - Path to check
 * @returns `true` if a file exists at the path, `false` otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
    try {
        const stats = await stat(path);
        return stats.isFile();
    } catch {
        return false;
    }
}

/**
 * Finds the project root for a starting directory.
 *
 * Walks up through parent directories and returns the first one containing
 * one of {@link CONFIG_FILE_NAMES}. When the filesystem root is reached
 * without a match, the starting directory itself is returned.
 *
 * @param start - Directory to start from (defaults to the working directory)
 * @returns Absolute path of the project root
 *
 * @example
 * ```typescript
 * // With /work/project/json-echo.json present:
 * await resolveRoot('/work/project/mocks/users'); // '/work/project'
 * ```
 */
export async function resolveRoot(start?: string): Promise<string> {
    const origin = resolve(start ?? process.cwd());
    let current = origin;

    for (;;) {
        for (const name of CONFIG_FILE_NAMES) {
            if (await fileExists(join(current, name))) {
                return current;
            }
        }

        const parent = dirname(current);
        if (parent === current) {
            return origin;
        }
        current = parent;
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Translates an error thrown by `fs` into a {@link FileSystemError}.
 *
 * @param path - Absolute path the operation targeted
 * @param error - The thrown value
 */
export function toFileSystemError(path: string, error: unknown): FileSystemError {
    if (error instanceof FileSystemError) {
        return error;
    }
    if (isErrnoException(error)) {
        switch (error.code) {
            case 'ENOENT':
                return new NotFoundError(path);
            case 'EISDIR':
                return new IsADirectoryError(path);
            case 'EACCES':
            case 'EPERM':
                return new PermissionDeniedError(path);
        }
    }
    return new FileIOError(
        path,
        error instanceof Error ? error : new Error(String(error)),
    );
}

/**
 * Reads and writes files relative to a project root.
 *
 * @example
 * ```typescript
 * const fs = await FileSystemManager.create();
 * const bytes = await fs.loadFile('json-echo.json');
 * await fs.saveFile('backup/json-echo.json', bytes);
 * ```
 */
export class FileSystemManager {
    /**
     * @param root - Absolute project root
     */
    constructor(public readonly root: string) {}

    /**
     * Creates a manager rooted at `root`, or at the root discovered from the
     * working directory when `root` is omitted.
     *
     * @param root - Explicit root directory
     */
    static async create(root?: string): Promise<FileSystemManager> {
        if (root !== undefined) {
            return new FileSystemManager(resolve(root));
        }
        return new FileSystemManager(await resolveRoot());
    }

    /**
     * Resolves a path against the root. Absolute paths are returned unchanged.
     */
    resolvePath(path: string): string {
        return isAbsolute(path) ? path : join(this.root, path);
    }

    /**
     * Reads the full contents of a file.
     *
     * @param path - Path relative to the root, or absolute
     * @param options - Abort signal
     * @returns The file bytes
     * @throws \{NotFoundError\} When the file does not exist
     * @throws \{IsADirectoryError\} When the path names a directory
     * @throws \{PermissionDeniedError\} When the file cannot be read
     * @throws \{FileIOError\} For any other failure
     */
    async loadFile(
        path: string,
        options: FileOperationOptions = {},
    ): Promise<Buffer> {
        const target = this.resolvePath(path);

        try {
            return await readFile(target, { signal: options.signal });
        } catch (error) {
            throw toFileSystemError(target, error);
        }
    }

    /**
     * Writes a file, replacing any existing content.
     *
     * Missing parent directories are created. Content goes to a temporary
     * sibling first and is renamed over the target, so readers see either
     * the old or the new file.
     *
     * @param path - Path relative to the root, or absolute
     * @param content - Bytes or UTF-8 text to write
     * @param options - Abort signal
     * @throws \{IsADirectoryError\} When the path names a directory
     * @throws \{PermissionDeniedError\} When the file cannot be written
     * @throws \{FileIOError\} For any other failure
     */
    async saveFile(
        path: string,
        content: Uint8Array | string,
        options: FileOperationOptions = {},
    ): Promise<void> {
        const target = this.resolvePath(path);

        if (await directoryExists(target)) {
            throw new IsADirectoryError(target);
        }

        const tempPath = join(
            dirname(target),
            `.${basename(target)}.${randomUUID()}.tmp`,
        );

        try {
            await mkdir(dirname(target), { recursive: true });
            await writeFile(tempPath, content, { signal: options.signal });
            options.signal?.throwIfAborted();
            await rename(tempPath, target);
        } catch (error) {
            await rm(tempPath, { force: true });
            throw toFileSystemError(target, error);
        }
    }

    /**
     * Finds the first of {@link CONFIG_FILE_NAMES} present in the root.
     *
     * @returns Absolute path of the configuration file, or `undefined`
     */
    async findConfigFile(): Promise<string | undefined> {
        for (const name of CONFIG_FILE_NAMES) {
            const candidate = join(this.root, name);
            if (await fileExists(candidate)) {
                return candidate;
            }
        }
        return undefined;
    }
}
