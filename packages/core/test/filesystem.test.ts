/**
 * Tests for root discovery and FileSystemManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
    FileIOError,
    FileSystemManager,
    IsADirectoryError,
    NotFoundError,
    resolveRoot,
    toFileSystemError,
    PermissionDeniedError,
} from '../src/index.js';

describe('resolveRoot', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), 'json-echo-fs-'));
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    it('returns the nearest ancestor containing a config file', async () => {
        const nested = join(tempDir, 'mocks', 'users');
        await mkdir(nested, { recursive: true });
        await writeFile(join(tempDir, 'json-echo.json'), '{}');

        expect(await resolveRoot(nested)).toBe(tempDir);
    });

    it('recognizes db.json as a marker', async () => {
        const nested = join(tempDir, 'a');
        await mkdir(nested);
        await writeFile(join(nested, 'db.json'), '{}');

        expect(await resolveRoot(nested)).toBe(nested);
    });

    it('ignores a directory named like a config file', async () => {
        const nested = join(tempDir, 'project');
        await mkdir(join(nested, 'json-echo.json'), { recursive: true });
        await writeFile(join(tempDir, '.db.json'), '{}');

        expect(await resolveRoot(nested)).toBe(tempDir);
    });
});

describe('FileSystemManager', () => {
    let tempDir: string;
    let fs: FileSystemManager;

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), 'json-echo-fs-'));
        fs = await FileSystemManager.create(tempDir);
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    describe('resolvePath', () => {
        it('joins relative paths onto the root', () => {
            expect(fs.resolvePath('data/users.json')).toBe(
                join(tempDir, 'data', 'users.json'),
            );
        });

        it('passes absolute paths through', () => {
            expect(fs.resolvePath('/etc/hosts')).toBe('/etc/hosts');
        });
    });

    describe('loadFile', () => {
        it('reads file bytes relative to the root', async () => {
            await writeFile(join(tempDir, 'users.json'), '[1,2]');

            const bytes = await fs.loadFile('users.json');

            expect(bytes.toString('utf-8')).toBe('[1,2]');
        });

        it('reads absolute paths unchanged', async () => {
            const other = await mkdtemp(join(tmpdir(), 'json-echo-other-'));
            await writeFile(join(other, 'a.json'), 'true');

            try {
                const bytes = await fs.loadFile(join(other, 'a.json'));
                expect(bytes.toString('utf-8')).toBe('true');
            } finally {
                await rm(other, { recursive: true, force: true });
            }
        });

        it('throws NotFoundError for a missing file', async () => {
            const error = await fs.loadFile('missing.json').catch((e) => e);

            expect(error).toBeInstanceOf(NotFoundError);
            expect(error.path).toBe(join(tempDir, 'missing.json'));
        });

        it('throws IsADirectoryError for a directory', async () => {
            await mkdir(join(tempDir, 'folder'));

            await expect(fs.loadFile('folder')).rejects.toThrow(
                IsADirectoryError,
            );
        });

        it('throws FileIOError when aborted', async () => {
            await writeFile(join(tempDir, 'users.json'), '[]');
            const controller = new AbortController();
            controller.abort();

            await expect(
                fs.loadFile('users.json', { signal: controller.signal }),
            ).rejects.toThrow(FileIOError);
        });
    });

    describe('saveFile', () => {
        it('creates missing parent directories', async () => {
            await fs.saveFile('deep/nested/out.json', '{"a":1}');

            const content = await readFile(
                join(tempDir, 'deep', 'nested', 'out.json'),
                'utf-8',
            );
            expect(content).toBe('{"a":1}');
        });

        it('overwrites existing content and leaves no temporary files', async () => {
            await fs.saveFile('out.json', 'first');
            await fs.saveFile('out.json', Buffer.from('second'));

            expect(await readFile(join(tempDir, 'out.json'), 'utf-8')).toBe(
                'second',
            );
            expect(await readdir(tempDir)).toEqual(['out.json']);
        });

        it('throws IsADirectoryError when the target is a directory', async () => {
            await mkdir(join(tempDir, 'folder'));

            await expect(fs.saveFile('folder', 'x')).rejects.toThrow(
                IsADirectoryError,
            );
        });

        it('keeps the previous content when aborted', async () => {
            await writeFile(join(tempDir, 'out.json'), 'original');
            const controller = new AbortController();
            controller.abort();

            await expect(
                fs.saveFile('out.json', 'replacement', {
                    signal: controller.signal,
                }),
            ).rejects.toThrow(FileIOError);

            expect(await readFile(join(tempDir, 'out.json'), 'utf-8')).toBe(
                'original',
            );
            expect(await readdir(tempDir)).toEqual(['out.json']);
        });
    });

    describe('findConfigFile', () => {
        it('returns undefined when no config file exists', async () => {
            expect(await fs.findConfigFile()).toBeUndefined();
        });

        it('prefers json-echo.json over db.json', async () => {
            await writeFile(join(tempDir, 'db.json'), '{}');
            await writeFile(join(tempDir, 'json-echo.json'), '{}');

            expect(await fs.findConfigFile()).toBe(
                join(tempDir, 'json-echo.json'),
            );
        });

        it('falls back to .db.json', async () => {
            await writeFile(join(tempDir, '.db.json'), '{}');

            expect(await fs.findConfigFile()).toBe(join(tempDir, '.db.json'));
        });
    });
});

describe('toFileSystemError', () => {
    function errno(code: string): NodeJS.ErrnoException {
        const error: NodeJS.ErrnoException = new Error(code);
        error.code = code;
        return error;
    }

    it('maps errno codes to error kinds', () => {
        expect(toFileSystemError('/x', errno('ENOENT'))).toBeInstanceOf(
            NotFoundError,
        );
        expect(toFileSystemError('/x', errno('EISDIR'))).toBeInstanceOf(
            IsADirectoryError,
        );
        expect(toFileSystemError('/x', errno('EACCES'))).toBeInstanceOf(
            PermissionDeniedError,
        );
        expect(toFileSystemError('/x', errno('EPERM'))).toBeInstanceOf(
            PermissionDeniedError,
        );
    });

    it('wraps other failures in FileIOError with the cause', () => {
        const cause = errno('ENOSPC');
        const error = toFileSystemError('/x', cause);

        expect(error).toBeInstanceOf(FileIOError);
        expect(error.path).toBe('/x');
        expect(error.message).toBe('I/O error on /x: ENOSPC');
    });
});
