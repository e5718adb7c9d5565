/**
 * Tests for the leveled logger
 */

import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel, type LogSink } from '../src/index.js';

function capture(): LogSink & { out: string[]; err: string[] } {
    const out: string[] = [];
    const err: string[] = [];
    return {
        out,
        err,
        log: (line) => out.push(line),
        error: (line) => err.push(line),
    };
}

describe('createLogger', () => {
    it('drops messages above the configured level', () => {
        const sink = capture();
        const logger = createLogger('warn', sink);

        logger.info('hidden');
        logger.debug('hidden');
        logger.warn('careful');
        logger.error('broken');

        expect(sink.out).toEqual([]);
        expect(sink.err).toHaveLength(2);
        expect(sink.err[0]).toContain('careful');
        expect(sink.err[1]).toContain('broken');
    });

    it('writes info and debug to the log stream', () => {
        const sink = capture();
        const logger = createLogger('debug', sink);

        logger.info('started');
        logger.debug('matched');

        expect(sink.out).toHaveLength(2);
        expect(sink.out[0]).toContain('started');
        expect(sink.out[1]).toContain('matched');
        expect(sink.err).toEqual([]);
    });

    it('defaults to info', () => {
        const sink = capture();
        const logger = createLogger(undefined, sink);

        logger.debug('hidden');
        logger.info('shown');

        expect(logger.level).toBe('info');
        expect(sink.out).toHaveLength(1);
    });
});

describe('isLogLevel', () => {
    it('accepts only known levels', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
    });
});
