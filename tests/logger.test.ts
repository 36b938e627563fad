import assert from 'node:assert/strict';
import test, { afterEach } from 'node:test';
import {
    createLogger,
    getLogLevel,
    setLogLevel,
    setLogSink,
    type LogData,
    type LogSink,
} from '../src/lib/logger.ts';

type Line = [level: string, message: string, data: LogData | undefined];

function recordingSink(lines: Line[]): LogSink {
    return {
        debug: (message, data) => lines.push(['debug', message, data]),
        info: (message, data) => lines.push(['info', message, data]),
        warn: (message, data) => lines.push(['warn', message, data]),
        error: (message, data) => lines.push(['error', message, data]),
    };
}

afterEach(() => {
    setLogSink();
    setLogLevel('info');
});

test('messages are prefixed with the logger scope', () => {
    const lines: Line[] = [];
    setLogSink(recordingSink(lines));
    const logger = createLogger('ingest');

    logger.info('scan started', { root: 'project' });
    logger.success('scan finished');
    logger.error('scan failed', { error: 'boom' });

    assert.deepEqual(lines, [
        ['info', '[ingest] scan started', { root: 'project' }],
        ['info', '[ingest] ✓ scan finished', undefined],
        ['error', '[ingest] scan failed', { error: 'boom' }],
    ]);
    assert.equal(logger.scope, 'ingest');
});

test('lines below the current level are dropped', () => {
    const lines: Line[] = [];
    setLogSink(recordingSink(lines));
    const logger = createLogger('runtime');

    logger.debug('hidden');
    setLogLevel('warn');
    assert.equal(getLogLevel(), 'warn');
    logger.info('hidden too');
    logger.success('also hidden');
    logger.warn('shown');

    setLogLevel('debug');
    logger.debug('now shown');

    assert.deepEqual(
        lines.map(([level, message]) => `${level} ${message}`),
        ['warn [runtime] shown', 'debug [runtime] now shown'],
    );
});

test('the silent level drops errors too', () => {
    const lines: Line[] = [];
    setLogSink(recordingSink(lines));
    setLogLevel('silent');
    createLogger('explain').error('quiet');
    assert.deepEqual(lines, []);
});
