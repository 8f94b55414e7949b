import { describe, test, expect, afterEach, jest } from '@jest/globals';
import { formatLogLine, initializeLogging, resetLogging, shouldLog } from '../src/utils/logger/logger.js';

const NOW = new Date('2025-11-09T10:30:15.000Z');

describe('logger', () => {
    afterEach(() => {
        resetLogging();
        jest.restoreAllMocks();
    });

    test('shouldLog compares against the threshold', () => {
        expect(shouldLog('warn', 'info')).toBe(true);
        expect(shouldLog('info', 'info')).toBe(true);
        expect(shouldLog('debug', 'info')).toBe(false);
        expect(shouldLog('trace', 'trace')).toBe(true);
    });

    test('formats json lines with trailing data', () => {
        const line = formatLogLine('info', ['Session closed', { commands: 3 }], 'json', NOW);

        expect(JSON.parse(line)).toEqual({
            timestamp: '2025-11-09T10:30:15.000Z',
            level: 'info',
            message: 'Session closed',
            data: [{ commands: 3 }],
        });
        expect(line.endsWith('}\n')).toBe(true);
    });

    test('formats errors as name and message in json', () => {
        const line = formatLogLine('error', ['Operation failed', new RangeError('bad')], 'json', NOW);

        expect(JSON.parse(line).data).toEqual([{ name: 'RangeError', message: 'bad' }]);
    });

    test('formats pretty lines', () => {
        expect(formatLogLine('warn', ['Rejected connection', { ip: '203.0.113.5' }], 'pretty', NOW)).toBe(
            "[2025-11-09T10:30:15.000Z] [WARN] Rejected connection { ip: '203.0.113.5' }\n",
        );
    });

    test('routes console output through the level filter', () => {
        const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
        initializeLogging({ level: 'warn', format: 'pretty', output: 'stdout', retentionDays: 7 });

        console.info('hidden');
        console.warn('shown');

        expect(write).toHaveBeenCalledTimes(1);
        expect(String(write.mock.calls[0][0])).toMatch(/\[WARN\] shown\n$/);
    });
});
