import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { MetricsCollector, OTHER_COMMANDS, getMetricsCollector } from '../src/utils/logger/metricsCollector.js';

describe('MetricsCollector', () => {
    let collector: MetricsCollector;

    beforeEach(() => {
        collector = new MetricsCollector();
    });

    afterEach(() => {
        collector.removeAllListeners();
    });

    test('counts admitted and rejected connections and unique addresses', () => {
        collector.recordConnection('203.0.113.1');
        collector.recordConnection('203.0.113.1');
        collector.recordConnection('203.0.113.2', 'rate_limited');
        collector.recordConnection('203.0.113.3', 'blacklisted');

        const { connections } = collector.getSnapshot();
        expect(connections).toEqual({
            admitted: 2,
            rejected: { blacklisted: 1, capacity: 0, rate_limited: 1 },
            uniqueIPs: 3,
        });
    });

    test('tracks open sessions', () => {
        collector.recordSessionOpened('a');
        collector.recordSessionOpened('b');
        collector.recordSessionClosed('a');

        expect(collector.getSnapshot().sessions).toEqual({ opened: 2, closed: 1, active: 1 });
    });

    test('ranks commands by their first word', () => {
        collector.recordCommand('uname -a');
        collector.recordCommand('wget http://files.example.test/x');
        collector.recordCommand('uname -r');
        collector.recordCommand('   ');

        expect(collector.getSnapshot().commands).toEqual({
            total: 4,
            topCommands: [
                { command: 'uname', count: 2 },
                { command: 'wget', count: 1 },
            ],
        });
    });

    test('folds unknown commands into one bucket', () => {
        for (let i = 0; i < 50; i++) {
            collector.recordCommand(`./payload-${i} --run`);
        }
        collector.recordCommand('whoami');

        expect(collector.getSnapshot().commands).toEqual({
            total: 51,
            topCommands: [
                { command: OTHER_COMMANDS, count: 50 },
                { command: 'whoami', count: 1 },
            ],
        });
    });

    test('sums downloads and emits an event for each', () => {
        const listener = jest.fn();
        collector.on('download', listener);

        collector.recordDownload(100);
        collector.recordDownload(28);
        collector.recordAuthAttempt();

        const snapshot = collector.getSnapshot();
        expect(snapshot.downloads).toEqual({ total: 2, bytes: 128 });
        expect(snapshot.authAttempts).toBe(1);
        expect(listener).toHaveBeenCalledWith({ size: 100 });
    });

    test('reset clears every counter', () => {
        collector.recordConnection('203.0.113.1', 'capacity');
        collector.recordCommand('id');
        collector.reset();

        const snapshot = collector.getSnapshot();
        expect(snapshot.connections.rejected.capacity).toBe(0);
        expect(snapshot.connections.uniqueIPs).toBe(0);
        expect(snapshot.commands.total).toBe(0);
    });

    test('getMetricsCollector returns one shared instance', () => {
        expect(getMetricsCollector()).toBe(getMetricsCollector());
    });
});
