import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ErrorHandler, HoneypotErrorType } from '../src/utils/ErrorHandler.js';

describe('ErrorHandler', () => {
    let handler: ErrorHandler;

    beforeEach(() => {
        handler = new ErrorHandler(3);
        jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('logs the failure with its context', () => {
        const consoleError = jest.spyOn(console, 'error');
        handler.handle(HoneypotErrorType.PERSISTENCE_ERROR, new Error('disk full'), { sessionId: 's1' });

        expect(consoleError).toHaveBeenCalledWith('Operation failed (PERSISTENCE_ERROR):', 'disk full', {
            sessionId: 's1',
        });
    });

    test('counts errors per type', () => {
        handler.handle(HoneypotErrorType.ALERT_ERROR, new Error('a'));
        handler.handle(HoneypotErrorType.ALERT_ERROR, 'b');
        handler.handle(HoneypotErrorType.FETCH_ERROR, new Error('c'));

        const stats = handler.getErrorStats();
        expect(stats.errorCounts).toEqual({ ALERT_ERROR: 2, FETCH_ERROR: 1 });
        expect(typeof stats.lastErrors.ALERT_ERROR).toBe('number');
        expect(handler.getErrorCount(HoneypotErrorType.ALERT_ERROR)).toBe(2);
        expect(handler.getErrorCount(HoneypotErrorType.STORAGE_ERROR)).toBe(0);
    });

    test('keeps only the most recent errors', () => {
        for (const message of ['1', '2', '3', '4']) {
            handler.handle(HoneypotErrorType.TRANSPORT_ERROR, new Error(message));
        }

        expect(handler.getErrorStats().recentErrors.map((entry) => entry.message)).toEqual(['2', '3', '4']);
    });

    test('resets statistics', () => {
        handler.handle(HoneypotErrorType.STORAGE_ERROR, new Error('x'));
        handler.resetErrorStats();

        expect(handler.getErrorStats()).toEqual({ errorCounts: {}, lastErrors: {}, recentErrors: [] });
    });
});
