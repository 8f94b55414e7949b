import { describe, test, expect, beforeEach } from '@jest/globals';
import { RateLimiter } from '../src/security/RateLimiter.js';

describe('RateLimiter', () => {
    let clock: number;
    let limiter: RateLimiter;

    beforeEach(() => {
        clock = 1_000_000;
        limiter = new RateLimiter({ max: 3, windowMs: 60_000, now: () => clock });
    });

    test('should admit an unseen address with a count of 1', () => {
        expect(limiter.admit('10.0.0.1')).toBe(true);
        expect(limiter.count('10.0.0.1')).toBe(1);
    });

    test('should admit up to the maximum and reject after', () => {
        expect(limiter.admit('10.0.0.1')).toBe(true);
        expect(limiter.admit('10.0.0.1')).toBe(true);
        expect(limiter.admit('10.0.0.1')).toBe(true);
        expect(limiter.admit('10.0.0.1')).toBe(false);
        expect(limiter.admit('10.0.0.1')).toBe(false);
        expect(limiter.count('10.0.0.1')).toBe(3);
    });

    test('should track addresses independently', () => {
        for (let i = 0; i < 3; i++) {
            limiter.admit('10.0.0.1');
        }

        expect(limiter.admit('10.0.0.1')).toBe(false);
        expect(limiter.admit('10.0.0.2')).toBe(true);
        expect(limiter.count('10.0.0.2')).toBe(1);
    });

    test('should restart the window once it has expired', () => {
        for (let i = 0; i < 3; i++) {
            limiter.admit('10.0.0.1');
        }
        expect(limiter.admit('10.0.0.1')).toBe(false);

        clock += 60_000;

        expect(limiter.admit('10.0.0.1')).toBe(true);
        expect(limiter.count('10.0.0.1')).toBe(1);
    });

    test('should keep rejecting just before the window ends', () => {
        for (let i = 0; i < 3; i++) {
            limiter.admit('10.0.0.1');
        }

        clock += 59_999;

        expect(limiter.admit('10.0.0.1')).toBe(false);
    });

    test('should evict expired entries lazily', () => {
        limiter.admit('10.0.0.1');
        limiter.admit('10.0.0.2');
        expect(limiter.size()).toBe(2);

        clock += 30_000;
        limiter.admit('10.0.0.3');
        clock += 30_000;

        expect(limiter.count('10.0.0.1')).toBe(0);
        expect(limiter.size()).toBe(1);
    });

    test('should restart an expired address between full sweeps', () => {
        limiter.admit('10.0.0.1');
        clock += 50_000;
        for (let i = 0; i < 3; i++) {
            limiter.admit('10.0.0.2');
        }
        clock += 50_000;
        limiter.admit('10.0.0.3');
        clock += 30_000;

        expect(limiter.admit('10.0.0.2')).toBe(true);
        expect(limiter.count('10.0.0.2')).toBe(1);
        expect(limiter.size()).toBe(2);
    });

    test('should report 0 for an address never seen', () => {
        expect(limiter.count('192.0.2.1')).toBe(0);
    });
});
