import type { HoneypotConfig } from '../config/types.js';
import { RateLimiter } from './RateLimiter.js';

export type RejectionReason = 'blacklisted' | 'capacity' | 'rate_limited';

export type AdmissionDecision =
    | { admitted: true; ip: string }
    | { admitted: false; ip: string; reason: RejectionReason };

export interface AdmissionOptions {
    maxConnections: number;
    rateLimitEnabled: boolean;
    whitelistIps: string[];
    blacklistIps: string[];
    rateLimiter: RateLimiter;
}

/**
 * Strips the IPv4-mapped prefix dual-stack sockets report
 */
export function normalizeIp(ip: string): string {
    const mapped = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i.exec(ip);
    return mapped ? mapped[1] : ip;
}

/**
 * Gate applied before any session object exists. Checks run in order:
 * blacklist, global session cap, whitelist (skips the rate limit), rate limit.
 */
export class AdmissionControl {
    private readonly whitelist: Set<string>;
    private readonly blacklist: Set<string>;

    constructor(private readonly options: AdmissionOptions) {
        this.whitelist = new Set(options.whitelistIps.map(normalizeIp));
        this.blacklist = new Set(options.blacklistIps.map(normalizeIp));
    }

    static fromConfig(config: HoneypotConfig): AdmissionControl {
        return new AdmissionControl({
            maxConnections: config.server.maxConnections,
            rateLimitEnabled: config.security.rateLimitEnabled,
            whitelistIps: config.security.whitelistIps,
            blacklistIps: config.security.blacklistIps,
            rateLimiter: new RateLimiter({
                max: config.security.maxConnectionsPerIp,
                windowMs: config.security.rateLimitWindowSecs * 1000,
            }),
        });
    }

    decide(rawIp: string, activeSessions: number): AdmissionDecision {
        const ip = normalizeIp(rawIp);

        if (this.blacklist.has(ip)) {
            return { admitted: false, ip, reason: 'blacklisted' };
        }
        if (activeSessions >= this.options.maxConnections) {
            return { admitted: false, ip, reason: 'capacity' };
        }
        if (this.whitelist.has(ip) || !this.options.rateLimitEnabled) {
            return { admitted: true, ip };
        }
        if (!this.options.rateLimiter.admit(ip)) {
            return { admitted: false, ip, reason: 'rate_limited' };
        }
        return { admitted: true, ip };
    }

    trackedAddresses(): number {
        return this.options.rateLimiter.size();
    }
}
