interface WindowEntry {
    count: number;
    windowStart: number;
}

export interface RateLimiterOptions {
    /** Connections admitted per address inside one window */
    max: number;
    windowMs: number;
    now?: () => number;
}

/**
 * Per-address admission counter over a fixed window that restarts on the
 * first admission after it expires.
 *
 * There is no timer. Each call checks only the entry it touches, and the
 * whole table is swept at most once per window, so an admission costs O(1)
 * amortised and the table holds addresses seen within the last two windows.
 * All methods are synchronous; the table is never observed half-updated.
 */
export class RateLimiter {
    private readonly entries = new Map<string, WindowEntry>();
    private readonly max: number;
    private readonly windowMs: number;
    private readonly now: () => number;
    private lastSweep?: number;

    constructor(options: RateLimiterOptions) {
        this.max = options.max;
        this.windowMs = options.windowMs;
        this.now = options.now ?? Date.now;
    }

    /**
     * Records a connection attempt from `ip` and reports whether it may proceed.
     * A rejected attempt does not count against the address.
     */
    admit(ip: string): boolean {
        const now = this.now();
        this.maybeSweep(now);

        const entry = this.current(ip, now);
        if (!entry) {
            this.entries.set(ip, { count: 1, windowStart: now });
            return true;
        }

        if (entry.count < this.max) {
            entry.count++;
            return true;
        }

        return false;
    }

    count(ip: string): number {
        const now = this.now();
        this.maybeSweep(now);
        return this.current(ip, now)?.count ?? 0;
    }

    /**
     * Number of addresses currently tracked. Always sweeps first.
     */
    size(): number {
        this.sweep(this.now());
        return this.entries.size;
    }

    private isExpired(entry: WindowEntry, now: number): boolean {
        return now - entry.windowStart >= this.windowMs;
    }

    private current(ip: string, now: number): WindowEntry | undefined {
        const entry = this.entries.get(ip);
        if (entry && this.isExpired(entry, now)) {
            this.entries.delete(ip);
            return undefined;
        }
        return entry;
    }

    private maybeSweep(now: number): void {
        if (this.lastSweep === undefined) {
            this.lastSweep = now;
        } else if (now - this.lastSweep >= this.windowMs) {
            this.sweep(now);
        }
    }

    private sweep(now: number): void {
        this.lastSweep = now;
        for (const [ip, entry] of this.entries) {
            if (this.isExpired(entry, now)) {
                this.entries.delete(ip);
            }
        }
    }
}
