import { EventEmitter } from 'events';
import type { RejectionReason } from '../../security/AdmissionControl.js';
import { isBuiltin } from '../../shell/commands.js';

/** Bucket for every first word that is not a shell builtin */
export const OTHER_COMMANDS = '(other)';

/**
 * Point-in-time view of the honeypot counters
 */
export interface MetricsSnapshot {
    uptimeSeconds: number;
    connections: {
        admitted: number;
        rejected: Record<RejectionReason, number>;
        uniqueIPs: number;
    };
    sessions: {
        opened: number;
        closed: number;
        active: number;
    };
    authAttempts: number;
    commands: {
        total: number;
        topCommands: Array<{ command: string; count: number }>;
    };
    downloads: {
        total: number;
        bytes: number;
    };
    memoryUsage: NodeJS.MemoryUsage;
}

/**
 * Metrics collector for connection, session and capture activity
 */
export class MetricsCollector extends EventEmitter {
    private readonly startedAt = Date.now();
    private readonly maxTopCommands = 10;

    private admitted = 0;
    private rejected: Record<RejectionReason, number> = { blacklisted: 0, capacity: 0, rate_limited: 0 };
    private uniqueIPs: Set<string> = new Set();
    private sessionsOpened = 0;
    private sessionsClosed = 0;
    private authAttempts = 0;
    private totalCommands = 0;
    private commandCounts: Map<string, number> = new Map();
    private totalDownloads = 0;
    private downloadBytes = 0;

    constructor() {
        super();
        this.setMaxListeners(20);
    }

    recordConnection(ip: string, rejectedFor?: RejectionReason): void {
        this.uniqueIPs.add(ip);
        if (rejectedFor) {
            this.rejected[rejectedFor]++;
        } else {
            this.admitted++;
        }
        this.emit('connection', { ip, rejectedFor });
    }

    recordSessionOpened(sessionId: string): void {
        this.sessionsOpened++;
        this.emit('sessionOpened', { sessionId });
    }

    recordSessionClosed(sessionId: string): void {
        this.sessionsClosed++;
        this.emit('sessionClosed', { sessionId });
    }

    recordAuthAttempt(): void {
        this.authAttempts++;
    }

    /**
     * Counts a command by its first word. Unknown words share one bucket so
     * the table stays bounded by the builtin list.
     */
    recordCommand(input: string): void {
        this.totalCommands++;
        const word = input.trim().split(/\s+/)[0];
        if (word) {
            const name = isBuiltin(word) ? word : OTHER_COMMANDS;
            this.commandCounts.set(name, (this.commandCounts.get(name) || 0) + 1);
        }
    }

    recordDownload(size: number): void {
        this.totalDownloads++;
        this.downloadBytes += size;
        this.emit('download', { size });
    }

    getSnapshot(): MetricsSnapshot {
        const topCommands = Array.from(this.commandCounts.entries())
            .map(([command, count]) => ({ command, count }))
            .sort((a, b) => b.count - a.count || a.command.localeCompare(b.command))
            .slice(0, this.maxTopCommands);

        return {
            uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
            connections: {
                admitted: this.admitted,
                rejected: { ...this.rejected },
                uniqueIPs: this.uniqueIPs.size,
            },
            sessions: {
                opened: this.sessionsOpened,
                closed: this.sessionsClosed,
                active: this.sessionsOpened - this.sessionsClosed,
            },
            authAttempts: this.authAttempts,
            commands: {
                total: this.totalCommands,
                topCommands,
            },
            downloads: {
                total: this.totalDownloads,
                bytes: this.downloadBytes,
            },
            memoryUsage: process.memoryUsage(),
        };
    }

    /**
     * Reset all metrics
     */
    reset(): void {
        this.admitted = 0;
        this.rejected = { blacklisted: 0, capacity: 0, rate_limited: 0 };
        this.uniqueIPs.clear();
        this.sessionsOpened = 0;
        this.sessionsClosed = 0;
        this.authAttempts = 0;
        this.totalCommands = 0;
        this.commandCounts.clear();
        this.totalDownloads = 0;
        this.downloadBytes = 0;
    }
}

// Singleton instance
let metricsCollector: MetricsCollector | null = null;

/**
 * Get singleton metrics collector instance
 */
export function getMetricsCollector(): MetricsCollector {
    if (!metricsCollector) {
        metricsCollector = new MetricsCollector();
    }
    return metricsCollector;
}
