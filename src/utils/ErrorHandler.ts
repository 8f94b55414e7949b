/**
 * Error types for the collaborators a session depends on
 */
export enum HoneypotErrorType {
    TRANSPORT_ERROR = 'TRANSPORT_ERROR',
    FETCH_ERROR = 'FETCH_ERROR',
    STORAGE_ERROR = 'STORAGE_ERROR',
    PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
    ALERT_ERROR = 'ALERT_ERROR',
    CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export interface RecentError {
    type: HoneypotErrorType;
    message: string;
    timestamp: number;
    context?: Record<string, unknown>;
}

export interface ErrorStats {
    errorCounts: Record<string, number>;
    lastErrors: Record<string, number>;
    recentErrors: RecentError[];
}

/**
 * Collects failures that are recovered locally so they stay visible
 * in the logs and on /metrics instead of reaching the attacker.
 */
export class ErrorHandler {
    private readonly errorCounts: Map<HoneypotErrorType, number> = new Map();
    private readonly lastErrors: Map<HoneypotErrorType, number> = new Map();
    private recentErrors: RecentError[] = [];

    constructor(private readonly maxRecentErrors = 50) {}

    /**
     * Log and count a recovered failure
     */
    handle(errorType: HoneypotErrorType, error: unknown, context?: Record<string, unknown>): void {
        const errorMessage = error instanceof Error ? error.message : String(error);
        const now = Date.now();

        this.errorCounts.set(errorType, (this.errorCounts.get(errorType) || 0) + 1);
        this.lastErrors.set(errorType, now);

        this.recentErrors.push({ type: errorType, message: errorMessage, timestamp: now, context });
        if (this.recentErrors.length > this.maxRecentErrors) {
            this.recentErrors = this.recentErrors.slice(-this.maxRecentErrors);
        }

        console.error(`Operation failed (${errorType}):`, errorMessage, context ?? {});
    }

    /**
     * Get error statistics
     */
    getErrorStats(): ErrorStats {
        const errorCounts: Record<string, number> = {};
        const lastErrors: Record<string, number> = {};

        for (const [type, count] of this.errorCounts.entries()) {
            errorCounts[type] = count;
        }

        for (const [type, timestamp] of this.lastErrors.entries()) {
            lastErrors[type] = timestamp;
        }

        return {
            errorCounts,
            lastErrors,
            recentErrors: this.recentErrors.map((entry) => ({ ...entry })),
        };
    }

    getErrorCount(errorType: HoneypotErrorType): number {
        return this.errorCounts.get(errorType) || 0;
    }

    /**
     * Reset error statistics
     */
    resetErrorStats(): void {
        this.errorCounts.clear();
        this.lastErrors.clear();
        this.recentErrors = [];
    }
}

// Export singleton instance
export const errorHandler = new ErrorHandler();
