/**
 * The slice of an SSH channel the controller writes to
 */
export interface ChannelWriter {
    write(data: string): void;
    exit(code: number): void;
    end(): void;
}

export type SessionPhase = 'connected' | 'authenticating' | 'authenticated' | 'shell_active' | 'closed';

export interface SessionSummary {
    sessionId: string;
    sourceIp: string;
    sourcePort: number;
    phase: SessionPhase;
    startedAt: string;
    username: string | null;
    authAttempts: number;
    commands: number;
    downloads: number;
}
