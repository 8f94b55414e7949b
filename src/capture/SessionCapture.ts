import { randomUUID } from 'crypto';
import { GENESIS_HASH, computeRecordHash } from './chain.js';
import type {
    AuthAttempt,
    AuthMethod,
    CommandExecution,
    FileDownload,
    SessionEvent,
    SessionEventData,
    SessionEventKind,
    SessionLog,
} from './types.js';

export interface SessionCaptureOptions {
    sourceIp: string;
    sourcePort: number;
    sessionId?: string;
    now?: () => Date;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const member of Object.values(value)) {
            deepFreeze(member);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Append-only record of one session. Every record is chained to the one
 * before it; see verifySessionLog.
 */
export class SessionCapture {
    private readonly log: SessionLog;
    private readonly now: () => Date;
    private seq = 0;
    private finalized?: Readonly<SessionLog>;

    constructor(options: SessionCaptureOptions) {
        this.now = options.now ?? (() => new Date());
        this.log = {
            sessionId: options.sessionId ?? randomUUID(),
            sourceIp: options.sourceIp,
            sourcePort: options.sourcePort,
            startedAt: this.now().toISOString(),
            endedAt: null,
            username: null,
            authenticated: false,
            authAttempts: [],
            commands: [],
            downloads: [],
            events: [],
            chainHead: GENESIS_HASH,
        };
    }

    get sessionId(): string {
        return this.log.sessionId;
    }

    get isFinalized(): boolean {
        return this.finalized !== undefined;
    }

    recordAuth(username: string, password: string, success: boolean, method: AuthMethod = 'password'): AuthAttempt {
        const unhashed = { kind: 'auth' as const, ...this.stamp(), method, username, password, success };
        const record: AuthAttempt = { ...unhashed, hash: computeRecordHash(unhashed) };

        this.log.authAttempts.push(record);
        this.log.username = username;
        this.log.authenticated = this.log.authenticated || success;
        this.log.chainHead = record.hash;
        return record;
    }

    recordCommand(input: string, output: string): CommandExecution {
        const unhashed = { kind: 'command' as const, ...this.stamp(), input, output };
        const record: CommandExecution = { ...unhashed, hash: computeRecordHash(unhashed) };

        this.log.commands.push(record);
        this.log.chainHead = record.hash;
        return record;
    }

    recordDownload(url: string, sha256: string, size: number, path: string): FileDownload {
        const unhashed = { kind: 'download' as const, ...this.stamp(), url, sha256, size, path };
        const record: FileDownload = { ...unhashed, hash: computeRecordHash(unhashed) };

        this.log.downloads.push(record);
        this.log.chainHead = record.hash;
        return record;
    }

    recordEvent(type: SessionEventKind, data: SessionEventData = {}): SessionEvent {
        const unhashed = { kind: 'event' as const, ...this.stamp(), type, data: { ...data } };
        const record: SessionEvent = { ...unhashed, hash: computeRecordHash(unhashed) };

        this.log.events.push(record);
        this.log.chainHead = record.hash;
        return record;
    }

    /**
     * Stamps `endedAt` and freezes the log. Later calls return the same object.
     */
    finalize(): Readonly<SessionLog> {
        if (!this.finalized) {
            this.log.endedAt = this.now().toISOString();
            this.finalized = deepFreeze(structuredClone(this.log));
        }
        return this.finalized;
    }

    /**
     * Copy of the log as it stands, without finalizing
     */
    snapshot(): SessionLog {
        return structuredClone(this.log);
    }

    private stamp(): { seq: number; timestamp: string; prevHash: string } {
        if (this.finalized) {
            throw new Error('Session log is finalized');
        }
        return {
            seq: ++this.seq,
            timestamp: this.now().toISOString(),
            prevHash: this.log.chainHead,
        };
    }
}
