export type AuthMethod = 'password' | 'keyboard-interactive';

export type SessionEventKind =
    | 'pty_request'
    | 'shell_request'
    | 'exec_request'
    | 'env_request'
    | 'window_change'
    | 'sftp_request'
    | 'subsystem_request'
    | 'channel_close'
    | 'auth_method_rejected'
    | 'idle_timeout'
    | 'transport_error';

export type SessionEventData = Record<string, string | number | boolean | null>;

/**
 * Fields every record carries to take part in the hash chain
 */
export interface ChainedRecord {
    /** Shared across all record kinds of one session, starting at 1 */
    seq: number;
    timestamp: string;
    prevHash: string;
    hash: string;
}

export interface AuthAttempt extends ChainedRecord {
    kind: 'auth';
    method: AuthMethod;
    username: string;
    password: string;
    success: boolean;
}

export interface CommandExecution extends ChainedRecord {
    kind: 'command';
    input: string;
    output: string;
}

export interface FileDownload extends ChainedRecord {
    kind: 'download';
    url: string;
    sha256: string;
    size: number;
    path: string;
}

export interface SessionEvent extends ChainedRecord {
    kind: 'event';
    type: SessionEventKind;
    data: SessionEventData;
}

export type SessionRecord = AuthAttempt | CommandExecution | FileDownload | SessionEvent;

export interface SessionLog {
    sessionId: string;
    sourceIp: string;
    sourcePort: number;
    startedAt: string;
    endedAt: string | null;
    /** Last username offered */
    username: string | null;
    authenticated: boolean;
    authAttempts: AuthAttempt[];
    commands: CommandExecution[];
    downloads: FileDownload[];
    events: SessionEvent[];
    /** Hash of the newest record, or the genesis hash */
    chainHead: string;
}
