import type { FakeFilesystem } from '../filesystem/FakeFilesystem.js';

export interface ShellState {
    cwd: string;
    env: Record<string, string>;
    fs: FakeFilesystem;
    history: string[];
    /** Set by exit/logout; the session ends once the reply is sent */
    exitRequested: boolean;
}

/**
 * A file the attacker fetched that landed in the content store
 */
export interface CapturedDownload {
    url: string;
    /** Lowercase hex SHA-256 of the body */
    digest: string;
    size: number;
    /** Location of the stored copy on the honeypot host */
    path: string;
}

export interface ShellHooks {
    onDownload?: (download: CapturedDownload) => void | Promise<void>;
}

export interface FetchResult {
    url: string;
    status: number;
    statusText: string;
    contentType?: string;
    bytes: Buffer;
}

export type FetchErrorKind = 'dns' | 'connect' | 'timeout' | 'too_large' | 'invalid_url' | 'network';

export class FetchError extends Error {
    constructor(
        message: string,
        public readonly kind: FetchErrorKind,
    ) {
        super(message);
        this.name = 'FetchError';
    }
}

export interface Fetcher {
    fetch(url: string): Promise<FetchResult>;
}

/**
 * Where fetched bodies are kept; implemented by ContentStore
 */
export interface ContentSink {
    store(content: Buffer): Promise<string>;
    pathFor(digest: string): string;
}

export interface CommandContext {
    state: ShellState;
    hostname: string;
    now: () => Date;
    hooks: ShellHooks;
    fetcher?: Fetcher;
    contentStore?: ContentSink;
}

export type CommandHandler = (args: string[], ctx: CommandContext) => string | Promise<string>;
