import { setTimeout as delay } from 'timers/promises';
import { SessionCapture } from '../capture/SessionCapture.js';
import type { SessionLogSink } from '../capture/SessionStore.js';
import type { AuthMethod, SessionEventData, SessionEventKind, SessionLog } from '../capture/types.js';
import type { ShellEngine } from '../shell/ShellEngine.js';
import type { CapturedDownload, ShellState } from '../shell/types.js';
import { ErrorHandler, HoneypotErrorType, errorHandler } from '../utils/ErrorHandler.js';
import type { MetricsCollector } from '../utils/logger/metricsCollector.js';
import type { AlertSink } from '../utils/webhook.js';
import { LineDiscipline } from './lineDiscipline.js';
import type { ChannelWriter, SessionPhase, SessionSummary } from './types.js';

export interface SessionControllerOptions {
    sourceIp: string;
    sourcePort: number;
    shell: ShellEngine;
    sink: SessionLogSink;
    alerts: AlertSink;
    metrics: MetricsCollector;
    authDelayMs: number;
    /** 0 disables the idle timer */
    sessionTimeoutSecs: number;
    /** Printed when an interactive shell opens */
    banner: string;
    /** Asks the transport to drop the connection */
    disconnect: () => void;
    errors?: ErrorHandler;
    sessionId?: string;
    now?: () => Date;
}

interface InteractiveChannel {
    channel: ChannelWriter;
    discipline: LineDiscipline;
}

function toCrlf(text: string): string {
    return text.replace(/\r?\n/g, '\r\n');
}

/**
 * Drives one SSH session from first auth request to finalized log.
 *
 * Commands are serialized through a promise queue: a command is executed,
 * recorded, then replied to before the next one starts. close() waits for
 * the queue, so a log is never finalized with a command half-recorded.
 */
export class SessionController {
    private currentPhase: SessionPhase = 'connected';
    private readonly capture: SessionCapture;
    private readonly errors: ErrorHandler;
    private readonly abort = new AbortController();
    private readonly pendingAlerts = new Set<Promise<void>>();
    private state?: ShellState;
    private ptyRequested = false;
    private interactive?: InteractiveChannel;
    private queue: Promise<void> = Promise.resolve();
    private closing?: Promise<Readonly<SessionLog>>;
    private idleTimer?: NodeJS.Timeout;

    constructor(private readonly options: SessionControllerOptions) {
        this.errors = options.errors ?? errorHandler;
        this.capture = new SessionCapture({
            sourceIp: options.sourceIp,
            sourcePort: options.sourcePort,
            sessionId: options.sessionId,
            now: options.now,
        });
        this.options.metrics.recordSessionOpened(this.capture.sessionId);
        this.touch();
    }

    get sessionId(): string {
        return this.capture.sessionId;
    }

    get phase(): SessionPhase {
        return this.currentPhase;
    }

    summary(): SessionSummary {
        const log = this.capture.snapshot();
        return {
            sessionId: log.sessionId,
            sourceIp: log.sourceIp,
            sourcePort: log.sourcePort,
            phase: this.currentPhase,
            startedAt: log.startedAt,
            username: log.username,
            authAttempts: log.authAttempts.length,
            commands: log.commands.length,
            downloads: log.downloads.length,
        };
    }

    /**
     * A method other than password or keyboard-interactive was offered
     */
    rejectAuthMethod(method: string, username: string): void {
        if (!this.accepting()) {
            return;
        }
        this.currentPhase = 'authenticating';
        this.record('auth_method_rejected', { method, username });
    }

    /**
     * Records the credential, waits out the auth delay and accepts it.
     * Resolves false only when the session closed during the delay.
     */
    async authenticate(username: string, password: string, method: AuthMethod = 'password'): Promise<boolean> {
        if (!this.accepting()) {
            return false;
        }
        this.currentPhase = 'authenticating';
        this.capture.recordAuth(username, password, true, method);
        this.options.metrics.recordAuthAttempt();
        console.info(`Accepted ${method} for ${username} from ${this.options.sourceIp}`, {
            sessionId: this.sessionId,
        });

        try {
            await delay(this.options.authDelayMs, undefined, { signal: this.abort.signal });
        } catch (error) {
            if (this.abort.signal.aborted) {
                return false;
            }
            throw error;
        }
        if (this.abort.signal.aborted) {
            return false;
        }

        // a pty or exec request may already have moved the session on
        if (this.phase === 'authenticating') {
            this.currentPhase = 'authenticated';
        }
        return true;
    }

    requestPty(term: string, cols: number, rows: number): void {
        if (!this.accepting()) {
            return;
        }
        this.ptyRequested = true;
        this.activate();
        this.record('pty_request', { term, cols, rows });
    }

    windowChange(cols: number, rows: number): void {
        if (!this.accepting()) {
            return;
        }
        this.record('window_change', { cols, rows });
    }

    setEnv(key: string, value: string): void {
        if (!this.accepting()) {
            return;
        }
        this.record('env_request', { key, value });
        this.activate().env[key] = value;
    }

    /**
     * Interactive shell: banner, prompt, then input() drives it
     */
    openShell(channel: ChannelWriter): void {
        if (!this.accepting()) {
            return;
        }
        this.record('shell_request', { pty: this.ptyRequested });
        const state = this.activate();
        this.interactive = { channel, discipline: new LineDiscipline() };
        this.reply(channel, this.options.banner + this.options.shell.prompt(state));
    }

    /**
     * One command, one reply, exit status 0
     */
    exec(command: string, channel: ChannelWriter): void {
        if (!this.accepting()) {
            return;
        }
        this.record('exec_request', { command });
        this.activate();

        this.enqueue(async () => {
            const output = await this.runCommand(command);
            if (this.currentPhase === 'closed') {
                return;
            }
            this.reply(channel, output);
            channel.exit(0);
            channel.end();
        });
    }

    /**
     * Keystrokes from the interactive channel
     */
    input(data: Buffer | string): void {
        const session = this.interactive;
        if (!session || !this.accepting()) {
            return;
        }

        const { echo, events } = session.discipline.feed(data.toString());
        if (echo && this.ptyRequested) {
            session.channel.write(echo);
        }

        for (const event of events) {
            switch (event.type) {
                case 'line':
                    this.enqueue(() => this.runInteractive(session.channel, event.line));
                    break;
                case 'interrupt':
                    this.enqueue(async () => this.writePrompt(session.channel));
                    break;
                case 'eof':
                    this.enqueue(async () => {
                        this.shellState().exitRequested = true;
                        this.reply(session.channel, 'logout\n');
                        this.finishChannel(session.channel);
                    });
                    break;
            }
        }
    }

    subsystem(name: string): void {
        if (!this.accepting()) {
            return;
        }
        if (name === 'sftp') {
            this.record('sftp_request', {});
        } else {
            this.record('subsystem_request', { name });
        }
    }

    channelClosed(): void {
        if (!this.accepting()) {
            return;
        }
        this.record('channel_close', {});
    }

    transportError(error: Error): void {
        if (!this.accepting()) {
            return;
        }
        this.record('transport_error', { message: error.message });
        this.errors.handle(HoneypotErrorType.TRANSPORT_ERROR, error, {
            sessionId: this.sessionId,
            ip: this.options.sourceIp,
        });
    }

    /**
     * Finalizes, persists and alerts exactly once. Every call returns the
     * same promise.
     */
    close(): Promise<Readonly<SessionLog>> {
        this.closing ??= this.shutdown();
        return this.closing;
    }

    private async shutdown(): Promise<Readonly<SessionLog>> {
        this.currentPhase = 'closed';
        this.abort.abort();
        clearTimeout(this.idleTimer);

        await this.queue;
        const log = this.capture.finalize();

        try {
            await this.options.sink.persist(log);
        } catch (error) {
            this.errors.handle(HoneypotErrorType.PERSISTENCE_ERROR, error, { sessionId: log.sessionId });
        }

        await Promise.all(this.pendingAlerts);
        await this.alert(this.options.alerts.sessionClosed(log));

        this.options.metrics.recordSessionClosed(log.sessionId);
        console.info(`Session ${log.sessionId} from ${log.sourceIp} closed`, {
            username: log.username,
            commands: log.commands.length,
            downloads: log.downloads.length,
        });
        return log;
    }

    private accepting(): boolean {
        if (this.currentPhase === 'closed') {
            return false;
        }
        this.touch();
        return true;
    }

    private record(kind: SessionEventKind, data: SessionEventData): void {
        this.capture.recordEvent(kind, data);
    }

    /**
     * Moves into shell_active, creating the shell state on first use
     */
    private activate(): ShellState {
        this.currentPhase = 'shell_active';
        return this.shellState();
    }

    private shellState(): ShellState {
        this.state ??= this.options.shell.createState();
        return this.state;
    }

    private enqueue(task: () => Promise<void>): void {
        this.queue = this.queue.then(task).catch((error: unknown) => {
            this.errors.handle(HoneypotErrorType.TRANSPORT_ERROR, error, {
                sessionId: this.sessionId,
                stage: 'command',
            });
            this.options.disconnect();
        });
    }

    private async runCommand(input: string): Promise<string> {
        const output = await this.options.shell.execute(input, this.shellState(), {
            onDownload: (download) => this.onDownload(download),
        });
        this.capture.recordCommand(input, output);
        this.options.metrics.recordCommand(input);
        return output;
    }

    private async runInteractive(channel: ChannelWriter, line: string): Promise<void> {
        if (!line.trim()) {
            if (this.currentPhase !== 'closed') {
                this.writePrompt(channel);
            }
            return;
        }

        const output = await this.runCommand(line);
        if (this.currentPhase === 'closed') {
            return;
        }
        this.reply(channel, output);

        if (this.shellState().exitRequested) {
            this.finishChannel(channel);
            return;
        }
        this.writePrompt(channel);
    }

    private onDownload(download: CapturedDownload): void {
        this.capture.recordDownload(download.url, download.digest, download.size, download.path);
        this.options.metrics.recordDownload(download.size);
        console.info(`Captured ${download.url} as ${download.digest}`, {
            sessionId: this.sessionId,
            size: download.size,
        });
        this.track(
            this.alert(
                this.options.alerts.downloadCaptured({ sessionId: this.sessionId, ip: this.options.sourceIp }, download),
            ),
        );
    }

    private async alert(delivery: Promise<void>): Promise<void> {
        try {
            await delivery;
        } catch (error) {
            this.errors.handle(HoneypotErrorType.ALERT_ERROR, error, { sessionId: this.sessionId });
        }
    }

    private track(pending: Promise<void>): void {
        this.pendingAlerts.add(pending);
        void pending.finally(() => this.pendingAlerts.delete(pending));
    }

    private writePrompt(channel: ChannelWriter): void {
        this.reply(channel, this.options.shell.prompt(this.shellState()));
    }

    private reply(channel: ChannelWriter, text: string): void {
        if (text) {
            channel.write(this.ptyRequested ? toCrlf(text) : text);
        }
    }

    private finishChannel(channel: ChannelWriter): void {
        channel.exit(0);
        channel.end();
    }

    private touch(): void {
        const timeoutSecs = this.options.sessionTimeoutSecs;
        if (timeoutSecs <= 0) {
            return;
        }
        clearTimeout(this.idleTimer);
        this.idleTimer = setTimeout(() => {
            if (this.currentPhase === 'closed') {
                return;
            }
            this.record('idle_timeout', { idleSecs: timeoutSecs });
            console.info(`Session ${this.sessionId} idle for ${timeoutSecs}s, disconnecting`);
            this.options.disconnect();
        }, timeoutSecs * 1000);
        this.idleTimer.unref();
    }
}
