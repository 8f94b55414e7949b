import type { AddressInfo } from 'net';
import { Server } from 'ssh2';
import type { AuthContext, ClientInfo, Connection, ServerChannel, Session } from 'ssh2';
import type { SessionLogSink } from '../capture/SessionStore.js';
import type { HoneypotConfig } from '../config/types.js';
import type { AdmissionControl } from '../security/AdmissionControl.js';
import { SessionController } from '../session/SessionController.js';
import type { ChannelWriter, SessionSummary } from '../session/types.js';
import type { ShellEngine } from '../shell/ShellEngine.js';
import { ErrorHandler, HoneypotErrorType, errorHandler } from '../utils/ErrorHandler.js';
import type { MetricsCollector } from '../utils/logger/metricsCollector.js';
import type { AlertSink } from '../utils/webhook.js';

export interface SshHoneypotOptions {
    config: HoneypotConfig;
    hostKey: Buffer;
    admission: AdmissionControl;
    shell: ShellEngine;
    sink: SessionLogSink;
    alerts: AlertSink;
    metrics: MetricsCollector;
    errors?: ErrorHandler;
}

interface ActiveSession {
    controller: SessionController;
    client: Connection;
}

function channelWriter(channel: ServerChannel): ChannelWriter {
    return {
        write: (data) => {
            channel.write(data);
        },
        exit: (code) => {
            channel.exit(code);
        },
        end: () => {
            channel.end();
        },
    };
}

/**
 * SSH listener that hands every admitted connection to its own
 * SessionController
 */
export class SshHoneypot {
    private readonly server: Server;
    private readonly errors: ErrorHandler;
    private readonly sessions = new Map<string, ActiveSession>();
    private readonly pendingCloses = new Set<Promise<void>>();

    constructor(private readonly options: SshHoneypotOptions) {
        this.errors = options.errors ?? errorHandler;
        this.server = new Server(
            {
                hostKeys: [options.hostKey],
                ident: options.config.server.ident,
            },
            (client, info) => this.handleConnection(client, info),
        );
    }

    listen(port = this.options.config.server.port, host = this.options.config.server.listenAddress): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(port, host, () => {
                this.server.off('error', reject);
                const address = this.address();
                console.info(`SSH honeypot listening on ${address.address}:${address.port}`);
                resolve(address);
            });
        });
    }

    address(): AddressInfo {
        const address = this.server.address();
        if (!address || typeof address === 'string') {
            throw new Error('SSH server is not listening');
        }
        return address;
    }

    get activeCount(): number {
        return this.sessions.size;
    }

    activeSessions(): SessionSummary[] {
        return Array.from(this.sessions.values(), ({ controller }) => controller.summary());
    }

    /**
     * Stops accepting, disconnects every client and waits for their logs
     * to be finalized
     */
    async close(): Promise<void> {
        const stopped = new Promise<void>((resolve) => {
            this.server.close(() => resolve());
        });
        for (const { client } of this.sessions.values()) {
            client.end();
        }
        await stopped;
        await Promise.all(this.pendingCloses);
    }

    private handleConnection(client: Connection, info: ClientInfo): void {
        const decision = this.options.admission.decide(info.ip, this.sessions.size);
        if (!decision.admitted) {
            this.options.metrics.recordConnection(decision.ip, decision.reason);
            console.warn(`Rejected connection from ${decision.ip}: ${decision.reason}`);
            client.on('error', (error) => {
                console.debug(`Error on rejected connection from ${decision.ip}: ${error.message}`);
            });
            client.end();
            return;
        }

        this.options.metrics.recordConnection(decision.ip);
        const { config } = this.options;
        const controller = new SessionController({
            sourceIp: decision.ip,
            sourcePort: info.port,
            shell: this.options.shell,
            sink: this.options.sink,
            alerts: this.options.alerts,
            metrics: this.options.metrics,
            errors: this.errors,
            authDelayMs: config.server.authDelayMs,
            sessionTimeoutSecs: config.server.sessionTimeoutSecs,
            banner: config.shell.banner,
            disconnect: () => client.end(),
        });
        this.sessions.set(controller.sessionId, { controller, client });
        console.info(`Connection from ${decision.ip}:${info.port}`, {
            sessionId: controller.sessionId,
            client: info.header.identRaw,
        });

        client.on('authentication', (ctx) => this.handleAuthentication(controller, ctx));
        client.on('ready', () => {
            client.on('session', (accept) => this.handleSession(controller, accept()));
        });
        client.on('error', (error) => controller.transportError(error));
        client.on('close', () => this.finish(controller));
    }

    private handleAuthentication(controller: SessionController, ctx: AuthContext): void {
        switch (ctx.method) {
            case 'password':
                controller
                    .authenticate(ctx.username, ctx.password, 'password')
                    .then((accepted) => {
                        if (accepted) {
                            ctx.accept();
                        }
                    })
                    .catch((error: unknown) => {
                        this.errors.handle(HoneypotErrorType.TRANSPORT_ERROR, error, { sessionId: controller.sessionId });
                    });
                return;
            case 'keyboard-interactive':
                ctx.prompt([{ prompt: 'Password: ', echo: false }], (answers) => {
                    controller
                        .authenticate(ctx.username, answers[0] ?? '', 'keyboard-interactive')
                        .then((accepted) => {
                            if (accepted) {
                                ctx.accept();
                            }
                        })
                        .catch((error: unknown) => {
                            this.errors.handle(HoneypotErrorType.TRANSPORT_ERROR, error, {
                                sessionId: controller.sessionId,
                            });
                        });
                });
                return;
            default:
                controller.rejectAuthMethod(ctx.method, ctx.username);
                ctx.reject(['password', 'keyboard-interactive']);
        }
    }

    private handleSession(controller: SessionController, session: Session): void {
        session.on('pty', (accept, _reject, info) => {
            const term = 'term' in info && typeof info.term === 'string' ? info.term : 'unknown';
            controller.requestPty(term, info.cols, info.rows);
            accept?.();
        });
        session.on('window-change', (accept, _reject, info) => {
            controller.windowChange(info.cols, info.rows);
            accept?.();
        });
        session.on('env', (accept, _reject, info) => {
            controller.setEnv(info.key, info.val);
            accept?.();
        });
        session.on('shell', (accept) => {
            const channel = accept();
            channel.on('data', (data: Buffer) => controller.input(data));
            channel.on('close', () => controller.channelClosed());
            controller.openShell(channelWriter(channel));
        });
        session.on('exec', (accept, _reject, info) => {
            const channel = accept();
            channel.on('close', () => controller.channelClosed());
            controller.exec(info.command, channelWriter(channel));
        });
        session.on('sftp', (_accept, reject) => {
            controller.subsystem('sftp');
            reject?.();
        });
        session.on('subsystem', (_accept, reject, info) => {
            controller.subsystem(info.name);
            reject?.();
        });
    }

    private finish(controller: SessionController): void {
        const done = controller
            .close()
            .then(() => undefined)
            .catch((error: unknown) => {
                this.errors.handle(HoneypotErrorType.PERSISTENCE_ERROR, error, { sessionId: controller.sessionId });
            })
            .finally(() => {
                this.sessions.delete(controller.sessionId);
                this.pendingCloses.delete(done);
            });
        this.pendingCloses.add(done);
    }
}
