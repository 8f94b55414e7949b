export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogOutput = 'stdout' | 'file';

export interface ServerConfig {
    /** Address the SSH listener binds to */
    listenAddress: string;
    port: number;
    /** Upper bound on concurrently open sessions */
    maxConnections: number;
    /** Idle timeout per session; 0 disables it */
    sessionTimeoutSecs: number;
    /** Fixed delay before every credential is accepted */
    authDelayMs: number;
    /** PEM host key, generated on first start when missing */
    hostKeyPath: string;
    /** Software version announced in the SSH identification string */
    ident: string;
}

export interface SecurityConfig {
    rateLimitEnabled: boolean;
    maxConnectionsPerIp: number;
    rateLimitWindowSecs: number;
    /** Addresses that bypass the per-IP rate limit */
    whitelistIps: string[];
    /** Addresses that are always dropped */
    blacklistIps: string[];
}

export interface LoggingConfig {
    level: LogLevel;
    format: LogFormat;
    output: LogOutput;
    filePath?: string;
    retentionDays: number;
}

export interface StorageConfig {
    enabled: boolean;
    backend: 'file';
    sessionsDir: string;
    filesDir: string;
}

export interface ShellConfig {
    hostname: string;
    historyEnabled: boolean;
    maxHistory: number;
    /** Printed when an interactive shell opens, also served as /etc/motd */
    banner: string;
}

export interface CaptureConfig {
    captureDownloads: boolean;
    maxFileSizeBytes: number;
    fetchTimeoutMs: number;
}

export interface AdminConfig {
    enabled: boolean;
    listenAddress: string;
    port: number;
}

export interface AlertsConfig {
    webhookUrl?: string;
}

export interface HoneypotConfig {
    server: ServerConfig;
    security: SecurityConfig;
    logging: LoggingConfig;
    storage: StorageConfig;
    shell: ShellConfig;
    capture: CaptureConfig;
    admin: AdminConfig;
    alerts: AlertsConfig;
}

export const MAX_CAPTURE_FILE_SIZE = 100 * 1024 * 1024;

export const DEFAULT_BANNER =
    'Welcome to Ubuntu 22.04.3 LTS (GNU/Linux 5.15.0-91-generic x86_64)\n' +
    '\n' +
    ' * Documentation:  https://help.ubuntu.com\n' +
    ' * Management:     https://landscape.canonical.com\n' +
    ' * Support:        https://ubuntu.com/advantage\n' +
    '\n' +
    'Last login: Tue Oct 14 09:12:44 2025 from 10.0.2.2\n';

export const DEFAULT_HONEYPOT_CONFIG: HoneypotConfig = {
    server: {
        listenAddress: '0.0.0.0',
        port: 2222,
        maxConnections: 100,
        sessionTimeoutSecs: 1800,
        authDelayMs: 2000,
        hostKeyPath: './data/ssh_host_rsa_key',
        ident: 'OpenSSH_8.9p1 Ubuntu-3ubuntu0.6',
    },
    security: {
        rateLimitEnabled: true,
        maxConnectionsPerIp: 10,
        rateLimitWindowSecs: 60,
        whitelistIps: [],
        blacklistIps: [],
    },
    logging: {
        level: 'info',
        format: 'json',
        output: 'stdout',
        retentionDays: 7,
    },
    storage: {
        enabled: true,
        backend: 'file',
        sessionsDir: './data/sessions',
        filesDir: './data/captured_files',
    },
    shell: {
        hostname: 'honeypot',
        historyEnabled: true,
        maxHistory: 1000,
        banner: DEFAULT_BANNER,
    },
    capture: {
        captureDownloads: true,
        maxFileSizeBytes: 10 * 1024 * 1024,
        fetchTimeoutMs: 10_000,
    },
    admin: {
        enabled: true,
        listenAddress: '127.0.0.1',
        port: 3000,
    },
    alerts: {},
};
