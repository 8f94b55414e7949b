import { isIP } from 'net';
import { z } from 'zod';
import { DEFAULT_HONEYPOT_CONFIG as defaults, MAX_CAPTURE_FILE_SIZE } from './types.js';

const ipAddress = (label: string) =>
    z.string().refine((value) => isIP(value) !== 0, (value) => ({
        message: `Invalid ${label}: ${value}`,
    }));

const serverSchema = z
    .object({
        listenAddress: ipAddress('listen address').default(defaults.server.listenAddress),
        port: z
            .number()
            .int()
            .min(1, 'Invalid port: must be 1-65535')
            .max(65535, 'Invalid port: must be 1-65535')
            .default(defaults.server.port),
        maxConnections: z
            .number()
            .int()
            .positive('maxConnections must be greater than 0')
            .default(defaults.server.maxConnections),
        sessionTimeoutSecs: z.number().int().nonnegative().default(defaults.server.sessionTimeoutSecs),
        authDelayMs: z.number().int().nonnegative().default(defaults.server.authDelayMs),
        hostKeyPath: z.string().min(1).default(defaults.server.hostKeyPath),
        ident: z.string().min(1).default(defaults.server.ident),
    })
    .default({});

const securitySchema = z
    .object({
        rateLimitEnabled: z.boolean().default(defaults.security.rateLimitEnabled),
        maxConnectionsPerIp: z.number().int().nonnegative().default(defaults.security.maxConnectionsPerIp),
        rateLimitWindowSecs: z.number().int().nonnegative().default(defaults.security.rateLimitWindowSecs),
        whitelistIps: z.array(ipAddress('whitelist IP')).default([]),
        blacklistIps: z.array(ipAddress('blacklist IP')).default([]),
    })
    .superRefine((security, ctx) => {
        if (!security.rateLimitEnabled) {
            return;
        }
        if (security.maxConnectionsPerIp === 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['maxConnectionsPerIp'],
                message: 'maxConnectionsPerIp must be greater than 0',
            });
        }
        if (security.rateLimitWindowSecs === 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['rateLimitWindowSecs'],
                message: 'rateLimitWindowSecs must be greater than 0',
            });
        }
    })
    .default({});

const loggingSchema = z
    .object({
        level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default(defaults.logging.level),
        format: z.enum(['json', 'pretty']).default(defaults.logging.format),
        output: z.enum(['stdout', 'file']).default(defaults.logging.output),
        filePath: z.string().min(1).optional(),
        retentionDays: z.number().int().positive().default(defaults.logging.retentionDays),
    })
    .superRefine((logging, ctx) => {
        if (logging.output === 'file' && !logging.filePath) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['filePath'],
                message: "filePath must be set when output is 'file'",
            });
        }
    })
    .default({});

const storageSchema = z
    .object({
        enabled: z.boolean().default(defaults.storage.enabled),
        backend: z.literal('file').default(defaults.storage.backend),
        sessionsDir: z.string().min(1).default(defaults.storage.sessionsDir),
        filesDir: z.string().min(1).default(defaults.storage.filesDir),
    })
    .default({});

const shellSchema = z
    .object({
        hostname: z.string().min(1, 'hostname cannot be empty').default(defaults.shell.hostname),
        historyEnabled: z.boolean().default(defaults.shell.historyEnabled),
        maxHistory: z
            .number()
            .int()
            .positive('maxHistory must be greater than 0')
            .default(defaults.shell.maxHistory),
        banner: z.string().default(defaults.shell.banner),
    })
    .default({});

const captureSchema = z
    .object({
        captureDownloads: z.boolean().default(defaults.capture.captureDownloads),
        maxFileSizeBytes: z
            .number()
            .int()
            .min(1, 'maxFileSizeBytes must be greater than 0')
            .max(MAX_CAPTURE_FILE_SIZE, 'maxFileSizeBytes cannot exceed 100MB')
            .default(defaults.capture.maxFileSizeBytes),
        fetchTimeoutMs: z.number().int().positive().default(defaults.capture.fetchTimeoutMs),
    })
    .default({});

const adminSchema = z
    .object({
        enabled: z.boolean().default(defaults.admin.enabled),
        listenAddress: ipAddress('admin listen address').default(defaults.admin.listenAddress),
        port: z.number().int().min(1).max(65535).default(defaults.admin.port),
    })
    .default({});

const alertsSchema = z
    .object({
        webhookUrl: z.string().url().optional(),
    })
    .default({});

export const honeypotConfigSchema = z.object({
    server: serverSchema,
    security: securitySchema,
    logging: loggingSchema,
    storage: storageSchema,
    shell: shellSchema,
    capture: captureSchema,
    admin: adminSchema,
    alerts: alertsSchema,
});
