import fs from 'fs';
import os from 'os';
import path from 'path';
import { honeypotConfigSchema } from './schema.js';
import type { HoneypotConfig } from './types.js';
import { parseJSON } from '../utils/parseJSON.js';

/**
 * Configuration validation error
 */
export class ConfigurationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export type ConfigUpdates = {
    [K in keyof HoneypotConfig]?: Partial<HoneypotConfig[K]>;
};

export interface ConfigurationOptions {
    /** Explicit config file; an unreadable one is an error */
    configPath?: string;
    /** Candidates tried in order when no explicit path is given */
    searchPaths?: string[];
    env?: NodeJS.ProcessEnv;
}

type RawConfig = Record<string, Record<string, unknown>>;

export function getDefaultSearchPaths(): string[] {
    return [
        path.resolve(process.cwd(), 'honeyshell.json'),
        path.join(os.homedir(), '.config', 'honeyshell', 'config.json'),
        '/etc/honeyshell/config.json',
    ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw configuration object and fill in defaults
 */
export function validateConfiguration(raw: unknown): HoneypotConfig {
    const result = honeypotConfigSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue.path.join('.');
        throw new ConfigurationError(field ? `${field}: ${issue.message}` : issue.message, field || undefined);
    }
    return result.data;
}

/**
 * Configuration manager for the honeypot
 * Merges the JSON config file, environment overrides and defaults
 */
export class ConfigurationManager {
    private config: HoneypotConfig;
    readonly sourcePath?: string;

    constructor(options: ConfigurationOptions = {}) {
        const env = options.env ?? process.env;
        const { raw, sourcePath } = this.readConfigFile(options);
        this.sourcePath = sourcePath;

        this.applyEnvironmentOverrides(raw, env);
        this.config = validateConfiguration(raw);
    }

    /**
     * Get a copy of the current configuration
     */
    getConfig(): HoneypotConfig {
        return structuredClone(this.config);
    }

    /**
     * Merge section-level updates (CLI flags) and re-validate
     */
    updateConfig(updates: ConfigUpdates): void {
        const merged: RawConfig = {};
        for (const [section, values] of Object.entries(this.config)) {
            merged[section] = { ...values };
        }
        for (const [section, values] of Object.entries(updates)) {
            merged[section] = { ...merged[section], ...values };
        }

        const oldConfig = this.config;
        this.config = validateConfiguration(merged);

        console.info('Configuration updated', {
            changes: this.getConfigChanges(oldConfig, this.config),
        });
    }

    private readConfigFile(options: ConfigurationOptions): { raw: RawConfig; sourcePath?: string } {
        const candidates = options.configPath
            ? [options.configPath]
            : options.searchPaths ?? getDefaultSearchPaths();

        for (const candidate of candidates) {
            if (!fs.existsSync(candidate)) {
                continue;
            }
            console.info(`Loading configuration from ${candidate}`);
            return { raw: this.parseConfigFile(candidate), sourcePath: candidate };
        }

        if (options.configPath) {
            throw new ConfigurationError(`Config file not found: ${options.configPath}`);
        }

        console.warn('No configuration file found, using defaults', { searched: candidates });
        return { raw: {} };
    }

    private parseConfigFile(filePath: string): RawConfig {
        let contents: string;
        try {
            contents = fs.readFileSync(filePath, 'utf-8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Failed to read config file ${filePath}: ${reason}`);
        }

        const parsed = parseJSON(contents);
        if (!parsed.ok) {
            throw new ConfigurationError(`Failed to parse config file ${filePath}: ${parsed.error}`);
        }
        if (!isRecord(parsed.value)) {
            throw new ConfigurationError(`Failed to parse config file ${filePath}: expected a JSON object`);
        }

        const raw: RawConfig = {};
        for (const [section, values] of Object.entries(parsed.value)) {
            if (!isRecord(values)) {
                throw new ConfigurationError(`Section "${section}" must be an object`, section);
            }
            raw[section] = values;
        }
        return raw;
    }

    /**
     * Load configuration values from environment variables
     */
    private applyEnvironmentOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): void {
        const set = (section: string, key: string, value: unknown) => {
            raw[section] = { ...raw[section], [key]: value };
        };
        const setPort = (section: string, name: string) => {
            const value = env[name];
            if (value === undefined) {
                return;
            }
            const port = parseInt(value, 10);
            if (isNaN(port)) {
                console.warn(`Ignoring non-numeric ${name}: ${value}`);
                return;
            }
            console.info(`Overriding ${section} port from environment: ${port}`);
            set(section, 'port', port);
        };

        setPort('server', 'HONEYSHELL_SERVER_PORT');
        setPort('admin', 'HONEYSHELL_ADMIN_PORT');

        if (env.HONEYSHELL_SERVER_LISTEN_ADDR !== undefined) {
            set('server', 'listenAddress', env.HONEYSHELL_SERVER_LISTEN_ADDR);
        }
        if (env.HONEYSHELL_LOG_LEVEL !== undefined) {
            set('logging', 'level', env.HONEYSHELL_LOG_LEVEL);
        }
        if (env.HONEYSHELL_LOG_FORMAT !== undefined) {
            set('logging', 'format', env.HONEYSHELL_LOG_FORMAT);
        }
        if (env.WEBHOOK_URL) {
            set('alerts', 'webhookUrl', env.WEBHOOK_URL);
        }
    }

    /**
     * Get configuration changes for logging
     */
    private getConfigChanges(oldConfig: HoneypotConfig, newConfig: HoneypotConfig): Record<string, { from: unknown; to: unknown }> {
        const flatten = (config: HoneypotConfig) => {
            const flat = new Map<string, unknown>();
            for (const [section, values] of Object.entries(config)) {
                for (const [key, value] of Object.entries(values)) {
                    flat.set(`${section}.${key}`, value);
                }
            }
            return flat;
        };

        const before = flatten(oldConfig);
        const changes: Record<string, { from: unknown; to: unknown }> = {};
        for (const [key, value] of flatten(newConfig)) {
            if (JSON.stringify(before.get(key)) !== JSON.stringify(value)) {
                changes[key] = { from: before.get(key), to: value };
            }
        }
        return changes;
    }
}
