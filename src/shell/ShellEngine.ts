import { FakeFilesystem } from '../filesystem/FakeFilesystem.js';
import { BUILTINS, isBuiltin } from './commands.js';
import { displayPath } from './paths.js';
import type { CommandContext, ContentSink, Fetcher, ShellHooks, ShellState } from './types.js';

export interface ShellEngineOptions {
    hostname: string;
    historyEnabled: boolean;
    maxHistory: number;
    /** Written to /etc/motd of every new session */
    banner?: string;
    /** Left out when download capture is disabled; fetches then fail as unreachable */
    fetcher?: Fetcher;
    contentStore?: ContentSink;
    now?: () => Date;
}

const DEFAULT_PATH = '/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin';

/**
 * Command dispatcher for the fake shell. Stateless itself; everything a
 * session changes lives in the ShellState it is handed.
 */
export class ShellEngine {
    private readonly now: () => Date;

    constructor(private readonly options: ShellEngineOptions) {
        this.now = options.now ?? (() => new Date());
    }

    get hostname(): string {
        return this.options.hostname;
    }

    createState(): ShellState {
        return {
            cwd: '/root',
            env: {
                HOME: '/root',
                HOSTNAME: this.options.hostname,
                LANG: 'C.UTF-8',
                LOGNAME: 'root',
                PATH: DEFAULT_PATH,
                SHELL: '/bin/bash',
                TERM: 'xterm-256color',
                USER: 'root',
            },
            fs: FakeFilesystem.create({ hostname: this.options.hostname, motd: this.options.banner }),
            history: [],
            exitRequested: false,
        };
    }

    prompt(state: ShellState): string {
        const user = state.env.USER || 'root';
        const marker = user === 'root' ? '#' : '$';
        return `${user}@${this.options.hostname}:${displayPath(state)}${marker} `;
    }

    /**
     * Runs one command line. Words are split on whitespace; there is no
     * quoting, piping or redirection.
     */
    async execute(commandLine: string, state: ShellState, hooks: ShellHooks = {}): Promise<string> {
        const line = commandLine.trim();
        if (!line) {
            return '';
        }

        this.remember(state, line);

        const [name, ...args] = line.split(/\s+/);
        if (!isBuiltin(name)) {
            return `${name}: command not found\n`;
        }

        const ctx: CommandContext = {
            state,
            hostname: this.options.hostname,
            now: this.now,
            hooks,
            fetcher: this.options.fetcher,
            contentStore: this.options.contentStore,
        };
        return BUILTINS[name](args, ctx);
    }

    private remember(state: ShellState, line: string): void {
        if (!this.options.historyEnabled) {
            return;
        }
        state.history.push(line);
        if (state.history.length > this.options.maxHistory) {
            state.history.splice(0, state.history.length - this.options.maxHistory);
        }
    }
}
