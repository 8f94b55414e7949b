import path from 'path';
import { curlCommand, wgetCommand } from './download.js';
import { resolvePath } from './paths.js';
import {
    IFCONFIG_OUTPUT,
    IP_ADDR_OUTPUT,
    IP_USAGE,
    KERNEL_RELEASE,
    KERNEL_VERSION,
    NETSTAT_OUTPUT,
    PS_OUTPUT,
} from './transcripts.js';
import type { CommandContext, CommandHandler } from './types.js';

export const BUILTIN_NAMES = [
    'pwd',
    'whoami',
    'id',
    'uname',
    'ls',
    'cd',
    'cat',
    'echo',
    'env',
    'ps',
    'ifconfig',
    'ip',
    'netstat',
    'wget',
    'curl',
    'chmod',
    'chown',
    'rm',
    'mkdir',
    'touch',
    'cp',
    'mv',
    'history',
    'exit',
    'logout',
] as const;

export type BuiltinName = (typeof BUILTIN_NAMES)[number];

const LONG_DATE = 'Nov  9 10:30';

interface ParsedFlags {
    flags: Set<string>;
    operands: string[];
}

function splitFlags(args: string[]): ParsedFlags {
    const flags = new Set<string>();
    const operands: string[] = [];
    for (const arg of args) {
        if (arg.startsWith('-') && arg.length > 1) {
            for (const flag of arg.slice(1)) {
                flags.add(flag);
            }
        } else {
            operands.push(arg);
        }
    }
    return { flags, operands };
}

function longEntry(ctx: CommandContext, fullPath: string, name: string): string {
    const content = ctx.state.fs.readFile(fullPath);
    if (content === undefined) {
        return `drwxr-xr-x 2 root root 4096 ${LONG_DATE} ${name}\n`;
    }
    return `-rw-r--r-- 1 root root ${content.length} ${LONG_DATE} ${name}\n`;
}

function listing(ctx: CommandContext, dir: string, showHidden: boolean, long: boolean): string {
    const entries = ctx.state.fs.listDirectory(dir).filter((name) => showHidden || !name.startsWith('.'));
    if (long) {
        return entries.map((name) => longEntry(ctx, path.posix.join(dir, name), name)).join('');
    }
    return entries.length > 0 ? `${entries.join('  ')}\n` : '';
}

function ls(args: string[], ctx: CommandContext): string {
    const { flags, operands } = splitFlags(args);
    const showHidden = flags.has('a');
    const long = flags.has('l');
    const fs = ctx.state.fs;

    if (operands.length === 0) {
        return listing(ctx, ctx.state.cwd, showHidden, long);
    }

    const errors: string[] = [];
    const files: string[] = [];
    const dirs: Array<{ label: string; fullPath: string }> = [];

    for (const operand of operands) {
        const fullPath = resolvePath(ctx.state, operand);
        if (fs.directoryExists(fullPath)) {
            dirs.push({ label: operand, fullPath });
        } else if (fs.isFile(fullPath)) {
            files.push(long ? longEntry(ctx, fullPath, operand) : `${operand}\n`);
        } else {
            errors.push(`ls: cannot access '${operand}': No such file or directory\n`);
        }
    }

    const sections = dirs.map(({ label, fullPath }) => {
        const body = listing(ctx, fullPath, showHidden, long);
        return operands.length > 1 ? `${label}:\n${body}` : body;
    });

    return errors.join('') + files.join('') + sections.join('\n');
}

function cd(args: string[], ctx: CommandContext): string {
    const { state } = ctx;
    const target = args[0];
    if (target === undefined) {
        state.cwd = state.env.HOME || '/root';
        return '';
    }

    const resolved = resolvePath(state, target);
    if (state.fs.directoryExists(resolved)) {
        state.cwd = resolved;
        return '';
    }
    if (state.fs.isFile(resolved)) {
        return `bash: cd: ${target}: Not a directory\n`;
    }
    return `bash: cd: ${target}: No such file or directory\n`;
}

function cat(args: string[], ctx: CommandContext): string {
    const { operands } = splitFlags(args);
    if (operands.length === 0) {
        return 'cat: missing operand\n';
    }

    return operands
        .map((operand) => {
            const fullPath = resolvePath(ctx.state, operand);
            const content = ctx.state.fs.readFile(fullPath);
            if (content !== undefined) {
                return content.toString('utf-8');
            }
            if (ctx.state.fs.directoryExists(fullPath)) {
                return `cat: ${operand}: Is a directory\n`;
            }
            return `cat: ${operand}: No such file or directory\n`;
        })
        .join('');
}

function echo(args: string[], ctx: CommandContext): string {
    let words = args;
    let newline = '\n';
    if (words[0] === '-n') {
        words = words.slice(1);
        newline = '';
    }

    const expanded = words.map((word) =>
        word.replace(/\$\{(\w+)\}|\$(\w+)/g, (_match, braced: string | undefined, bare: string | undefined) => {
            const name = braced ?? bare ?? '';
            return ctx.state.env[name] ?? '';
        }),
    );
    return expanded.join(' ') + newline;
}

function env(_args: string[], ctx: CommandContext): string {
    return Object.keys(ctx.state.env)
        .sort()
        .map((key) => `${key}=${ctx.state.env[key]}\n`)
        .join('');
}

function uname(args: string[], ctx: CommandContext): string {
    const { flags } = splitFlags(args);
    if (flags.has('a')) {
        return `Linux ${ctx.hostname} ${KERNEL_RELEASE} ${KERNEL_VERSION} x86_64 x86_64 x86_64 GNU/Linux\n`;
    }
    if (flags.has('r')) {
        return `${KERNEL_RELEASE}\n`;
    }
    if (flags.has('n')) {
        return `${ctx.hostname}\n`;
    }
    if (flags.has('m')) {
        return 'x86_64\n';
    }
    return 'Linux\n';
}

function history(_args: string[], ctx: CommandContext): string {
    return ctx.state.history
        .map((entry, index) => `${String(index + 1).padStart(5)}  ${entry}\n`)
        .join('');
}

function exit(_args: string[], ctx: CommandContext): string {
    ctx.state.exitRequested = true;
    return 'logout\n';
}

/**
 * Accepts the command and changes nothing once the operand count is right
 */
function noop(minOperands: number, usage: string): CommandHandler {
    return (args) => (splitFlags(args).operands.length < minOperands ? `${usage}\n` : '');
}

export const BUILTINS: Record<BuiltinName, CommandHandler> = {
    pwd: (_args, ctx) => `${ctx.state.cwd}\n`,
    whoami: (_args, ctx) => `${ctx.state.env.USER || 'root'}\n`,
    id: () => 'uid=0(root) gid=0(root) groups=0(root)\n',
    uname,
    ls,
    cd,
    cat,
    echo,
    env,
    ps: () => PS_OUTPUT,
    ifconfig: () => IFCONFIG_OUTPUT,
    ip: (args) => (args.some((arg) => arg === 'a' || arg === 'addr' || arg === 'address') ? IP_ADDR_OUTPUT : IP_USAGE),
    netstat: () => NETSTAT_OUTPUT,
    wget: wgetCommand,
    curl: curlCommand,
    chmod: noop(2, 'chmod: missing operand'),
    chown: noop(2, 'chown: missing operand'),
    rm: noop(1, 'rm: missing operand'),
    mkdir: noop(1, 'mkdir: missing operand'),
    touch: noop(1, 'touch: missing file operand'),
    cp: noop(2, 'cp: missing destination file operand'),
    mv: noop(2, 'mv: missing destination file operand'),
    history,
    exit,
    logout: exit,
};

export function isBuiltin(name: string): name is BuiltinName {
    return Object.hasOwn(BUILTINS, name);
}
