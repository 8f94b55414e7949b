import path from 'path';
import type { ShellState } from './types.js';

function home(state: ShellState): string {
    return state.env.HOME || '/root';
}

/**
 * Resolves a shell argument against the cwd, expanding a leading `~`
 */
export function resolvePath(state: ShellState, target: string): string {
    if (target === '~') {
        return home(state);
    }
    if (target.startsWith('~/')) {
        return path.posix.resolve(home(state), target.slice(2));
    }
    return path.posix.resolve(state.cwd, target);
}

/**
 * The cwd as bash shows it in the prompt
 */
export function displayPath(state: ShellState): string {
    const homeDir = home(state);
    if (state.cwd === homeDir) {
        return '~';
    }
    if (state.cwd.startsWith(`${homeDir}/`)) {
        return `~${state.cwd.slice(homeDir.length)}`;
    }
    return state.cwd;
}
