import path from 'path';
import seed from './seed.json';

/**
 * `is_directory` when the target is a directory, `not_directory` when an
 * ancestor is a file
 */
export type WriteOutcome = 'written' | 'is_directory' | 'not_directory';

export interface FilesystemIdentity {
    hostname: string;
    /** Served as /etc/motd */
    motd?: string;
}

/**
 * Collapses `.`, `..`, duplicate and trailing slashes into an absolute POSIX path
 */
export function normalizePath(p: string): string {
    return path.posix.resolve('/', p);
}

/**
 * In-memory directory tree that backs one shell session. Nothing here
 * reaches the host filesystem; writes only land in the maps below.
 */
export class FakeFilesystem {
    private readonly directories = new Set<string>();
    private readonly files = new Map<string, Buffer>();

    /**
     * Seeded tree with the host-specific files filled in
     */
    static create(identity: FilesystemIdentity): FakeFilesystem {
        const fs = new FakeFilesystem();
        for (const dir of seed.directories) {
            fs.addDirectory(dir);
        }
        for (const [filePath, content] of Object.entries(seed.files)) {
            fs.writeFile(filePath, Buffer.from(content));
        }

        fs.writeFile('/etc/hostname', Buffer.from(`${identity.hostname}\n`));
        fs.writeFile(
            '/etc/hosts',
            Buffer.from(
                `127.0.0.1\tlocalhost\n127.0.1.1\t${identity.hostname}\n\n` +
                    '::1     localhost ip6-localhost ip6-loopback\n' +
                    'ff02::1 ip6-allnodes\n' +
                    'ff02::2 ip6-allrouters\n',
            ),
        );
        if (identity.motd !== undefined) {
            fs.writeFile('/etc/motd', Buffer.from(identity.motd));
        }
        return fs;
    }

    directoryExists(p: string): boolean {
        return this.directories.has(normalizePath(p));
    }

    isFile(p: string): boolean {
        return this.files.has(normalizePath(p));
    }

    /**
     * Immediate children of a directory, sorted. Unknown paths list as empty.
     */
    listDirectory(p: string): string[] {
        const dir = normalizePath(p);
        const names = new Set<string>();

        for (const candidate of [...this.directories, ...this.files.keys()]) {
            if (candidate !== dir && path.posix.dirname(candidate) === dir) {
                names.add(path.posix.basename(candidate));
            }
        }

        return [...names].sort();
    }

    readFile(p: string): Buffer | undefined {
        return this.files.get(normalizePath(p));
    }

    /**
     * Creates or replaces a file. Missing parent directories are created.
     * Nothing changes unless the result is `written`.
     */
    writeFile(p: string, content: Buffer): WriteOutcome {
        const filePath = normalizePath(p);
        if (this.directories.has(filePath)) {
            return 'is_directory';
        }
        if (this.hasFileAncestor(filePath)) {
            return 'not_directory';
        }
        this.addDirectory(path.posix.dirname(filePath));
        this.files.set(filePath, content);
        return 'written';
    }

    private hasFileAncestor(p: string): boolean {
        for (let dir = path.posix.dirname(p); dir !== '/'; dir = path.posix.dirname(dir)) {
            if (this.files.has(dir)) {
                return true;
            }
        }
        return false;
    }

    /**
     * Adds the directory and every missing ancestor
     */
    addDirectory(p: string): void {
        let dir = normalizePath(p);
        while (!this.directories.has(dir)) {
            this.directories.add(dir);
            if (dir === '/') {
                break;
            }
            dir = path.posix.dirname(dir);
        }
    }
}
