import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import type { ContentSink } from '../shell/types.js';

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

export function sha256Hex(content: Buffer): string {
    return createHash('sha256').update(content).digest('hex');
}

function isAlreadyExists(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
}

/**
 * Content-addressed store for captured files. A digest names exactly one
 * file and that file is never rewritten.
 */
export class ContentStore implements ContentSink {
    constructor(private readonly dir: string) {}

    async init(): Promise<void> {
        await fs.promises.mkdir(this.dir, { recursive: true });
    }

    pathFor(digest: string): string {
        if (!DIGEST_PATTERN.test(digest)) {
            throw new Error(`Invalid digest: ${digest}`);
        }
        return path.join(this.dir, digest);
    }

    exists(digest: string): boolean {
        return fs.existsSync(this.pathFor(digest));
    }

    async store(content: Buffer): Promise<string> {
        const digest = sha256Hex(content);
        if (this.exists(digest)) {
            return digest;
        }

        try {
            await fs.promises.writeFile(this.pathFor(digest), content, { flag: 'wx' });
        } catch (error) {
            // Another session stored the same bytes first
            if (isAlreadyExists(error)) {
                return digest;
            }
            throw error;
        }

        console.info(`Stored captured file ${digest} (${content.length} bytes)`);
        return digest;
    }
}
