import fs from 'fs';
import path from 'path';
import type { SessionLog } from './types.js';

export interface SessionLogSink {
    persist(log: Readonly<SessionLog>): Promise<void>;
}

/**
 * One pretty-printed JSON file per finalized session
 */
export class FileSessionStore implements SessionLogSink {
    constructor(private readonly dir: string) {}

    async persist(log: Readonly<SessionLog>): Promise<void> {
        await fs.promises.mkdir(this.dir, { recursive: true });
        const target = path.join(this.dir, `${log.sessionId}.json`);
        await fs.promises.writeFile(target, `${JSON.stringify(log, null, 2)}\n`);
        console.debug(`Session ${log.sessionId} written to ${target}`);
    }
}

export class NullSessionStore implements SessionLogSink {
    async persist(_log: Readonly<SessionLog>): Promise<void> {}
}
