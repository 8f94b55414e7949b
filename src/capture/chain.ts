import { createHash } from 'crypto';
import type { ChainedRecord, SessionLog, SessionRecord } from './types.js';

export const GENESIS_HASH = '0'.repeat(64);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * JSON with sorted keys and undefined members dropped
 */
export function stableStringify(value: unknown): string {
    if (value === null) return 'null';
    const t = typeof value;
    if (t === 'string' || t === 'number' || t === 'boolean') {
        return JSON.stringify(value);
    }

    if (Array.isArray(value)) {
        const parts = value.map((v) => stableStringify(v === undefined ? null : v));
        return `[${parts.join(',')}]`;
    }

    if (isRecord(value)) {
        const parts: string[] = [];
        for (const key of Object.keys(value).sort()) {
            const v = value[key];
            if (v === undefined) continue;
            parts.push(`${JSON.stringify(key)}:${stableStringify(v)}`);
        }
        return `{${parts.join(',')}}`;
    }

    return JSON.stringify(String(value));
}

/**
 * SHA-256 over every field of the record except its own hash
 */
export function computeRecordHash(record: Omit<ChainedRecord, 'hash'>): string {
    return createHash('sha256')
        .update(stableStringify({ ...record, hash: undefined }))
        .digest('hex');
}

/**
 * All records of a log in chain order
 */
export function chainedRecords(log: Readonly<SessionLog>): SessionRecord[] {
    const records: SessionRecord[] = [...log.authAttempts, ...log.commands, ...log.downloads, ...log.events];
    return records.sort((a, b) => a.seq - b.seq);
}

export function verifySessionLog(log: Readonly<SessionLog>): { valid: boolean; brokenAt?: number } {
    let previousHash = GENESIS_HASH;

    for (const [i, record] of chainedRecords(log).entries()) {
        if (record.seq !== i + 1 || record.prevHash !== previousHash) {
            return { valid: false, brokenAt: record.seq };
        }
        if (record.hash !== computeRecordHash(record)) {
            return { valid: false, brokenAt: record.seq };
        }
        previousHash = record.hash;
    }

    if (log.chainHead !== previousHash) {
        return { valid: false, brokenAt: chainedRecords(log).length + 1 };
    }

    return { valid: true };
}
