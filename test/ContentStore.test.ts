import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ContentStore, sha256Hex } from '../src/capture/ContentStore.js';

describe('ContentStore', () => {
    let dir: string;
    let store: ContentStore;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'honeyshell-files-'));
        store = new ContentStore(path.join(dir, 'captured'));
        await store.init();
        jest.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('names files by the SHA-256 of their content', async () => {
        const content = Buffer.from('hello');

        const digest = await store.store(content);

        expect(digest).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
        expect(digest).toBe(sha256Hex(content));
        expect(fs.readFileSync(store.pathFor(digest))).toEqual(content);
        expect(store.exists(digest)).toBe(true);
    });

    test('writes identical content only once', async () => {
        const writeFile = jest.spyOn(fs.promises, 'writeFile');
        const content = Buffer.from('same bytes');

        const first = await store.store(content);
        const second = await store.store(Buffer.from('same bytes'));

        expect(second).toBe(first);
        expect(writeFile).toHaveBeenCalledTimes(1);
        expect(fs.readdirSync(path.join(dir, 'captured'))).toEqual([first]);
    });

    test('treats a concurrent write of the same content as stored', async () => {
        const content = Buffer.from('raced');
        const [a, b] = await Promise.all([store.store(content), store.store(content)]);

        expect(a).toBe(b);
        expect(fs.readFileSync(store.pathFor(a))).toEqual(content);
    });

    test('rejects anything that is not a hex digest', () => {
        expect(() => store.pathFor('../../etc/passwd')).toThrow('Invalid digest: ../../etc/passwd');
        expect(() => store.pathFor('ABC')).toThrow('Invalid digest: ABC');
        expect(store.pathFor('a'.repeat(64))).toBe(path.join(dir, 'captured', 'a'.repeat(64)));
    });

    test('propagates write failures other than an existing file', async () => {
        jest.spyOn(fs.promises, 'writeFile').mockRejectedValueOnce(Object.assign(new Error('EACCES'), { code: 'EACCES' }));

        await expect(store.store(Buffer.from('x'))).rejects.toThrow('EACCES');
    });
});
