import path from 'path';
import { HoneypotErrorType, errorHandler } from '../utils/ErrorHandler.js';
import { resolvePath } from './paths.js';
import { curl, wget, WgetFailure } from './transcripts.js';
import { CommandContext, FetchError, FetchResult } from './types.js';

type ParsedTarget =
    | { ok: true; url: URL }
    | { ok: false; reason: 'invalid' }
    | { ok: false; reason: 'scheme'; scheme: string };

type Retrieval = { ok: true; result: FetchResult } | { ok: false; failure: WgetFailure };

/**
 * Bare hosts get http:// the way wget and curl assume it
 */
export function parseTarget(raw: string): ParsedTarget {
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `http://${raw}`;
    let url: URL;
    try {
        url = new URL(withScheme);
    } catch {
        return { ok: false, reason: 'invalid' };
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return { ok: false, reason: 'scheme', scheme: url.protocol.slice(0, -1) };
    }
    return { ok: true, url };
}

function remoteName(url: URL): string {
    return path.posix.basename(url.pathname) || 'index.html';
}

function isSuccess(status: number): boolean {
    return status >= 200 && status < 300;
}

async function retrieve(url: URL, ctx: CommandContext): Promise<Retrieval> {
    if (!ctx.fetcher) {
        return { ok: false, failure: 'unreachable' };
    }

    try {
        return { ok: true, result: await ctx.fetcher.fetch(url.toString()) };
    } catch (error) {
        if (!(error instanceof FetchError)) {
            errorHandler.handle(HoneypotErrorType.FETCH_ERROR, error, { url: url.toString() });
            return { ok: false, failure: 'network' };
        }
        console.info(`Fetch of ${url.toString()} failed (${error.kind}): ${error.message}`);
        switch (error.kind) {
            case 'dns':
            case 'connect':
            case 'timeout':
            case 'too_large':
            case 'network':
                return { ok: false, failure: error.kind };
            case 'invalid_url':
                return { ok: false, failure: 'dns' };
        }
    }
}

/**
 * Stores the body and reports it. A storage failure is logged and the
 * attacker-facing transcript is unaffected.
 */
async function capture(url: URL, bytes: Buffer, ctx: CommandContext): Promise<void> {
    if (!ctx.contentStore) {
        return;
    }

    let digest: string;
    try {
        digest = await ctx.contentStore.store(bytes);
    } catch (error) {
        errorHandler.handle(HoneypotErrorType.STORAGE_ERROR, error, { url: url.toString(), size: bytes.length });
        return;
    }

    await ctx.hooks.onDownload?.({
        url: url.toString(),
        digest,
        size: bytes.length,
        path: ctx.contentStore.pathFor(digest),
    });
}

function mediaType(contentType?: string): string {
    return contentType?.split(';')[0].trim() || 'application/octet-stream';
}

export async function wgetCommand(args: string[], ctx: CommandContext): Promise<string> {
    let outputDocument: string | undefined;
    let quiet = false;
    let target: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '-O') {
            outputDocument = args[++i];
        } else if (arg.startsWith('-O')) {
            outputDocument = arg.slice(2);
        } else if (arg.startsWith('--output-document=')) {
            outputDocument = arg.slice('--output-document='.length);
        } else if (arg === '-q' || arg === '--quiet') {
            quiet = true;
        } else if (!arg.startsWith('-')) {
            target ??= arg;
        }
    }

    if (!target) {
        return wget.missingUrl();
    }

    const parsed = parseTarget(target);
    if (!parsed.ok) {
        if (quiet) {
            return '';
        }
        return parsed.reason === 'scheme' ? wget.unsupportedScheme(target) : wget.invalidUrl(target);
    }

    const { url } = parsed;
    const now = ctx.now();
    const retrieval = await retrieve(url, ctx);
    if (!retrieval.ok) {
        return quiet ? '' : wget.failure(url, now, retrieval.failure);
    }

    const { result } = retrieval;
    if (!isSuccess(result.status)) {
        return quiet ? '' : wget.httpError(url, now, result.status, result.statusText);
    }

    await capture(url, result.bytes, ctx);

    if (outputDocument === '-') {
        return result.bytes.toString('utf-8');
    }

    const saveAs = outputDocument ?? remoteName(url);
    const written = ctx.state.fs.writeFile(resolvePath(ctx.state, saveAs), result.bytes);
    if (written !== 'written') {
        return quiet ? '' : wget.saveFailed(saveAs, written);
    }

    return quiet ? '' : wget.success(url, now, result.bytes.length, mediaType(result.contentType), saveAs);
}

export async function curlCommand(args: string[], ctx: CommandContext): Promise<string> {
    let outputFile: string | undefined;
    let useRemoteName = false;
    let silent = false;
    let target: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--output') {
            outputFile = args[++i];
        } else if (arg === '--remote-name') {
            useRemoteName = true;
        } else if (arg === '--silent') {
            silent = true;
        } else if (arg.startsWith('--')) {
            continue;
        } else if (arg.startsWith('-') && arg.length > 1) {
            for (const flag of arg.slice(1)) {
                if (flag === 's') {
                    silent = true;
                } else if (flag === 'O') {
                    useRemoteName = true;
                } else if (flag === 'o') {
                    outputFile = args[++i];
                }
            }
        } else {
            target ??= arg;
        }
    }

    if (!target) {
        return curl.missingUrl();
    }

    const parsed = parseTarget(target);
    if (!parsed.ok) {
        if (silent) {
            return '';
        }
        return parsed.reason === 'scheme' ? curl.unsupportedScheme(parsed.scheme) : curl.invalidUrl();
    }

    const { url } = parsed;
    const retrieval = await retrieve(url, ctx);
    if (!retrieval.ok) {
        return silent ? '' : curl.failure(url, retrieval.failure);
    }

    const { result } = retrieval;
    if (isSuccess(result.status)) {
        await capture(url, result.bytes, ctx);
    }

    const saveAs = outputFile ?? (useRemoteName ? remoteName(url) : undefined);
    if (saveAs === undefined) {
        return result.bytes.toString('utf-8');
    }

    const written = ctx.state.fs.writeFile(resolvePath(ctx.state, saveAs), result.bytes);
    if (written !== 'written') {
        return silent ? '' : curl.saveFailed(saveAs, written);
    }
    return silent ? '' : curl.progress(result.bytes.length);
}
