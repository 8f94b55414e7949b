import { FetchError, FetchResult, Fetcher } from './types.js';

export interface HttpFetcherOptions {
    maxBytes: number;
    timeoutMs: number;
    userAgent?: string;
}

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const CONNECT_ERROR_CODES = new Set(['ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH']);
const TIMEOUT_ERROR_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

interface ErrorLike {
    name?: unknown;
    message?: unknown;
    cause?: unknown;
}

// fetch errors may come from another realm, so they are matched by shape
function asErrorLike(error: unknown): ErrorLike | undefined {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }
    return {
        name: 'name' in error ? error.name : undefined,
        message: 'message' in error ? error.message : undefined,
        cause: 'cause' in error ? error.cause : undefined,
    };
}

function errorCode(error: ErrorLike | undefined): string | undefined {
    const cause = error?.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    return undefined;
}

/**
 * Maps whatever fetch threw onto the failure kinds the shell renders
 */
export function classifyFetchError(error: unknown): FetchError {
    if (error instanceof FetchError) {
        return error;
    }
    const shape = asErrorLike(error);
    if (shape?.name === 'TimeoutError' || shape?.name === 'AbortError') {
        return new FetchError('Request timed out', 'timeout');
    }

    const code = errorCode(shape);
    const message = typeof shape?.message === 'string' ? shape.message : String(error);
    if (code && DNS_ERROR_CODES.has(code)) {
        return new FetchError(`Could not resolve host: ${message}`, 'dns');
    }
    if (code && CONNECT_ERROR_CODES.has(code)) {
        return new FetchError(`Connection failed: ${message}`, 'connect');
    }
    if (code && TIMEOUT_ERROR_CODES.has(code)) {
        return new FetchError('Request timed out', 'timeout');
    }
    return new FetchError(message, 'network');
}

/**
 * Fetcher over the global fetch with a body size cap and a total timeout
 */
export class HttpFetcher implements Fetcher {
    constructor(private readonly options: HttpFetcherOptions) {}

    async fetch(url: string): Promise<FetchResult> {
        let parsed: URL;
        try {
            parsed = new URL(url);
        } catch {
            throw new FetchError(`Invalid URL: ${url}`, 'invalid_url');
        }
        if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
            throw new FetchError(`Unsupported scheme: ${parsed.protocol}`, 'invalid_url');
        }

        try {
            const response = await fetch(parsed, {
                headers: { 'User-Agent': this.options.userAgent ?? 'Wget/1.21.2' },
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });

            const declared = Number(response.headers.get('content-length'));
            if (declared > this.options.maxBytes) {
                await response.body?.cancel();
                throw new FetchError(`Body of ${declared} bytes exceeds limit`, 'too_large');
            }

            return {
                url: response.url || parsed.toString(),
                status: response.status,
                statusText: response.statusText,
                contentType: response.headers.get('content-type') ?? undefined,
                bytes: await this.readBody(response),
            };
        } catch (error) {
            throw classifyFetchError(error);
        }
    }

    private async readBody(response: Response): Promise<Buffer> {
        if (!response.body) {
            return Buffer.alloc(0);
        }

        const reader = response.body.getReader();
        const chunks: Buffer[] = [];
        let total = 0;

        for (;;) {
            const { done, value } = await reader.read();
            if (done) {
                break;
            }
            total += value.byteLength;
            if (total > this.options.maxBytes) {
                await reader.cancel();
                throw new FetchError(`Body exceeds ${this.options.maxBytes} bytes`, 'too_large');
            }
            chunks.push(Buffer.from(value));
        }

        return Buffer.concat(chunks);
    }
}
