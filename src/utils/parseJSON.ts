export type ParsedJSON = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * JSON.parse that reports the syntax error instead of throwing it
 */
export const parseJSON = (jsonString?: string | null): ParsedJSON => {
    if (!jsonString?.trim()) {
        return { ok: false, error: 'empty document' };
    }

    try {
        return { ok: true, value: JSON.parse(jsonString) };
    } catch (error) {
        return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
};
