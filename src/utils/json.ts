export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalize(value: unknown): unknown {
    if (value === undefined || typeof value === 'function' || typeof value === 'bigint' || typeof value === 'symbol') {
        throw new Error(`stableStringify does not support type=${typeof value}`);
    }
    if (value === null || typeof value !== 'object') {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((item) => normalize(item));
    }
    if (!isRecord(value)) {
        throw new Error('stableStringify only supports plain objects');
    }
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
        out[key] = normalize(value[key]);
    }
    return out;
}

/** JSON with object keys sorted at every depth, so equal values serialize identically. */
export function stableStringify(value: unknown): string {
    return JSON.stringify(normalize(value));
}

/**
 * Pull the first JSON object or array out of free text: strips markdown
 * fences, tries a direct parse, then bracket-matches past any prose.
 */
export function extractJsonValue(text: string): unknown {
    let cleaned = text;
    const codeBlockMatch = cleaned.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
    if (codeBlockMatch) {
        cleaned = codeBlockMatch[1].trim();
    }

    const trimmed = cleaned.trim();
    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
        try {
            return JSON.parse(trimmed);
        } catch { /* fall through to bracket-matching */ }
    }

    return scanForJson(cleaned, 0);
}

function scanForJson(text: string, from: number): unknown {
    const startIdx = findOpening(text, from);
    if (startIdx === -1) return null;

    const open = text[startIdx];
    const close = open === '{' ? '}' : ']';
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = startIdx; i < text.length; i++) {
        const char = text[i];

        if (escaped) { escaped = false; continue; }
        if (char === '\\') { escaped = true; continue; }
        if (char === '"') { inString = !inString; continue; }
        if (inString) continue;

        if (char === open) depth++;
        if (char === close) {
            depth--;
            if (depth === 0) {
                try {
                    return JSON.parse(text.substring(startIdx, i + 1));
                } catch {
                    // Try the next candidate in the text
                    return scanForJson(text, startIdx + 1);
                }
            }
        }
    }
    return scanForJson(text, startIdx + 1);
}

function findOpening(text: string, from: number): number {
    const brace = text.indexOf('{', from);
    const bracket = text.indexOf('[', from);
    if (brace === -1) return bracket;
    if (bracket === -1) return brace;
    return Math.min(brace, bracket);
}

export function deepFreeze<T>(obj: T): T {
    if (obj === null || typeof obj !== 'object' || Object.isFrozen(obj)) {
        return obj;
    }
    for (const value of Object.values(obj)) {
        deepFreeze(value);
    }
    return Object.freeze(obj);
}
