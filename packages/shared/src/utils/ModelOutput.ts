export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Parses the first JSON object out of model text. The whole text is tried first, then the
 * span from the first `{` to the last `}` so that prose or code fences around the object
 * do not matter. Throws when neither yields an object.
 */
export function extractJsonObject(rawText: string): JsonObject {
    const whole = tryParse(rawText);
    if (isJsonObject(whole)) {
        return whole;
    }

    const start = rawText.indexOf('{');
    const end = rawText.lastIndexOf('}');
    if (start === -1 || end === -1 || end <= start) {
        throw new Error('No JSON object found in model output');
    }

    const snippet = tryParse(rawText.slice(start, end + 1));
    if (!isJsonObject(snippet)) {
        throw new Error('Model output is not a JSON object');
    }
    return snippet;
}

function stringify(entry: unknown): string {
    if (entry === null || entry === undefined) {
        return '';
    }
    if (typeof entry === 'string') {
        return entry.trim();
    }
    if (typeof entry === 'number' || typeof entry === 'boolean' || typeof entry === 'bigint') {
        return String(entry);
    }
    return JSON.stringify(entry).trim();
}

export function toStringList(value: unknown, limit: number): string[] {
    if (Array.isArray(value)) {
        return value.map(stringify).filter((entry) => entry.length > 0).slice(0, limit);
    }
    if (typeof value === 'string' && value.trim()) {
        return [value.trim()];
    }
    return [];
}

export function toText(value: unknown): string {
    if (Array.isArray(value) || isJsonObject(value)) {
        return '';
    }
    return stringify(value);
}

export function toBoolean(value: unknown, fallback: boolean): boolean {
    if (typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (normalized === 'true' || normalized === 'yes') return true;
        if (normalized === 'false' || normalized === 'no') return false;
    }
    if (typeof value === 'number' && (value === 0 || value === 1)) {
        return value === 1;
    }
    return fallback;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(value, max));
}

const INFINITY_TEXT = /^([+-]?)inf(inity)?$/i;

function parseNumber(text: string): number {
    const infinity = INFINITY_TEXT.exec(text);
    if (infinity) {
        return infinity[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
    }
    return Number(text);
}

/** Unparseable values become `fallback`; everything else, infinities included, is clamped to [0, 1]. */
export function toConfidence(value: unknown, fallback = 0.5): number {
    let parsed = Number.NaN;
    if (typeof value === 'number') {
        parsed = value;
    } else if (typeof value === 'boolean') {
        parsed = value ? 1 : 0;
    } else if (typeof value === 'string' && value.trim()) {
        parsed = parseNumber(value.trim());
    }
    if (Number.isNaN(parsed)) {
        parsed = fallback;
    }
    return clamp(parsed, 0, 1);
}

export function includesAny(text: string, terms: readonly string[]): boolean {
    return terms.some((term) => text.includes(term));
}
