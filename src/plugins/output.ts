import type { EvidenceValue } from '../types';
import { isRecord } from '../utils/json';

/** Tool server output as an object: JSON strings are parsed, anything else becomes `{ raw }`. */
export function outputRecord(raw: unknown): Record<string, unknown> {
    if (isRecord(raw)) return raw;
    if (typeof raw === 'string') {
        try {
            const parsed: unknown = JSON.parse(raw);
            if (isRecord(parsed)) return parsed;
        } catch {
            return { raw };
        }
    }
    return { raw };
}

/** The first array of objects found under any of `keys`. */
export function recordList(output: Record<string, unknown>, keys: readonly string[]): Record<string, unknown>[] {
    for (const key of keys) {
        const value = output[key];
        if (Array.isArray(value)) {
            return value.filter(isRecord);
        }
    }
    return [];
}

export function stringOf(record: Record<string, unknown>, ...keys: string[]): string | undefined {
    for (const key of keys) {
        const value = record[key];
        if (typeof value === 'string' && value !== '') return value;
        if (typeof value === 'number') return String(value);
    }
    return undefined;
}

/** Primitive fields of `record` named in `keys`, for use as finding evidence. */
export function pickEvidence(record: Record<string, unknown>, keys: readonly string[]): Record<string, EvidenceValue> {
    const evidence: Record<string, EvidenceValue> = {};
    for (const key of keys) {
        const value = record[key];
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            evidence[key] = value;
        }
    }
    return evidence;
}

export function toolNamed(names: readonly string[], tool: string): boolean {
    return names.includes(tool.toLowerCase());
}
