/**
 * Tolerant extraction of (tool, target, parameters) tuples from reasoning
 * backend output. Never throws: unusable text yields `{ ok: false }`.
 */

import type { ProposedAction } from '../types';
import { extractJsonValue, isRecord } from '../utils/json';
import { extractTargets } from './ScopeGuard';

export type ParseResult =
    | { readonly ok: true; readonly strategy: 'json' | 'keyword'; readonly actions: ProposedAction[] }
    | { readonly ok: false; readonly reason: string };

export interface ParseOptions {
    /** Tool names the keyword pass looks for. */
    knownTools: readonly string[];
    /** Used when an entry names a tool but no target. */
    fallbackTarget?: string;
}

const PARAM_PATTERN = /([a-z][\w-]*)=("[^"]*"|'[^']*'|[^\s,;]+)/gi;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toParameterValue(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (Array.isArray(value) && value.every((item) => typeof item === 'string' || typeof item === 'number')) {
        return value.join(',');
    }
    return null;
}

function toParameters(value: unknown): Record<string, string> {
    const out: Record<string, string> = {};
    if (!isRecord(value)) return out;
    for (const [key, raw] of Object.entries(value)) {
        const converted = toParameterValue(raw);
        if (converted !== null) out[key] = converted;
    }
    return out;
}

function firstString(record: Record<string, unknown>, keys: readonly string[]): string | undefined {
    for (const key of keys) {
        const value = record[key];
        if (typeof value === 'string' && value.trim() !== '') return value.trim();
    }
    return undefined;
}

function candidateEntries(value: unknown): unknown[] | null {
    if (Array.isArray(value)) return value;
    if (!isRecord(value)) return null;
    for (const key of ['actions', 'plan', 'steps', 'tools']) {
        const nested = value[key];
        if (Array.isArray(nested)) return nested;
    }
    if ('tool' in value) return [value];
    return null;
}

function fromJson(text: string, options: ParseOptions): ProposedAction[] {
    const entries = candidateEntries(extractJsonValue(text));
    if (!entries) return [];

    const actions: ProposedAction[] = [];
    for (const entry of entries) {
        if (!isRecord(entry)) continue;
        const tool = firstString(entry, ['tool', 'name', 'command']);
        const target = firstString(entry, ['target', 'host', 'url']) ?? options.fallbackTarget;
        if (!tool || !target) continue;
        actions.push({
            tool: tool.toLowerCase(),
            target,
            parameters: toParameters(entry.parameters ?? entry.params ?? entry.args),
            description: firstString(entry, ['description', 'reason', 'purpose']) ?? '',
        });
    }
    return actions;
}

function fromKeywords(text: string, options: ParseOptions): ProposedAction[] {
    const matchers = options.knownTools.map((tool) => ({
        tool,
        pattern: new RegExp(`(^|[^\\w-])${escapeRegExp(tool)}([^\\w-]|$)`, 'i'),
    }));

    const actions: ProposedAction[] = [];
    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line === '') continue;
        const hit = matchers.find((matcher) => matcher.pattern.test(line));
        if (!hit) continue;

        const target = extractTargets(line)[0] ?? options.fallbackTarget;
        if (!target) continue;

        const parameters: Record<string, string> = {};
        for (const match of line.matchAll(PARAM_PATTERN)) {
            parameters[match[1]] = match[2].replace(/^["']|["']$/g, '');
        }
        actions.push({
            tool: hit.tool,
            target,
            parameters,
            description: line.replace(/^(?:[-*•]|\d+[.)])\s*/, ''),
        });
    }
    return actions;
}

function dedupe(actions: ProposedAction[]): ProposedAction[] {
    const seen = new Set<string>();
    return actions.filter((action) => {
        const params = Object.entries(action.parameters)
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([key, value]) => `${key}=${value}`)
            .join('&');
        const key = `${action.tool}|${action.target}|${params}`;
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

export function parsePlanText(text: string, options: ParseOptions): ParseResult {
    if (text.trim() === '') {
        return { ok: false, reason: 'backend returned empty output' };
    }

    const structured = dedupe(fromJson(text, options));
    if (structured.length > 0) {
        return { ok: true, strategy: 'json', actions: structured };
    }

    const keyword = dedupe(fromKeywords(text, options));
    if (keyword.length > 0) {
        return { ok: true, strategy: 'keyword', actions: keyword };
    }

    return { ok: false, reason: 'no actionable structure in backend output' };
}
