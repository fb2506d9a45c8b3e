/**
 * Scope Guard - decides whether a target is inside the authorized scope.
 *
 * `check` is a pure function of (target, rules): no DNS, no logging, no
 * state. Callers log the non-strict warnings it returns.
 */

import { BlockList, isIP } from 'net';
import type { ScopeRules } from '../types';
import { ERROR_CODES, OrchestratorError } from '../utils/errors';

export type ScopeDecision =
    | { readonly allowed: true; readonly target: string; readonly warning?: string }
    | { readonly allowed: false; readonly target: string; readonly reason: string };

type TargetKind =
    | { kind: 'ip'; address: string; family: 'ipv4' | 'ipv6'; prefix: number }
    | { kind: 'domain'; host: string };

interface NetworkRule {
    readonly family: 'ipv4' | 'ipv6';
    readonly prefix: number;
    readonly list: BlockList;
}

const LABEL = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;

/** Reduce URLs and host:port forms to a bare host (or CIDR). */
export function normalizeTarget(raw: string): string {
    let value = raw.trim().toLowerCase();
    if (value.includes('://')) {
        try {
            value = new URL(value).hostname;
        } catch {
            return value;
        }
    }
    if (value.startsWith('[') && value.endsWith(']')) {
        value = value.slice(1, -1);
    }
    // host:port, but leave IPv6 literals alone
    const colon = value.split(':');
    if (colon.length === 2 && /^\d+$/.test(colon[1])) {
        value = colon[0];
    }
    return value.replace(/\.$/, '');
}

function classifyTarget(target: string): TargetKind | null {
    if (target === '') return null;

    const [address, prefixText, ...rest] = target.split('/');
    const family = isIP(address);
    if (family !== 0) {
        if (rest.length > 0) return null;
        const max = family === 4 ? 32 : 128;
        if (prefixText !== undefined && !/^\d{1,3}$/.test(prefixText)) return null;
        const prefix = prefixText === undefined ? max : Number(prefixText);
        if (prefix > max) return null;
        return { kind: 'ip', address, family: family === 4 ? 'ipv4' : 'ipv6', prefix };
    }
    if (target.includes('/')) return null;

    if (target.length > 253) return null;
    const labels = target.split('.');
    if (!labels.every((label) => LABEL.test(label))) return null;
    // Dotted all-numeric strings are malformed addresses, not hostnames
    if (/^\d+$/.test(labels[labels.length - 1])) return null;
    return { kind: 'domain', host: target };
}

function compileNetwork(rule: string): NetworkRule {
    const parsed = classifyTarget(rule.trim().toLowerCase());
    if (!parsed || parsed.kind !== 'ip') {
        throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Invalid scope IP rule: ${rule}`);
    }
    const list = new BlockList();
    list.addSubnet(parsed.address, parsed.prefix, parsed.family);
    return { family: parsed.family, prefix: parsed.prefix, list };
}

export class ScopeGuard {
    private readonly networks: readonly NetworkRule[];
    private readonly domains: readonly string[];

    constructor(private readonly rules: ScopeRules) {
        this.networks = rules.allowedIps.map(compileNetwork);
        this.domains = rules.allowedDomains.map((domain) => normalizeTarget(domain.replace(/^\*\./, '')));
    }

    get strictMode(): boolean {
        return this.rules.strictMode;
    }

    check(rawTarget: string): ScopeDecision {
        const target = normalizeTarget(rawTarget);
        const parsed = classifyTarget(target);
        if (!parsed) {
            return { allowed: false, target, reason: `Malformed target '${rawTarget}'` };
        }

        if (this.matches(parsed)) {
            return { allowed: true, target };
        }

        if (this.rules.strictMode) {
            return { allowed: false, target, reason: `Target ${target} is out of scope` };
        }
        return { allowed: true, target, warning: `Target ${target} is outside the configured scope (strict mode off)` };
    }

    private matches(parsed: TargetKind): boolean {
        if (parsed.kind === 'domain') {
            const host = parsed.host;
            return this.domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
        }
        const { address, family, prefix } = parsed;
        return this.networks.some(
            (network) => network.family === family && prefix >= network.prefix && network.list.check(address, family)
        );
    }
}

const IPV4_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}(?:\/\d{1,2})?\b/g;
const DOMAIN_PATTERN = /\b(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}\b/gi;
// Words like report.md or index.php are file names, not hosts
const FILE_SUFFIXES = new Set([
    'txt', 'md', 'json', 'yaml', 'yml', 'xml', 'csv', 'log', 'py', 'js', 'ts', 'sh', 'pdf',
    'html', 'htm', 'php', 'asp', 'aspx', 'jsp', 'conf', 'ini', 'exe', 'dll', 'zip',
]);

/** IPv4 addresses, CIDR blocks and domain names mentioned in free text, in order of appearance. */
export function extractTargets(text: string): string[] {
    const found: Array<{ index: number; value: string }> = [];
    for (const match of text.matchAll(IPV4_PATTERN)) {
        found.push({ index: match.index ?? 0, value: match[0] });
    }
    for (const match of text.matchAll(DOMAIN_PATTERN)) {
        const value = match[0].toLowerCase();
        const suffix = value.slice(value.lastIndexOf('.') + 1);
        if (FILE_SUFFIXES.has(suffix)) continue;
        found.push({ index: match.index ?? 0, value });
    }
    found.sort((a, b) => a.index - b.index);

    const seen = new Set<string>();
    const targets: string[] = [];
    for (const { value } of found) {
        if (seen.has(value)) continue;
        seen.add(value);
        targets.push(value);
    }
    return targets;
}
