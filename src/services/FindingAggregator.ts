/**
 * Finding Aggregator - merges duplicate findings across sessions and
 * summarizes them by severity and target.
 */

import crypto from 'crypto';
import type {
    AggregatedFinding,
    Evidence,
    EvidenceValue,
    FindingFilter,
    SeverityCounts,
    StoredFinding,
    Summary,
    TargetBreakdown,
} from '../types';
import { emptySeverityCounts, severityRank } from '../types';
import type { FingerprintConfig } from '../config/schema';
import { normalizeTarget } from './ScopeGuard';
import { sessionNotFound } from '../utils/errors';
import { stableStringify } from '../utils/json';

export interface FindingSource {
    query(filter: FindingFilter): StoredFinding[];
    hasSession(sessionId: string): boolean;
}

/**
 * Canonical JSON of the evidence (restricted to `evidenceKeys` when any are
 * configured), hashed with sha256 or used as-is.
 */
export function fingerprintEvidence(evidence: Evidence, options: FingerprintConfig): string {
    const keys = options.evidenceKeys.length > 0 ? options.evidenceKeys : Object.keys(evidence);
    const selected: Record<string, EvidenceValue> = {};
    for (const key of keys) {
        if (key in evidence) selected[key] = evidence[key];
    }
    const canonical = stableStringify(selected);
    if (options.algorithm === 'exact') return canonical;
    return crypto.createHash('sha256').update(canonical).digest('hex');
}

interface MergeState {
    target: string;
    category: string;
    severity: AggregatedFinding['severity'];
    title: string;
    fingerprint: string;
    evidence: Evidence;
    occurrences: number;
    firstSeen: string;
    lastSeen: string;
    sessionIds: Set<string>;
    sourceActionIds: Set<string>;
}

function addCounts(counts: SeverityCounts, severity: AggregatedFinding['severity']): void {
    counts[severity] += 1;
}

export class FindingAggregator {
    constructor(
        private readonly source: FindingSource,
        private readonly fingerprint: FingerprintConfig
    ) {}

    /** Summary over one or several sessions; unknown ids throw SESSION_NOT_FOUND. */
    summarize(sessionIds: string | readonly string[]): Summary {
        const ids = typeof sessionIds === 'string' ? [sessionIds] : [...new Set(sessionIds)];
        for (const id of ids) {
            if (!this.source.hasSession(id)) {
                throw sessionNotFound(id);
            }
        }
        return this.aggregate(this.source.query({ sessionIds: ids }), ids);
    }

    aggregate(findings: readonly StoredFinding[], sessionIds: readonly string[] = []): Summary {
        const merged = new Map<string, MergeState>();

        for (const finding of findings) {
            const target = normalizeTarget(finding.target);
            const category = finding.category.toLowerCase();
            const fingerprint = fingerprintEvidence(finding.evidence, this.fingerprint);
            const key = `${target}\u0000${category}\u0000${fingerprint}`;

            const existing = merged.get(key);
            if (!existing) {
                merged.set(key, {
                    target,
                    category: finding.category,
                    severity: finding.severity,
                    title: finding.title,
                    fingerprint,
                    evidence: finding.evidence,
                    occurrences: 1,
                    firstSeen: finding.timestamp,
                    lastSeen: finding.timestamp,
                    sessionIds: new Set([finding.sessionId]),
                    sourceActionIds: new Set([finding.sourceActionId]),
                });
                continue;
            }

            existing.occurrences += 1;
            if (severityRank(finding.severity) < severityRank(existing.severity)) {
                existing.severity = finding.severity;
                existing.title = finding.title;
            }
            if (finding.timestamp < existing.firstSeen) existing.firstSeen = finding.timestamp;
            if (finding.timestamp > existing.lastSeen) existing.lastSeen = finding.timestamp;
            existing.sessionIds.add(finding.sessionId);
            existing.sourceActionIds.add(finding.sourceActionId);
        }

        const unique: AggregatedFinding[] = [...merged.values()]
            .map((state) =>
                Object.freeze({
                    ...state,
                    sessionIds: Object.freeze([...state.sessionIds]),
                    sourceActionIds: Object.freeze([...state.sourceActionIds]),
                })
            )
            .sort(
                (a, b) =>
                    severityRank(a.severity) - severityRank(b.severity) ||
                    a.target.localeCompare(b.target) ||
                    a.firstSeen.localeCompare(b.firstSeen)
            );

        const severityCounts = emptySeverityCounts();
        const byTarget = new Map<string, { total: number; severityCounts: SeverityCounts }>();
        for (const finding of unique) {
            addCounts(severityCounts, finding.severity);
            const entry = byTarget.get(finding.target) ?? { total: 0, severityCounts: emptySeverityCounts() };
            entry.total += 1;
            addCounts(entry.severityCounts, finding.severity);
            byTarget.set(finding.target, entry);
        }
        const targets: TargetBreakdown[] = [...byTarget.entries()]
            .map(([target, entry]) => ({ target, ...entry }))
            .sort((a, b) => b.total - a.total || a.target.localeCompare(b.target));

        return {
            sessionIds: [...sessionIds],
            totalFindings: findings.length,
            uniqueFindings: unique.length,
            severityCounts,
            targets,
            findings: unique,
            generatedAt: new Date().toISOString(),
        };
    }
}
