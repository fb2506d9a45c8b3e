/**
 * Shared value records passed between the orchestrator components.
 * Everything here is plain data; components exchange these and session ids,
 * never references into each other's state.
 */

import type { ErrorInfo } from '../utils/errors';

export const SEVERITIES = ['Critical', 'High', 'Medium', 'Low', 'Info'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type RiskLevel = 'safe' | 'requires_confirmation' | 'blocked';
export type RiskClass = 'safe' | 'dangerous';

/** What a plugin may say about risk: escalate, or leave it to the keyword check. */
export type RiskEscalation = Extract<RiskClass, 'dangerous'> | undefined;

export type ActionState =
    | 'proposed'
    | 'rejected'
    | 'admitted'
    | 'pending_confirmation'
    | 'confirmed'
    | 'denied'
    | 'expired'
    | 'dispatched'
    | 'completed'
    | 'failed'
    | 'timed_out'
    | 'cancelled';

export type EvidenceValue = string | number | boolean;
export type Evidence = Readonly<Record<string, EvidenceValue>>;

/** A (tool, target, parameters) tuple recovered from reasoning-backend output. */
export interface ProposedAction {
    tool: string;
    target: string;
    parameters: Record<string, string>;
    description: string;
}

export interface Action {
    readonly id: string;
    readonly planId: string;
    readonly sessionId: string;
    readonly tool: string;
    readonly target: string;
    readonly parameters: Readonly<Record<string, string>>;
    readonly description: string;
    readonly riskLevel: RiskLevel;
    readonly state: ActionState;
    readonly trail: readonly ActionState[];
}

/** What a plugin reports; the dispatcher stamps it into a Finding. */
export interface FindingDraft {
    target?: string;
    category: string;
    severity: Severity;
    title: string;
    evidence?: Record<string, EvidenceValue>;
}

export interface Finding {
    readonly id: string;
    readonly target: string;
    readonly category: string;
    readonly severity: Severity;
    readonly title: string;
    readonly evidence: Evidence;
    readonly timestamp: string;
    readonly sourceActionId: string;
}

/** A finding as returned by cross-session queries, tagged with its session. */
export interface StoredFinding extends Finding {
    readonly sessionId: string;
}

export interface Persona {
    readonly name: string;
    readonly description: string;
    /** Tool names this persona may run; `*` permits every registered tool. */
    readonly allowedTools: readonly string[];
    readonly recallPriorFindings: boolean;
    readonly historyLimit: number;
    readonly recallLimit: number;
    readonly planningHint?: string;
}

export interface ScopeRules {
    readonly allowedIps: readonly string[];
    readonly allowedDomains: readonly string[];
    readonly strictMode: boolean;
}

// ============ SESSION LOG ============

export interface QueryPayload {
    readonly planId: string;
    readonly text: string;
}

export interface ActionPayload {
    readonly action: Action;
    readonly plugin?: string;
    readonly error?: ErrorInfo;
    readonly durationMs?: number;
    readonly findingCount: number;
}

export type RecordBody =
    | { readonly type: 'query'; readonly payload: QueryPayload }
    | { readonly type: 'action'; readonly payload: ActionPayload }
    | { readonly type: 'finding'; readonly payload: Finding };

export type RecordType = RecordBody['type'];

export type NewSessionRecord = RecordBody & { readonly timestamp?: string };

export type SessionRecord = RecordBody & {
    readonly seq: number;
    readonly sessionId: string;
    readonly timestamp: string;
};

export interface SessionInfo {
    readonly id: string;
    readonly persona: string;
    readonly createdAt: string;
}

export interface Session extends SessionInfo {
    readonly records: readonly SessionRecord[];
}

export interface FindingFilter {
    target?: string;
    category?: string;
    severity?: Severity;
    /** Include this severity and everything more severe. */
    minSeverity?: Severity;
    sessionIds?: readonly string[];
}

// ============ PLANNING & CONFIRMATION ============

export interface Plan {
    readonly id: string;
    readonly sessionId: string;
    readonly query: string;
    readonly backend: string | null;
    readonly actions: readonly Action[];
    readonly notice?: string;
}

export type ConfirmationStatus = 'pending' | 'approved' | 'denied' | 'expired';

export interface ConfirmationRequest {
    readonly actionId: string;
    readonly status: ConfirmationStatus;
    readonly createdAt: string;
    readonly expiresAt: string;
}

// ============ SUMMARY ============

export type SeverityCounts = Record<Severity, number>;

export interface AggregatedFinding {
    readonly target: string;
    readonly category: string;
    readonly severity: Severity;
    readonly title: string;
    readonly fingerprint: string;
    readonly evidence: Evidence;
    readonly occurrences: number;
    readonly firstSeen: string;
    readonly lastSeen: string;
    readonly sessionIds: readonly string[];
    readonly sourceActionIds: readonly string[];
}

export interface TargetBreakdown {
    readonly target: string;
    readonly total: number;
    readonly severityCounts: SeverityCounts;
}

export interface Summary {
    readonly sessionIds: readonly string[];
    readonly totalFindings: number;
    readonly uniqueFindings: number;
    readonly severityCounts: SeverityCounts;
    readonly targets: readonly TargetBreakdown[];
    readonly findings: readonly AggregatedFinding[];
    readonly generatedAt: string;
}

// ============ HELPERS ============

export function emptySeverityCounts(): SeverityCounts {
    return { Critical: 0, High: 0, Medium: 0, Low: 0, Info: 0 };
}

/** Lower rank is more severe. */
export function severityRank(severity: Severity): number {
    return SEVERITIES.indexOf(severity);
}

/** Map tool-reported severities ("crit", "HIGH", "informational") onto the five levels. */
export function toSeverity(value: unknown): Severity {
    const text = typeof value === 'string' ? value.trim().toLowerCase() : '';
    if (text.startsWith('crit')) return 'Critical';
    if (text.startsWith('high')) return 'High';
    if (text.startsWith('med') || text === 'moderate') return 'Medium';
    if (text.startsWith('low')) return 'Low';
    return 'Info';
}
