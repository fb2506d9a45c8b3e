/**
 * Action Gate - risk classification and the confirmation workflow for
 * dangerous actions. Each pending request waits alone; nothing else in the
 * plan blocks on it.
 */

import type { Action, ConfirmationRequest, ConfirmationStatus, RiskClass, RiskEscalation } from '../types';
import { componentLogger } from '../utils/logger';

const log = componentLogger('gate');

export interface GateOptions {
    dangerousKeywords: readonly string[];
    confirmationTimeoutMs: number;
}

/** A plugin can only raise an action to dangerous, never clear a keyword match. */
export type RiskOverride = (action: Action) => RiskEscalation;

export type ConfirmationOutcome = Exclude<ConfirmationStatus, 'pending'>;

export type GateDecision =
    | { readonly kind: 'admitted' }
    | {
          readonly kind: 'confirmation';
          readonly request: ConfirmationRequest;
          /** Settles once with approved, denied or expired. */
          readonly decision: Promise<ConfirmationOutcome>;
      };

interface PendingEntry {
    request: ConfirmationRequest;
    resolve: (status: ConfirmationOutcome) => void;
    timer: NodeJS.Timeout;
}

export class ActionGate {
    private readonly keywords: readonly string[];
    private readonly open = new Map<string, PendingEntry>();

    constructor(
        private readonly options: GateOptions,
        private readonly riskOverride: RiskOverride = () => undefined,
        private readonly now: () => Date = () => new Date()
    ) {
        this.keywords = options.dangerousKeywords.map((keyword) => keyword.toLowerCase());
    }

    classify(action: Action): RiskClass {
        if (this.riskOverride(action) === 'dangerous') return 'dangerous';

        const haystack = [
            action.tool,
            action.description,
            ...Object.entries(action.parameters).flatMap(([key, value]) => [key, value]),
        ]
            .join(' ')
            .toLowerCase();
        return this.keywords.some((keyword) => haystack.includes(keyword)) ? 'dangerous' : 'safe';
    }

    gate(action: Action, riskClass: RiskClass = this.classify(action)): GateDecision {
        if (riskClass === 'safe') {
            return { kind: 'admitted' };
        }

        const existing = this.open.get(action.id);
        if (existing) {
            throw new Error(`Confirmation already pending for action ${action.id}`);
        }

        const createdAt = this.now();
        const request: ConfirmationRequest = Object.freeze({
            actionId: action.id,
            status: 'pending',
            createdAt: createdAt.toISOString(),
            expiresAt: new Date(createdAt.getTime() + this.options.confirmationTimeoutMs).toISOString(),
        });

        const decision = new Promise<ConfirmationOutcome>((resolve) => {
            const timer = setTimeout(() => {
                log.warn('Confirmation expired', { actionId: action.id, tool: action.tool, target: action.target });
                this.settle(action.id, 'expired');
            }, this.options.confirmationTimeoutMs);
            this.open.set(action.id, { request, resolve, timer });
        });

        log.info('Confirmation required', { actionId: action.id, tool: action.tool, target: action.target });
        return { kind: 'confirmation', request, decision };
    }

    /** Returns false for unknown or already-settled requests. */
    confirm(actionId: string, approve: boolean): boolean {
        return this.settle(actionId, approve ? 'approved' : 'denied');
    }

    /** Settle an open request as denied, e.g. when its plan is stopped. */
    cancel(actionId: string): boolean {
        return this.settle(actionId, 'denied');
    }

    pending(): ConfirmationRequest[] {
        return [...this.open.values()].map((entry) => entry.request);
    }

    /** Deny everything still open and clear the expiry timers. */
    shutdown(): void {
        for (const actionId of [...this.open.keys()]) {
            this.settle(actionId, 'denied');
        }
    }

    private settle(actionId: string, status: ConfirmationOutcome): boolean {
        const entry = this.open.get(actionId);
        if (!entry) return false;

        clearTimeout(entry.timer);
        this.open.delete(actionId);
        entry.resolve(status);
        log.debug('Confirmation settled', { actionId, status });
        return true;
    }
}
