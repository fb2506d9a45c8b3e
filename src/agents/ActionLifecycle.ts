/**
 * Action lifecycle - the legal state transitions of an Action. Actions are
 * immutable; each transition returns a new frozen record with the state
 * appended to its trail.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Action, ActionState, ProposedAction, RiskLevel } from '../types';

const TRANSITIONS: Readonly<Record<ActionState, readonly ActionState[]>> = {
    proposed: ['rejected', 'admitted', 'pending_confirmation'],
    pending_confirmation: ['confirmed', 'denied', 'expired', 'cancelled'],
    admitted: ['dispatched', 'cancelled'],
    confirmed: ['dispatched', 'cancelled'],
    dispatched: ['completed', 'failed', 'timed_out', 'cancelled'],
    rejected: [],
    denied: [],
    expired: [],
    completed: [],
    failed: [],
    timed_out: [],
    cancelled: [],
};

export function isTerminal(state: ActionState): boolean {
    return TRANSITIONS[state].length === 0;
}

export function canTransition(from: ActionState, to: ActionState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function createAction(proposal: ProposedAction, planId: string, sessionId: string): Action {
    const action: Action = {
        id: `action-${uuidv4().substring(0, 8)}`,
        planId,
        sessionId,
        tool: proposal.tool.toLowerCase(),
        target: proposal.target,
        parameters: Object.freeze({ ...proposal.parameters }),
        description: proposal.description,
        riskLevel: 'safe',
        state: 'proposed',
        trail: Object.freeze(['proposed']),
    };
    return Object.freeze(action);
}

/** Throws on an illegal transition. */
export function transition(action: Action, to: ActionState, riskLevel: RiskLevel = action.riskLevel): Action {
    if (!canTransition(action.state, to)) {
        throw new Error(`Illegal action transition ${action.state} -> ${to} for ${action.id}`);
    }
    const next: Action = {
        ...action,
        riskLevel,
        state: to,
        trail: Object.freeze([...action.trail, to]),
    };
    return Object.freeze(next);
}
