/**
 * Orchestrator Agent - drives a query through scope check, planning, risk
 * gating, dispatch and storage, and reports every step on the event channel.
 *
 * A query runs as a plan in the background; callers get its id at once and
 * a completion promise that always resolves.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
    Action,
    ActionPayload,
    ConfirmationRequest,
    FindingFilter,
    Persona,
    Plan,
    Session,
    SessionInfo,
    StoredFinding,
    Summary,
} from '../types';
import type { OrchestratorConfig } from '../config/schema';
import { permitsTool } from '../config/personas';
import type { ScopeGuard } from '../services/ScopeGuard';
import { extractTargets } from '../services/ScopeGuard';
import type { PlannerBridge } from '../services/PlannerBridge';
import type { ActionGate } from '../services/ActionGate';
import type { SessionMemoryStore } from '../services/SessionMemoryStore';
import type { FindingAggregator } from '../services/FindingAggregator';
import type { PluginRegistry } from '../plugins/registry';
import type { ExecutionOutcome, PluginDispatcher } from './PluginDispatcher';
import type { EventChannel } from './EventChannel';
import { createAction, isTerminal, transition } from './ActionLifecycle';
import { ERROR_CODES, OrchestratorError, type ErrorInfo, asMessage, sessionNotFound, toErrorInfo } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('orchestrator');

export interface OrchestratorDeps {
    config: OrchestratorConfig;
    personas: ReadonlyMap<string, Persona>;
    scopeGuard: ScopeGuard;
    planner: PlannerBridge;
    gate: ActionGate;
    registry: PluginRegistry;
    dispatcher: PluginDispatcher;
    store: SessionMemoryStore;
    aggregator: FindingAggregator;
    events: EventChannel;
}

export type PlanStatus = 'completed' | 'rejected' | 'failed' | 'stopped';

export interface PlanResult {
    readonly planId: string;
    readonly sessionId: string;
    readonly status: PlanStatus;
    readonly plan?: Plan;
    readonly actions: readonly Action[];
    readonly summary?: Summary;
    readonly error?: ErrorInfo;
}

export interface SubmittedQuery {
    readonly planId: string;
    /** Resolves when the plan finishes; never rejects. */
    readonly completion: Promise<PlanResult>;
}

export interface PendingConfirmation extends ConfirmationRequest {
    readonly sessionId: string;
    readonly planId: string;
    readonly tool: string;
    readonly target: string;
    readonly description: string;
}

interface RunningPlan {
    readonly sessionId: string;
    readonly controller: AbortController;
}

interface PlanContext {
    readonly planId: string;
    readonly sessionId: string;
    readonly persona: Persona;
    readonly signal: AbortSignal;
}

export class OrchestratorAgent {
    private readonly running = new Map<string, RunningPlan>();
    private readonly completions = new Map<string, Promise<PlanResult>>();
    private readonly awaiting = new Map<string, { action: Action; planId: string }>();

    constructor(private readonly deps: OrchestratorDeps) {}

    // ============ SESSIONS & PERSONAS ============

    backendNames(): string[] {
        return this.deps.planner.backendNames;
    }

    listPersonas(): Persona[] {
        return [...this.deps.personas.values()];
    }

    getPersona(name: string): Persona {
        const persona = this.deps.personas.get(name);
        if (!persona) {
            throw new OrchestratorError(
                ERROR_CODES.CONFIGURATION_ERROR,
                `Unknown persona '${name}'. Available: ${[...this.deps.personas.keys()].join(', ')}`
            );
        }
        return persona;
    }

    createSession(personaName: string = this.deps.config.personas.default, id?: string): SessionInfo {
        const persona = this.getPersona(personaName);
        const session = this.deps.store.createSession(persona.name, id);
        this.deps.events.publish({
            type: 'persona_loaded',
            sessionId: session.id,
            persona: persona.name,
            description: persona.description,
        });
        return session;
    }

    /** Resume `id` when it exists, else create it (or a fresh session when no id is given). */
    openSession(id?: string, personaName?: string): SessionInfo {
        if (id) {
            const existing = this.deps.store.getSession(id);
            if (existing) return existing;
        }
        return this.createSession(personaName, id);
    }

    hasSession(sessionId: string): boolean {
        return this.deps.store.hasSession(sessionId);
    }

    listSessions(): SessionInfo[] {
        return this.deps.store.listSessions();
    }

    getSession(sessionId: string): Session {
        return this.deps.store.load(sessionId);
    }

    getSessionSummary(sessionIds: string | readonly string[]): Summary {
        return this.deps.aggregator.summarize(sessionIds);
    }

    recall(filter: FindingFilter): StoredFinding[] {
        return this.deps.store.query(filter);
    }

    // ============ QUERIES ============

    submitQuery(sessionId: string, text: string): SubmittedQuery {
        const session = this.deps.store.getSession(sessionId);
        if (!session) {
            throw sessionNotFound(sessionId);
        }
        const persona = this.deps.personas.get(session.persona) ?? this.getPersona(this.deps.config.personas.default);

        const planId = `plan-${uuidv4().substring(0, 8)}`;
        const controller = new AbortController();
        this.running.set(planId, { sessionId, controller });

        const context: PlanContext = { planId, sessionId, persona, signal: controller.signal };
        const completion = this.runPlan(context, text)
            .catch((error: unknown): PlanResult => {
                log.error('Plan failed unexpectedly', { planId, sessionId, error: asMessage(error) });
                return {
                    planId,
                    sessionId,
                    status: 'failed',
                    actions: [],
                    error: toErrorInfo(error, ERROR_CODES.ACTION_EXECUTION_ERROR),
                };
            })
            .finally(() => {
                this.running.delete(planId);
                this.completions.delete(planId);
                this.deps.dispatcher.releaseSession(sessionId);
            });
        this.completions.set(planId, completion);

        return { planId, completion };
    }

    /** Settle a pending confirmation. False for unknown or already-settled requests. */
    confirm(actionId: string, approve: boolean): boolean {
        return this.deps.gate.confirm(actionId, approve);
    }

    /** Cancel a running plan: queued and running actions, open confirmations and planning. */
    stop(planId: string): boolean {
        const plan = this.running.get(planId);
        if (!plan || plan.controller.signal.aborted) return false;
        log.info('Stopping plan', { planId, sessionId: plan.sessionId });
        plan.controller.abort();
        return true;
    }

    isRunning(planId: string): boolean {
        return this.running.has(planId);
    }

    pendingConfirmations(sessionId?: string): PendingConfirmation[] {
        const pending: PendingConfirmation[] = [];
        for (const request of this.deps.gate.pending()) {
            const entry = this.awaiting.get(request.actionId);
            if (!entry) continue;
            if (sessionId !== undefined && entry.action.sessionId !== sessionId) continue;
            pending.push({
                ...request,
                sessionId: entry.action.sessionId,
                planId: entry.planId,
                tool: entry.action.tool,
                target: entry.action.target,
                description: entry.action.description,
            });
        }
        return pending;
    }

    /** Stop every running plan and deny open confirmations. */
    async shutdown(): Promise<void> {
        const completions = [...this.completions.values()];
        for (const planId of [...this.running.keys()]) {
            this.stop(planId);
        }
        this.deps.gate.shutdown();
        await Promise.all(completions);
    }

    // ============ PLAN EXECUTION ============

    private async runPlan(ctx: PlanContext, text: string): Promise<PlanResult> {
        const { planId, sessionId, persona } = ctx;
        const { store, events, scopeGuard } = this.deps;

        const history = store.recentRecords(sessionId, persona.historyLimit);
        store.append(sessionId, { type: 'query', payload: { planId, text } });
        log.info('Processing query', { planId, sessionId, persona: persona.name });

        // Targets named in the query must be in scope before anything is planned
        const targets = extractTargets(text);
        const denied: string[] = [];
        for (const target of targets) {
            const decision = scopeGuard.check(target);
            if (!decision.allowed) {
                denied.push(decision.target);
            } else if (decision.warning) {
                log.warn(decision.warning, { planId, sessionId });
            }
        }
        if (denied.length > 0) {
            const error: ErrorInfo = {
                code: ERROR_CODES.SCOPE_VIOLATION,
                message: `Out-of-scope target(s): ${denied.join(', ')}`,
            };
            log.warn('Query rejected', { planId, sessionId, denied });
            events.publish({ type: 'query_rejected', sessionId, planId, query: text, targets: denied, error });
            return { planId, sessionId, status: 'rejected', actions: [], error };
        }

        const recalledFindings = persona.recallPriorFindings ? this.recallFor(targets, sessionId, persona.recallLimit) : [];
        const outcome = await this.deps.planner.plan(
            text,
            {
                sessionId,
                history,
                recalledFindings,
                fallbackTarget: targets.length === 1 ? targets[0] : undefined,
            },
            persona,
            this.deps.registry.toolNames(),
            ctx.signal
        );

        if (!outcome.ok) {
            if (outcome.error.code === ERROR_CODES.ACTION_CANCELLED) {
                events.publish({ type: 'plan_stopped', sessionId, planId });
                return { planId, sessionId, status: 'stopped', actions: [], error: outcome.error.toInfo() };
            }
            log.error('Planning failed', { planId, sessionId, error: outcome.error.message });
            events.publish({ type: 'planning_failed', sessionId, planId, error: outcome.error.toInfo() });
            return { planId, sessionId, status: 'failed', actions: [], error: outcome.error.toInfo() };
        }

        const plan: Plan = {
            id: planId,
            sessionId,
            query: text,
            backend: outcome.backend,
            actions: outcome.proposals.map((proposal) => createAction(proposal, planId, sessionId)),
            notice: outcome.notice,
        };
        events.publish({
            type: 'plan_created',
            sessionId,
            planId,
            backend: plan.backend,
            actions: plan.actions,
            notice: plan.notice,
        });

        const actions = await Promise.all(plan.actions.map((action) => this.processAction(action, ctx)));

        const summary = this.deps.aggregator.summarize(sessionId);
        if (ctx.signal.aborted) {
            events.publish({ type: 'plan_stopped', sessionId, planId });
            return { planId, sessionId, status: 'stopped', plan, actions, summary };
        }
        events.publish({ type: 'plan_complete', sessionId, planId, summary });
        log.info('Plan complete', { planId, sessionId, actions: actions.length, findings: summary.uniqueFindings });
        return { planId, sessionId, status: 'completed', plan, actions, summary };
    }

    private recallFor(targets: readonly string[], sessionId: string, limit: number): StoredFinding[] {
        if (limit <= 0 || targets.length === 0) return [];
        const recalled: StoredFinding[] = [];
        for (const target of targets) {
            for (const finding of this.deps.store.query({ target })) {
                if (finding.sessionId !== sessionId) recalled.push(finding);
            }
        }
        // Newest first
        return recalled.sort((a, b) => b.timestamp.localeCompare(a.timestamp)).slice(0, limit);
    }

    /** Take one action to a terminal state. Action-scoped failures never throw. */
    private async processAction(proposed: Action, ctx: PlanContext): Promise<Action> {
        const { scopeGuard, registry, gate } = this.deps;

        const scope = scopeGuard.check(proposed.target);
        if (!scope.allowed) {
            return this.reject(proposed, ctx, { code: ERROR_CODES.SCOPE_VIOLATION, message: scope.reason });
        }
        if (scope.warning) {
            log.warn(scope.warning, { planId: ctx.planId, actionId: proposed.id });
        }
        if (!permitsTool(ctx.persona, proposed.tool)) {
            return this.reject(proposed, ctx, {
                code: ERROR_CODES.TOOL_NOT_PERMITTED,
                message: `Persona '${ctx.persona.name}' does not permit tool '${proposed.tool}'`,
            });
        }
        if (!registry.find(proposed)) {
            return this.reject(proposed, ctx, {
                code: ERROR_CODES.NO_PLUGIN_AVAILABLE,
                message: `No plugin handles tool '${proposed.tool}'`,
            });
        }

        const decision = gate.gate(proposed);
        if (decision.kind === 'admitted') {
            return this.dispatch(transition(proposed, 'admitted', 'safe'), ctx, false);
        }

        const pending = transition(proposed, 'pending_confirmation', 'requires_confirmation');

        this.awaiting.set(pending.id, { action: pending, planId: ctx.planId });
        this.deps.events.publish({
            type: 'confirmation_required',
            sessionId: ctx.sessionId,
            planId: ctx.planId,
            action: pending,
            deadline: decision.request.expiresAt,
        });

        const onAbort = () => gate.cancel(pending.id);
        if (ctx.signal.aborted) {
            onAbort();
        } else {
            ctx.signal.addEventListener('abort', onAbort, { once: true });
        }
        const status = await decision.decision;
        ctx.signal.removeEventListener('abort', onAbort);
        this.awaiting.delete(pending.id);

        const resolved = ctx.signal.aborted && status === 'denied' ? 'cancelled' : status;
        this.deps.events.publish({
            type: 'confirmation_resolved',
            sessionId: ctx.sessionId,
            planId: ctx.planId,
            actionId: pending.id,
            status: resolved,
        });

        switch (resolved) {
            case 'approved':
                return this.dispatch(transition(pending, 'confirmed'), ctx, true);
            case 'denied':
                return this.finish(transition(pending, 'denied'), ctx, {
                    error: { code: ERROR_CODES.CONFIRMATION_DENIED, message: 'Operator denied the action' },
                });
            case 'expired':
                return this.finish(transition(pending, 'expired'), ctx, {
                    error: {
                        code: ERROR_CODES.CONFIRMATION_EXPIRED,
                        message: `No confirmation before ${decision.request.expiresAt}`,
                    },
                });
            case 'cancelled':
                return this.finish(transition(pending, 'cancelled'), ctx, {
                    error: { code: ERROR_CODES.ACTION_CANCELLED, message: 'Plan stopped before confirmation' },
                });
        }
    }

    private async dispatch(ready: Action, ctx: PlanContext, exclusive: boolean): Promise<Action> {
        let current = ready;
        const outcome: ExecutionOutcome = await this.deps.dispatcher.dispatch(ready, {
            signal: ctx.signal,
            exclusive,
            onStart: () => {
                current = transition(current, 'dispatched');
                this.deps.events.publish({
                    type: 'action_started',
                    sessionId: ctx.sessionId,
                    planId: ctx.planId,
                    action: current,
                });
            },
        });

        if (outcome.status === 'completed') {
            for (const finding of outcome.findings) {
                this.deps.store.append(ctx.sessionId, { type: 'finding', payload: finding });
                this.deps.events.publish({ type: 'finding_added', sessionId: ctx.sessionId, planId: ctx.planId, finding });
            }
            return this.finish(transition(current, 'completed'), ctx, {
                plugin: outcome.plugin,
                durationMs: outcome.durationMs,
                findingCount: outcome.findings.length,
            });
        }

        if (current.state !== 'dispatched' && outcome.status !== 'cancelled') {
            current = transition(current, 'dispatched');
        }
        return this.finish(transition(current, outcome.status), ctx, {
            plugin: outcome.plugin,
            durationMs: outcome.durationMs,
            error: outcome.error,
        });
    }

    private reject(action: Action, ctx: PlanContext, error: ErrorInfo): Action {
        log.warn('Action rejected', { planId: ctx.planId, actionId: action.id, tool: action.tool, code: error.code });
        return this.finish(transition(action, 'rejected', 'blocked'), ctx, { error });
    }

    /** Persist the terminal action record and announce it. */
    private finish(
        action: Action,
        ctx: PlanContext,
        details: { plugin?: string; durationMs?: number; error?: ErrorInfo; findingCount?: number }
    ): Action {
        if (!isTerminal(action.state)) {
            throw new Error(`Action ${action.id} finished in non-terminal state ${action.state}`);
        }
        const payload: ActionPayload = {
            action,
            plugin: details.plugin,
            error: details.error,
            durationMs: details.durationMs,
            findingCount: details.findingCount ?? 0,
        };
        this.deps.store.append(ctx.sessionId, { type: 'action', payload });
        this.deps.events.publish({
            type: 'action_completed',
            sessionId: ctx.sessionId,
            planId: ctx.planId,
            action,
            status: action.state,
            error: details.error,
            findingCount: payload.findingCount,
        });
        return action;
    }
}
