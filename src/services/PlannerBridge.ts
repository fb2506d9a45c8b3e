/**
 * Planner Bridge - turns a query into proposed actions by consulting the
 * reasoning backends in priority order, with per-attempt timeouts, bounded
 * retries and tolerant parsing of whatever text comes back.
 */

import type { Persona, ProposedAction, SessionRecord, StoredFinding } from '../types';
import type { GenerationRequest, ReasoningBackend } from './LLMProviderService';
import { parsePlanText } from './PlanParser';
import { BackendError, ERROR_CODES, OrchestratorError, asMessage, cancelledError } from '../utils/errors';
import { runWithTimeout, sleep } from '../utils/timeout';
import { componentLogger } from '../utils/logger';

const log = componentLogger('planner');

export const NO_ACTIONABLE_PLAN = 'no actionable plan';

export interface PlanningContext {
    sessionId: string;
    /** Most recent session records, oldest first. */
    history: readonly SessionRecord[];
    recalledFindings: readonly StoredFinding[];
    /** The one target the query names, used for entries that omit a target. */
    fallbackTarget?: string;
}

export type PlanningOutcome =
    | {
          readonly ok: true;
          readonly backend: string;
          readonly proposals: ProposedAction[];
          readonly attempts: number;
          readonly notice?: string;
      }
    | { readonly ok: false; readonly error: OrchestratorError; readonly attempts: number };

export interface PlannerOptions {
    /** Cap on backend calls per query across all backends. */
    maxAttempts: number;
    /** Delay before the n-th retry on the same backend; the last entry repeats. */
    backoffMs: readonly number[];
}

function describeRecord(record: SessionRecord): string {
    switch (record.type) {
        case 'query':
            return `[query] ${record.payload.text}`;
        case 'action': {
            const { action, error } = record.payload;
            const suffix = error ? ` (${error.code})` : '';
            return `[action] ${action.tool} ${action.target} -> ${action.state}${suffix}`;
        }
        case 'finding':
            return `[finding] ${record.payload.severity} ${record.payload.title} on ${record.payload.target}`;
    }
}

export function buildPlanningPrompt(
    query: string,
    context: PlanningContext,
    persona: Persona,
    tools: readonly string[]
): GenerationRequest {
    const systemLines = [
        'You plan authorized security testing steps.',
        `Available tools: ${tools.length > 0 ? tools.join(', ') : '(none)'}.`,
        'Respond with JSON only, in this shape:',
        '{"actions": [{"tool": "<tool>", "target": "<ip, cidr or domain>", "parameters": {"key": "value"}, "description": "<why>"}]}',
        'Only target hosts the operator named. Return {"actions": []} when nothing applies.',
    ];
    if (persona.planningHint) {
        systemLines.push(`Operator profile (${persona.name}): ${persona.planningHint}`);
    }

    const sections: string[] = [];
    const history = persona.historyLimit > 0 ? context.history.slice(-persona.historyLimit) : [];
    if (history.length > 0) {
        sections.push(`Recent session history:\n${history.map(describeRecord).join('\n')}`);
    }
    const recalled = context.recalledFindings.slice(0, persona.recallLimit);
    if (recalled.length > 0) {
        const lines = recalled.map(
            (finding) => `- [${finding.severity}] ${finding.title} on ${finding.target} (session ${finding.sessionId})`
        );
        sections.push(`Findings from earlier sessions:\n${lines.join('\n')}`);
    }
    sections.push(`Request: ${query}`);

    return { systemPrompt: systemLines.join('\n'), userPrompt: sections.join('\n\n') };
}

function isCancellation(error: unknown): boolean {
    return error instanceof OrchestratorError && error.code === ERROR_CODES.ACTION_CANCELLED;
}

export class PlannerBridge {
    constructor(
        private readonly backends: readonly ReasoningBackend[],
        private readonly options: PlannerOptions
    ) {}

    get backendNames(): string[] {
        return this.backends.map((backend) => backend.name);
    }

    /**
     * Produce proposals for `query`. `knownTools` is every registered tool;
     * the prompt only offers the ones the persona permits.
     */
    async plan(
        query: string,
        context: PlanningContext,
        persona: Persona,
        knownTools: readonly string[],
        signal: AbortSignal
    ): Promise<PlanningOutcome> {
        const offered = knownTools.filter((tool) => persona.allowedTools.includes('*') || persona.allowedTools.includes(tool));
        const request = buildPlanningPrompt(query, context, persona, offered);
        const failures: string[] = [];
        let attempts = 0;

        for (const [index, backend] of this.backends.entries()) {
            // Retries never spend the attempts later backends need for their first try
            const reserved = this.backends.length - index - 1;
            for (let retry = 0; retry <= backend.retries; retry++) {
                if (attempts >= this.options.maxAttempts) {
                    return this.unavailable(attempts, failures);
                }
                if (retry > 0 && this.options.maxAttempts - attempts <= reserved) {
                    break;
                }
                if (signal.aborted) {
                    return { ok: false, error: cancelledError('planning'), attempts };
                }

                try {
                    if (retry > 0) {
                        await sleep(this.backoffFor(retry), signal);
                    }
                    attempts++;
                    const text = await runWithTimeout(
                        (attemptSignal) => backend.generate(request, { timeoutMs: backend.timeoutMs, signal: attemptSignal }),
                        backend.timeoutMs,
                        {
                            parent: signal,
                            what: 'planning',
                            onTimeout: () =>
                                new BackendError(backend.name, `timed out after ${backend.timeoutMs}ms`, { transient: true }),
                        }
                    );
                    return this.interpret(text, backend.name, attempts, knownTools, context);
                } catch (error) {
                    if (isCancellation(error) || signal.aborted) {
                        return { ok: false, error: cancelledError('planning'), attempts };
                    }
                    const failure =
                        error instanceof BackendError
                            ? error
                            : new BackendError(backend.name, asMessage(error), { transient: false, cause: error });
                    failures.push(failure.message);
                    log.warn('Reasoning backend attempt failed', {
                        sessionId: context.sessionId,
                        backend: backend.name,
                        attempt: attempts,
                        transient: failure.transient,
                        error: failure.message,
                    });
                    if (!failure.transient) break;
                }
            }
        }

        return this.unavailable(attempts, failures);
    }

    private interpret(
        text: string,
        backend: string,
        attempts: number,
        knownTools: readonly string[],
        context: PlanningContext
    ): PlanningOutcome {
        const parsed = parsePlanText(text, { knownTools, fallbackTarget: context.fallbackTarget });
        if (!parsed.ok) {
            log.warn(`${ERROR_CODES.PLANNER_PARSE_ERROR}: ${parsed.reason}`, {
                sessionId: context.sessionId,
                backend,
                preview: text.slice(0, 200),
            });
            return { ok: true, backend, proposals: [], attempts, notice: NO_ACTIONABLE_PLAN };
        }
        log.info(`Plan parsed from ${backend}`, {
            sessionId: context.sessionId,
            strategy: parsed.strategy,
            actions: parsed.actions.length,
        });
        return { ok: true, backend, proposals: parsed.actions, attempts };
    }

    private backoffFor(retry: number): number {
        const table = this.options.backoffMs;
        if (table.length === 0) return 0;
        return table[Math.min(retry - 1, table.length - 1)];
    }

    private unavailable(attempts: number, failures: readonly string[]): PlanningOutcome {
        const detail = failures.length > 0 ? failures.join('; ') : 'no reasoning backends configured';
        return {
            ok: false,
            attempts,
            error: new OrchestratorError(
                ERROR_CODES.PLANNER_UNAVAILABLE,
                `No reasoning backend produced a plan after ${attempts} attempt(s): ${detail}`
            ),
        };
    }
}
