/**
 * Plugin Dispatcher - routes admitted actions to the first matching plugin
 * and runs them on a per-session keyed pool under the action timeout.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Action, Finding, FindingDraft } from '../types';
import type { PluginRegistry } from '../plugins/registry';
import type { ToolPlugin } from '../plugins/types';
import type { ToolExecutor } from '../services/ToolServerClient';
import { normalizeTarget } from '../services/ScopeGuard';
import { KeyedWorkerPool } from './WorkerPool';
import { ERROR_CODES, OrchestratorError, type ErrorInfo, asMessage } from '../utils/errors';
import { runWithTimeout } from '../utils/timeout';
import { componentLogger } from '../utils/logger';

const log = componentLogger('dispatcher');

export type ExecutionOutcome =
    | {
          readonly status: 'completed';
          readonly plugin: string;
          readonly findings: readonly Finding[];
          readonly durationMs: number;
      }
    | {
          readonly status: 'failed' | 'timed_out' | 'cancelled';
          readonly plugin?: string;
          readonly error: ErrorInfo;
          readonly durationMs: number;
      };

export interface DispatchOptions {
    signal: AbortSignal;
    /** Run on the session's single dangerous lane. */
    exclusive?: boolean;
    /** Called when the action leaves the queue and starts running. */
    onStart?: () => void;
}

export interface DispatcherOptions {
    actionTimeoutMs: number;
    concurrency: number;
}

export function stampFinding(draft: FindingDraft, action: Action, now: Date = new Date()): Finding {
    return Object.freeze({
        id: uuidv4(),
        target: draft.target ?? action.target,
        category: draft.category,
        severity: draft.severity,
        title: draft.title,
        evidence: Object.freeze({ ...(draft.evidence ?? {}) }),
        timestamp: now.toISOString(),
        sourceActionId: action.id,
    });
}

function isCode(error: unknown, code: string): boolean {
    return error instanceof OrchestratorError && error.code === code;
}

export class PluginDispatcher {
    private readonly pools = new Map<string, KeyedWorkerPool>();

    constructor(
        private readonly registry: PluginRegistry,
        private readonly toolServer: ToolExecutor,
        private readonly options: DispatcherOptions
    ) {}

    async dispatch(action: Action, options: DispatchOptions): Promise<ExecutionOutcome> {
        const plugin = this.registry.find(action);
        if (!plugin) {
            return {
                status: 'failed',
                error: { code: ERROR_CODES.NO_PLUGIN_AVAILABLE, message: `No plugin handles tool '${action.tool}'` },
                durationMs: 0,
            };
        }

        const keys = [`${action.tool}|${normalizeTarget(action.target)}`];
        if (options.exclusive) {
            keys.push(`dangerous:${action.sessionId}`);
        }

        try {
            return await this.poolFor(action.sessionId).submit(
                keys,
                () => this.execute(plugin, action, options),
                options.signal
            );
        } catch (error) {
            // Only a queued task aborted before it started lands here
            return {
                status: 'cancelled',
                plugin: plugin.name,
                error: { code: ERROR_CODES.ACTION_CANCELLED, message: asMessage(error) },
                durationMs: 0,
            };
        }
    }

    /** Drop the pool of a session with nothing queued or running. */
    releaseSession(sessionId: string): void {
        const pool = this.pools.get(sessionId);
        if (pool && pool.activeCount === 0 && pool.queuedCount === 0) {
            this.pools.delete(sessionId);
        }
    }

    private poolFor(sessionId: string): KeyedWorkerPool {
        let pool = this.pools.get(sessionId);
        if (!pool) {
            pool = new KeyedWorkerPool(this.options.concurrency);
            this.pools.set(sessionId, pool);
        }
        return pool;
    }

    private async execute(plugin: ToolPlugin, action: Action, options: DispatchOptions): Promise<ExecutionOutcome> {
        options.onStart?.();
        const startTime = Date.now();
        const timeoutMs = this.options.actionTimeoutMs;
        log.info(`Running ${plugin.name}`, { actionId: action.id, tool: action.tool, target: action.target });

        try {
            const drafts = await runWithTimeout(
                (signal) => plugin.execute(action, { signal, timeoutMs, toolServer: this.toolServer }),
                timeoutMs,
                {
                    parent: options.signal,
                    what: 'action',
                    onTimeout: () =>
                        new OrchestratorError(
                            ERROR_CODES.ACTION_TIMEOUT,
                            `${action.tool} on ${action.target} timed out after ${timeoutMs}ms`
                        ),
                }
            );
            const now = new Date();
            const findings = Object.freeze(drafts.map((draft) => stampFinding(draft, action, now)));
            return { status: 'completed', plugin: plugin.name, findings, durationMs: Date.now() - startTime };
        } catch (error) {
            const durationMs = Date.now() - startTime;
            if (isCode(error, ERROR_CODES.ACTION_TIMEOUT)) {
                log.warn('Action timed out', { actionId: action.id, durationMs });
                return {
                    status: 'timed_out',
                    plugin: plugin.name,
                    error: { code: ERROR_CODES.ACTION_TIMEOUT, message: asMessage(error) },
                    durationMs,
                };
            }
            if (isCode(error, ERROR_CODES.ACTION_CANCELLED) || options.signal.aborted) {
                return {
                    status: 'cancelled',
                    plugin: plugin.name,
                    error: { code: ERROR_CODES.ACTION_CANCELLED, message: 'action cancelled' },
                    durationMs,
                };
            }
            log.error(`${plugin.name} failed`, { actionId: action.id, error: asMessage(error) });
            return {
                status: 'failed',
                plugin: plugin.name,
                error: { code: ERROR_CODES.ACTION_EXECUTION_ERROR, message: `${plugin.name}: ${asMessage(error)}` },
                durationMs,
            };
        }
    }
}
