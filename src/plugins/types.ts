import type { Action, FindingDraft, RiskEscalation } from '../types';
import type { ToolExecutor } from '../services/ToolServerClient';

export interface PluginRuntime {
    /** Aborted on timeout or when the plan is stopped. */
    readonly signal: AbortSignal;
    readonly timeoutMs: number;
    readonly toolServer: ToolExecutor;
}

/**
 * A tool integration. The dispatcher runs the first registered plugin whose
 * `matches` accepts the action.
 */
export interface ToolPlugin {
    readonly name: string;
    readonly description: string;
    /** Tool names this plugin answers to, offered to the planner. */
    readonly tools: readonly string[];
    matches(action: Action): boolean;
    /** Escalate an action to dangerous; undefined leaves the keyword check to decide. */
    riskClassify?(action: Action): RiskEscalation;
    execute(action: Action, runtime: PluginRuntime): Promise<FindingDraft[]>;
}
