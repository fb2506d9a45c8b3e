/**
 * Metasploit plugin - module search, exploit suggestion for detected
 * services, safe `check` runs and (confirmed) exploit runs.
 */

import type { Action, FindingDraft, RiskEscalation } from '../types';
import type { PluginRuntime, ToolPlugin } from './types';
import type { ToolParameters } from '../services/ToolServerClient';
import { outputRecord, pickEvidence, recordList, stringOf, toolNamed } from './output';
import { isRecord } from '../utils/json';

export type MetasploitOperation = 'search' | 'suggest' | 'info' | 'check' | 'run';

const MODULE_EVIDENCE = ['fullname', 'path', 'rank', 'disclosure_date', 'type', 'name'];

export function metasploitOperation(action: Action): MetasploitOperation {
    const requested = (action.parameters.action ?? action.parameters.operation ?? '').toLowerCase();
    if (requested === 'exploit' || requested === 'run') {
        return action.parameters.mode?.toLowerCase() === 'check' ? 'check' : 'run';
    }
    if (requested === 'search' || requested === 'suggest' || requested === 'info' || requested === 'check') {
        return requested;
    }
    if (action.parameters.service) return 'suggest';
    if (action.parameters.module) return 'info';
    return 'search';
}

function moduleKey(module: Record<string, unknown>): string | undefined {
    return stringOf(module, 'fullname', 'path');
}

/** Drop modules already seen by full name; entries without one are dropped too. */
export function dedupeModules(modules: readonly Record<string, unknown>[]): Record<string, unknown>[] {
    const seen = new Set<string>();
    return modules.filter((module) => {
        const key = moduleKey(module);
        if (!key || seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

export class MetasploitPlugin implements ToolPlugin {
    readonly name = 'metasploit';
    readonly description = 'Search Metasploit modules and suggest exploits for detected services';
    readonly tools = ['metasploit', 'msf'];

    matches(action: Action): boolean {
        return toolNamed(this.tools, action.tool);
    }

    riskClassify(action: Action): RiskEscalation {
        return metasploitOperation(action) === 'run' ? 'dangerous' : undefined;
    }

    async execute(action: Action, runtime: PluginRuntime): Promise<FindingDraft[]> {
        const operation = metasploitOperation(action);
        switch (operation) {
            case 'search': {
                const term = action.parameters.search ?? action.parameters.query ?? action.description;
                const modules = await this.search(runtime, term, action.parameters.type);
                return dedupeModules(modules).map((module) => this.moduleFinding(module, 'metasploit_module', 'Info'));
            }
            case 'suggest': {
                const service = action.parameters.service ?? action.description;
                const terms = [service];
                if (action.parameters.version) terms.push(`${service} ${action.parameters.version}`);

                const modules: Record<string, unknown>[] = [];
                for (const term of terms) {
                    modules.push(...(await this.search(runtime, term, 'exploit')));
                }
                return dedupeModules(modules).map((module) => this.moduleFinding(module, 'exploit_suggestion', 'Low'));
            }
            case 'info': {
                const output = await this.call(runtime, { action: 'info', module: this.requireModule(action) });
                return [this.moduleFinding({ fullname: action.parameters.module, ...output }, 'metasploit_module', 'Info')];
            }
            case 'check':
            case 'run':
                return this.runModule(action, runtime, operation === 'check');
        }
    }

    private async runModule(action: Action, runtime: PluginRuntime, checkOnly: boolean): Promise<FindingDraft[]> {
        const module = this.requireModule(action);
        const parameters: ToolParameters = { action: 'run', module, target: action.target };
        if (checkOnly) parameters.mode = 'check';
        if (action.parameters.payload) parameters.payload = action.parameters.payload;

        const output = await this.call(runtime, parameters);
        if (output.success === false) {
            throw new Error(`metasploit ${module} failed: ${stringOf(output, 'error') ?? 'unknown error'}`);
        }

        if (checkOnly) {
            if (output.vulnerable !== true) return [];
            return [
                {
                    category: 'vulnerability',
                    severity: 'High',
                    title: `${module} reports the target as vulnerable`,
                    evidence: { module, ...pickEvidence(output, ['check_code', 'details', 'message']) },
                },
            ];
        }

        const session = stringOf(output, 'session', 'session_id');
        if (!session) return [];
        return [
            {
                category: 'exploitation',
                severity: 'Critical',
                title: `${module} opened a session`,
                evidence: { module, session, ...pickEvidence(output, ['payload', 'session_type']) },
            },
        ];
    }

    private async search(runtime: PluginRuntime, term: string, type?: string): Promise<Record<string, unknown>[]> {
        const parameters: ToolParameters = { action: 'search', search: term };
        if (type) parameters.type = type;
        const raw = await runtime.toolServer.executeTool('metasploit', parameters, {
            signal: runtime.signal,
            timeoutMs: runtime.timeoutMs,
        });
        if (Array.isArray(raw)) return raw.filter(isRecord);
        return recordList(outputRecord(raw), ['modules', 'results']);
    }

    private async call(runtime: PluginRuntime, parameters: ToolParameters): Promise<Record<string, unknown>> {
        return outputRecord(
            await runtime.toolServer.executeTool('metasploit', parameters, {
                signal: runtime.signal,
                timeoutMs: runtime.timeoutMs,
            })
        );
    }

    private requireModule(action: Action): string {
        const module = action.parameters.module;
        if (!module) {
            throw new Error('metasploit: a module parameter is required');
        }
        return module;
    }

    private moduleFinding(
        module: Record<string, unknown>,
        category: string,
        severity: FindingDraft['severity']
    ): FindingDraft {
        const name = moduleKey(module) ?? 'unknown module';
        const summary = stringOf(module, 'description', 'name');
        return {
            category,
            severity,
            title: summary ? `${name}: ${summary}` : name,
            evidence: pickEvidence(module, MODULE_EVIDENCE),
        };
    }
}
