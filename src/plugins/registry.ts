import type { Action, RiskEscalation } from '../types';
import type { ToolPlugin } from './types';
import { ERROR_CODES, OrchestratorError } from '../utils/errors';
import { logger } from '../utils/logger';

/** Ordered plugin list, fixed once constructed. First match wins. */
export class PluginRegistry {
    private readonly plugins: readonly ToolPlugin[];

    constructor(plugins: readonly ToolPlugin[]) {
        const names = new Set<string>();
        for (const plugin of plugins) {
            if (names.has(plugin.name)) {
                throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Duplicate plugin name: ${plugin.name}`);
            }
            names.add(plugin.name);
        }
        this.plugins = Object.freeze([...plugins]);
        logger.info(`Registered ${plugins.length} plugin(s)`, { plugins: [...names] });
    }

    find(action: Action): ToolPlugin | undefined {
        return this.plugins.find((plugin) => plugin.matches(action));
    }

    list(): readonly ToolPlugin[] {
        return this.plugins;
    }

    /** Every tool name a registered plugin answers to, for planning prompts and keyword parsing. */
    toolNames(): string[] {
        return [...new Set(this.plugins.flatMap((plugin) => plugin.tools))];
    }

    riskOverride(action: Action): RiskEscalation {
        return this.find(action)?.riskClassify?.(action);
    }
}
