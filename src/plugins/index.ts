import { MetasploitPlugin } from './MetasploitPlugin';
import { NmapPlugin } from './NmapPlugin';
import { WebVulnPlugin } from './WebVulnPlugin';
import type { ToolPlugin } from './types';

export { PluginRegistry } from './registry';
export type { PluginRuntime, ToolPlugin } from './types';

export function createBuiltinPlugins(): ToolPlugin[] {
    return [new NmapPlugin(), new MetasploitPlugin(), new WebVulnPlugin()];
}
