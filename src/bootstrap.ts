/**
 * Wires the orchestrator components from a loaded configuration. Tests pass
 * fakes for the reasoning backends, plugins and tool server.
 */

import type { OrchestratorConfig } from './config/schema';
import type { Persona } from './types';
import { loadPersonas } from './config/personas';
import { ScopeGuard } from './services/ScopeGuard';
import { PlannerBridge } from './services/PlannerBridge';
import { ActionGate } from './services/ActionGate';
import { SessionMemoryStore } from './services/SessionMemoryStore';
import { FindingAggregator } from './services/FindingAggregator';
import { ToolServerClient, type ToolExecutor } from './services/ToolServerClient';
import { createReasoningBackends, type ReasoningBackend } from './services/LLMProviderService';
import { PluginRegistry, createBuiltinPlugins, type ToolPlugin } from './plugins';
import { PluginDispatcher } from './agents/PluginDispatcher';
import { EventChannel } from './agents/EventChannel';
import { OrchestratorAgent } from './agents/OrchestratorAgent';
import { ERROR_CODES, OrchestratorError } from './utils/errors';

export interface RuntimeOverrides {
    env?: NodeJS.ProcessEnv;
    backends?: ReasoningBackend[];
    plugins?: ToolPlugin[];
    toolServer?: ToolExecutor;
    personas?: ReadonlyMap<string, Persona>;
}

export interface Runtime {
    readonly config: OrchestratorConfig;
    readonly orchestrator: OrchestratorAgent;
    readonly events: EventChannel;
    readonly store: SessionMemoryStore;
    readonly toolServer: ToolExecutor;
    /** Set when the tool server is the real HTTP client. */
    readonly toolServerClient?: ToolServerClient;
    close(): Promise<void>;
}

export function createRuntime(config: OrchestratorConfig, overrides: RuntimeOverrides = {}): Runtime {
    const personas = overrides.personas ?? loadPersonas(config.personas.directory);
    if (!personas.has(config.personas.default)) {
        throw new OrchestratorError(
            ERROR_CODES.CONFIGURATION_ERROR,
            `Default persona '${config.personas.default}' is not defined`
        );
    }

    let toolServerClient: ToolServerClient | undefined;
    let toolServer: ToolExecutor;
    if (overrides.toolServer) {
        toolServer = overrides.toolServer;
    } else {
        toolServerClient = new ToolServerClient(config.toolServer.url, config.toolServer.healthTimeoutMs);
        toolServer = toolServerClient;
    }

    const registry = new PluginRegistry(overrides.plugins ?? createBuiltinPlugins());
    const store = new SessionMemoryStore(config.storage.path);
    const events = new EventChannel(config.events.bufferSize);
    const gate = new ActionGate(
        {
            dangerousKeywords: config.safety.dangerousActions,
            confirmationTimeoutMs: config.safety.confirmationTimeoutMs,
        },
        (action) => registry.riskOverride(action)
    );
    const planner = new PlannerBridge(overrides.backends ?? createReasoningBackends(config.planner, overrides.env), {
        maxAttempts: config.planner.maxAttempts,
        backoffMs: config.planner.backoffMs,
    });

    const orchestrator = new OrchestratorAgent({
        config,
        personas,
        scopeGuard: new ScopeGuard(config.scope),
        planner,
        gate,
        registry,
        dispatcher: new PluginDispatcher(registry, toolServer, {
            actionTimeoutMs: config.execution.actionTimeoutMs,
            concurrency: config.execution.concurrency,
        }),
        store,
        aggregator: new FindingAggregator(store, config.aggregation.fingerprint),
        events,
    });

    return {
        config,
        orchestrator,
        events,
        store,
        toolServer,
        toolServerClient,
        async close() {
            await orchestrator.shutdown();
            store.close();
        },
    };
}
