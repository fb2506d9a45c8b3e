/**
 * Shared test doubles: scripted reasoning backends, an in-process tool
 * server and small builders for actions and findings.
 */

import http from 'http';
import type { Action, ProposedAction, StoredFinding } from '../types';
import type { GenerationOptions, GenerationRequest, ReasoningBackend } from '../services/LLMProviderService';
import type { ToolCallOptions, ToolExecutor, ToolParameters } from '../services/ToolServerClient';
import { parseConfig } from '../config/loader';
import type { OrchestratorConfig } from '../config/schema';
import { createAction } from '../agents/ActionLifecycle';

export type Reply = (request: GenerationRequest, options: GenerationOptions) => Promise<string>;

/** Backend whose n-th call uses the n-th reply (the last one repeats). */
export class ScriptedBackend implements ReasoningBackend {
    readonly requests: GenerationRequest[] = [];
    calls = 0;

    constructor(
        readonly name: string,
        private readonly replies: Reply[],
        readonly retries = 0,
        readonly timeoutMs = 1000,
        readonly priority = 0
    ) {}

    generate(request: GenerationRequest, options: GenerationOptions): Promise<string> {
        this.requests.push(request);
        const reply = this.replies[Math.min(this.calls, this.replies.length - 1)];
        this.calls++;
        return reply(request, options);
    }
}

export const reply = (text: string): Reply => () => Promise.resolve(text);

export const fail = (error: Error): Reply => () => Promise.reject(error);

/** Never answers; rejects only when its signal aborts. */
export const hang: Reply = (_request, options) =>
    new Promise<string>((_resolve, reject) => {
        options.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });

export function planJson(actions: Array<Partial<ProposedAction> & { tool: string }>): string {
    return JSON.stringify({ actions });
}

export interface ToolCall {
    tool: string;
    parameters: ToolParameters;
}

type ToolHandler = (parameters: ToolParameters, options: ToolCallOptions) => Promise<unknown>;

/** In-process tool server: one handler per tool name, every call recorded. */
export class FakeToolServer implements ToolExecutor {
    readonly calls: ToolCall[] = [];

    constructor(private readonly handlers: Record<string, ToolHandler> = {}) {}

    on(tool: string, handler: ToolHandler): this {
        this.handlers[tool] = handler;
        return this;
    }

    executeTool(tool: string, parameters: ToolParameters, options: ToolCallOptions): Promise<unknown> {
        this.calls.push({ tool, parameters });
        const handler = this.handlers[tool];
        if (!handler) {
            return Promise.reject(new Error(`no handler for ${tool}`));
        }
        return handler(parameters, options);
    }
}

export function testConfig(overrides: Record<string, unknown> = {}): OrchestratorConfig {
    return parseConfig({
        scope: { allowedIps: ['192.168.1.0/24'], allowedDomains: ['example.com'], strictMode: true },
        storage: { path: ':memory:' },
        planner: { backends: [], maxAttempts: 3, backoffMs: [0] },
        ...overrides,
    });
}

export function makeAction(
    proposal: Partial<ProposedAction> = {},
    ids: { planId?: string; sessionId?: string } = {}
): Action {
    return createAction(
        {
            tool: 'nmap',
            target: '192.168.1.10',
            parameters: {},
            description: 'port scan',
            ...proposal,
        },
        ids.planId ?? 'plan-test',
        ids.sessionId ?? 'session-test'
    );
}

let findingCounter = 0;

export function makeFinding(overrides: Partial<StoredFinding> = {}): StoredFinding {
    findingCounter++;
    return {
        id: `finding-${findingCounter}`,
        target: '192.168.1.10',
        category: 'open_port',
        severity: 'Info',
        title: 'Open port 22/tcp (ssh)',
        evidence: { port: 22, protocol: 'tcp', service: 'ssh' },
        timestamp: '2025-01-01T00:00:00.000Z',
        sourceActionId: 'action-1',
        sessionId: 'session-a',
        ...overrides,
    };
}

export interface Listening {
    url: string;
    close(): Promise<void>;
}

/** Serve `handler` on an ephemeral localhost port. */
export function listen(handler: http.RequestListener): Promise<Listening> {
    const server = http.createServer(handler);
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            const port = typeof address === 'object' && address ? address.port : 0;
            resolve({
                url: `http://127.0.0.1:${port}`,
                close: () =>
                    new Promise<void>((done, failed) => {
                        server.closeAllConnections();
                        server.close((error) => (error ? failed(error) : done()));
                    }),
            });
        });
    });
}
