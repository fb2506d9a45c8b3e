/**
 * Tool Server Client - HTTP client for the MCP-style tool execution server
 * the built-in plugins run their tools through.
 */

import axios from 'axios';
import { isRecord } from '../utils/json';
import { asMessage } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('tool-server');

export type ToolParameters = Record<string, string | number | boolean>;

export interface ToolCallOptions {
    signal: AbortSignal;
    timeoutMs: number;
}

/** What plugins see of the tool server; tests substitute an in-process fake. */
export interface ToolExecutor {
    executeTool(tool: string, parameters: ToolParameters, options: ToolCallOptions): Promise<unknown>;
}

export class ToolServerClient implements ToolExecutor {
    private readonly baseUrl: string;

    constructor(
        url: string,
        private readonly healthTimeoutMs: number = 5000
    ) {
        this.baseUrl = url.replace(/\/$/, '');
    }

    get url(): string {
        return this.baseUrl;
    }

    async isAvailable(): Promise<boolean> {
        try {
            const response = await axios.get(`${this.baseUrl}/health`, { timeout: this.healthTimeoutMs });
            return response.status === 200;
        } catch (error) {
            log.warn('Tool server not available', { url: this.baseUrl, error: asMessage(error) });
            return false;
        }
    }

    async listTools(): Promise<string[]> {
        try {
            const response = await axios.get<unknown>(`${this.baseUrl}/tools`, { timeout: this.healthTimeoutMs });
            const data = response.data;
            const entries = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.tools) ? data.tools : [];
            return entries
                .map((entry: unknown) => (typeof entry === 'string' ? entry : isRecord(entry) ? entry.name : undefined))
                .filter((name: unknown): name is string => typeof name === 'string');
        } catch (error) {
            log.warn('Failed to list tool server tools', { url: this.baseUrl, error: asMessage(error) });
            return [];
        }
    }

    /**
     * POST /tools/{tool}/execute, falling back to the generic
     * /mcp/tools/call endpoint when the first form is rejected.
     */
    async executeTool(tool: string, parameters: ToolParameters, options: ToolCallOptions): Promise<unknown> {
        const requestConfig = { timeout: options.timeoutMs, signal: options.signal };
        log.debug('Executing tool', { tool, parameters });

        try {
            const response = await axios.post<unknown>(
                `${this.baseUrl}/tools/${encodeURIComponent(tool)}/execute`,
                { parameters },
                requestConfig
            );
            return response.data;
        } catch (error) {
            if (options.signal.aborted || !axios.isAxiosError(error) || error.response === undefined) {
                throw error;
            }
            log.debug('Direct tool endpoint rejected, trying MCP call endpoint', {
                tool,
                status: error.response.status,
            });
            const fallback = await axios.post<unknown>(
                `${this.baseUrl}/mcp/tools/call`,
                { name: tool, arguments: parameters },
                requestConfig
            );
            const data = fallback.data;
            return isRecord(data) && 'result' in data ? data.result : data;
        }
    }
}
