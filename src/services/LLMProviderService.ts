/**
 * LLM Provider Service - reasoning backends the planner consults.
 *
 * Each backend turns a (system, user) prompt pair into raw text. Backends
 * never parse plans and never retry; the Planner Bridge owns ordering,
 * retries and timeouts. Failures surface as BackendError with a
 * `transient` flag so the caller can decide whether a retry is worthwhile.
 */

import { spawn } from 'child_process';
import axios from 'axios';
import { OpenAI } from 'openai';
import { Anthropic } from '@anthropic-ai/sdk';
import { GoogleGenerativeAI } from '@google/generative-ai';
import type { BackendConfig, OrchestratorConfig } from '../config/schema';
import { resolveApiKey } from '../config/loader';
import { BackendError, ERROR_CODES, OrchestratorError, asMessage } from '../utils/errors';
import { isRecord } from '../utils/json';
import { logger } from '../utils/logger';

export interface GenerationRequest {
    systemPrompt: string;
    userPrompt: string;
}

export interface GenerationOptions {
    timeoutMs: number;
    signal: AbortSignal;
}

export interface ReasoningBackend {
    readonly name: string;
    readonly priority: number;
    readonly timeoutMs: number;
    /** Extra attempts on this backend after a transient failure. */
    readonly retries: number;
    generate(request: GenerationRequest, options: GenerationOptions): Promise<string>;
}

const TRANSIENT_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN', 'EPIPE']);

function numberField(value: unknown, key: string): number | undefined {
    if (!isRecord(value)) return undefined;
    const field = value[key];
    return typeof field === 'number' ? field : undefined;
}

function stringField(value: unknown, key: string): string | undefined {
    if (!isRecord(value)) return undefined;
    const field = value[key];
    return typeof field === 'string' ? field : undefined;
}

/** Connection failures, timeouts, 429 and 5xx are worth retrying; auth and bad requests are not. */
export function isTransient(error: unknown): boolean {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined) return status === 429 || status >= 500;
        return error.code !== undefined && TRANSIENT_CODES.has(error.code);
    }
    const status = numberField(error, 'status');
    if (status !== undefined) return status === 429 || status >= 500;
    const code = stringField(error, 'code');
    if (code !== undefined && TRANSIENT_CODES.has(code)) return true;
    const name = stringField(error, 'name');
    return name === 'APIConnectionError' || name === 'APIConnectionTimeoutError';
}

function wrap(backend: string, error: unknown): BackendError {
    if (error instanceof BackendError) return error;
    return new BackendError(backend, asMessage(error), { transient: isTransient(error), cause: error });
}

abstract class BaseBackend implements ReasoningBackend {
    readonly name: string;
    readonly priority: number;
    readonly timeoutMs: number;
    readonly retries: number;
    protected readonly temperature: number;

    constructor(protected readonly config: BackendConfig) {
        this.name = config.name;
        this.priority = config.priority;
        this.timeoutMs = config.timeoutMs;
        this.retries = config.retries;
        this.temperature = config.temperature;
    }

    async generate(request: GenerationRequest, options: GenerationOptions): Promise<string> {
        logger.debug(`Generating plan text with ${this.name}`, { kind: this.config.kind, model: this.config.model });
        try {
            const text = await this.call(request, options);
            if (text.trim() === '') {
                throw new BackendError(this.name, 'empty response', { transient: true });
            }
            return text;
        } catch (error) {
            throw wrap(this.name, error);
        }
    }

    protected abstract call(request: GenerationRequest, options: GenerationOptions): Promise<string>;
}

// ============ HTTP / SDK BACKENDS ============

interface OllamaGenerateResponse {
    response?: string;
}

export class OllamaBackend extends BaseBackend {
    protected async call(req: GenerationRequest, options: GenerationOptions): Promise<string> {
        const baseUrl = (this.config.baseUrl ?? 'http://localhost:11434').replace(/\/$/, '');
        const response = await axios.post<OllamaGenerateResponse>(
            `${baseUrl}/api/generate`,
            {
                model: this.config.model ?? 'llama3.2',
                prompt: `${req.systemPrompt}\n\n${req.userPrompt}`,
                stream: false,
                options: { temperature: this.temperature },
            },
            { timeout: options.timeoutMs, signal: options.signal }
        );
        return response.data.response ?? '';
    }
}

export class OpenAIBackend extends BaseBackend {
    private readonly client: OpenAI;

    constructor(config: BackendConfig, apiKey: string | undefined) {
        super(config);
        this.client = new OpenAI({
            apiKey: apiKey ?? 'unset',
            maxRetries: 0,
            ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
        });
    }

    protected async call(req: GenerationRequest, options: GenerationOptions): Promise<string> {
        const completion = await this.client.chat.completions.create(
            {
                messages: [
                    { role: 'system', content: req.systemPrompt },
                    { role: 'user', content: req.userPrompt },
                ],
                model: this.config.model ?? 'gpt-4o-mini',
                temperature: this.temperature,
            },
            { signal: options.signal, timeout: options.timeoutMs }
        );
        return completion.choices[0]?.message.content ?? '';
    }
}

export class AnthropicBackend extends BaseBackend {
    private readonly client: Anthropic;

    constructor(config: BackendConfig, apiKey: string | undefined) {
        super(config);
        this.client = new Anthropic({
            apiKey: apiKey ?? 'unset',
            maxRetries: 0,
            ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
        });
    }

    protected async call(req: GenerationRequest, options: GenerationOptions): Promise<string> {
        const message = await this.client.messages.create(
            {
                model: this.config.model ?? 'claude-3-5-haiku-latest',
                max_tokens: 4096,
                temperature: this.temperature,
                system: req.systemPrompt,
                messages: [{ role: 'user', content: req.userPrompt }],
            },
            { signal: options.signal, timeout: options.timeoutMs }
        );
        return message.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
    }
}

export class GeminiBackend extends BaseBackend {
    private readonly client: GoogleGenerativeAI;

    constructor(config: BackendConfig, apiKey: string | undefined) {
        super(config);
        this.client = new GoogleGenerativeAI(apiKey ?? '');
    }

    protected async call(req: GenerationRequest, options: GenerationOptions): Promise<string> {
        const model = this.client.getGenerativeModel({
            model: this.config.model ?? 'gemini-1.5-flash',
            systemInstruction: req.systemPrompt,
            generationConfig: { temperature: this.temperature },
        });
        const result = await model.generateContent(req.userPrompt, {
            signal: options.signal,
            timeout: options.timeoutMs,
        });
        return result.response.text();
    }
}

// ============ SUBPROCESS BACKEND ============

/** Local command-line model: the prompt goes to stdin, the plan comes back on stdout. */
export class CliBackend extends BaseBackend {
    protected call(req: GenerationRequest, options: GenerationOptions): Promise<string> {
        const command = this.config.command;
        if (!command) {
            return Promise.reject(new BackendError(this.name, 'no command configured', { transient: false }));
        }

        return new Promise<string>((resolve, reject) => {
            const child = spawn(command, this.config.args, {
                signal: options.signal,
                stdio: ['pipe', 'pipe', 'pipe'],
            });
            let stdout = '';
            let stderr = '';

            child.stdout.on('data', (data: Buffer) => {
                stdout += data.toString();
            });
            child.stderr.on('data', (data: Buffer) => {
                stderr += data.toString();
            });
            child.on('error', (error: NodeJS.ErrnoException) => {
                const missing = error.code === 'ENOENT';
                reject(
                    new BackendError(this.name, missing ? `command not found: ${command}` : error.message, {
                        transient: !missing && error.name !== 'AbortError',
                        cause: error,
                    })
                );
            });
            child.on('close', (code) => {
                if (code === 0) {
                    resolve(stdout);
                    return;
                }
                const detail = stderr.trim().split('\n').slice(-3).join(' ');
                reject(new BackendError(this.name, `exited with code ${code}${detail ? `: ${detail}` : ''}`, { transient: true }));
            });

            child.stdin.on('error', (error) => {
                logger.debug(`${this.name} stdin closed early`, { error: error.message });
            });
            child.stdin.end(`${req.systemPrompt}\n\n${req.userPrompt}\n`);
        });
    }
}

// ============ FACTORY ============

export function createReasoningBackend(config: BackendConfig, env: NodeJS.ProcessEnv): ReasoningBackend {
    const apiKey = resolveApiKey(config, env);
    switch (config.kind) {
        case 'ollama':
            return new OllamaBackend(config);
        case 'openai':
            return new OpenAIBackend(config, apiKey);
        case 'anthropic':
            return new AnthropicBackend(config, apiKey);
        case 'gemini':
            return new GeminiBackend(config, apiKey);
        case 'cli':
            return new CliBackend(config);
        default: {
            const unknownKind: never = config.kind;
            throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Unsupported backend kind: ${String(unknownKind)}`);
        }
    }
}

/** Instantiate the configured backends in priority order (lowest number first). */
export function createReasoningBackends(planner: OrchestratorConfig['planner'], env: NodeJS.ProcessEnv = process.env): ReasoningBackend[] {
    const backends = planner.backends.map((config) => createReasoningBackend(config, env));
    return backends.sort((a, b) => a.priority - b.priority);
}
