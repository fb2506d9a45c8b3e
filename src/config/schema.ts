import { isIP } from 'net';
import { z } from 'zod';

export const BACKEND_KINDS = ['ollama', 'openai', 'anthropic', 'gemini', 'cli'] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

function isIpRule(value: string): boolean {
    const [address, prefix, ...rest] = value.split('/');
    const family = isIP(address);
    if (family === 0 || rest.length > 0) return false;
    if (prefix === undefined) return true;
    if (!/^\d{1,3}$/.test(prefix)) return false;
    return Number(prefix) <= (family === 4 ? 32 : 128);
}

const ScopeSchema = z
    .object({
        allowedIps: z
            .array(z.string().trim().refine(isIpRule, { message: 'expected an IP address or CIDR block' }))
            .default([]),
        allowedDomains: z.array(z.string().trim().toLowerCase().min(1)).default([]),
        strictMode: z.boolean().default(true),
    })
    .strict();

export const BackendSchema = z
    .object({
        name: z.string().min(1),
        kind: z.enum(BACKEND_KINDS),
        priority: z.number().int().default(100),
        model: z.string().optional(),
        baseUrl: z.string().url().optional(),
        apiKey: z.string().optional(),
        /** Environment variable holding the API key; keeps secrets out of the file. */
        apiKeyEnv: z.string().optional(),
        command: z.string().optional(),
        args: z.array(z.string()).default([]),
        timeoutMs: z.number().int().positive().default(60_000),
        retries: z.number().int().min(0).max(5).default(0),
        temperature: z.number().min(0).max(2).default(0.2),
    })
    .strict()
    .superRefine((value, ctx) => {
        if (value.kind === 'cli' && !value.command) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'cli backends require a command', path: ['command'] });
        }
    });

const PlannerSchema = z
    .object({
        backends: z
            .array(BackendSchema)
            .default([{ name: 'ollama-local', kind: 'ollama', model: 'llama3.2', baseUrl: 'http://localhost:11434' }]),
        maxAttempts: z.number().int().min(1).max(10).default(3),
        backoffMs: z.array(z.number().int().nonnegative()).default([500, 1000]),
    })
    .strict();

const SafetySchema = z
    .object({
        dangerousActions: z.array(z.string().trim().toLowerCase().min(1)).default(['exploit', 'payload', 'inject']),
        confirmationTimeoutMs: z.number().int().positive().default(300_000),
    })
    .strict();

const ExecutionSchema = z
    .object({
        actionTimeoutMs: z.number().int().positive().default(600_000),
        concurrency: z.number().int().min(1).max(64).default(4),
    })
    .strict();

const ToolServerSchema = z
    .object({
        url: z.string().url().default('http://127.0.0.1:8888'),
        healthTimeoutMs: z.number().int().positive().default(5_000),
    })
    .strict();

const StorageSchema = z
    .object({
        path: z.string().min(1).default('~/.scopewarden/memory.db'),
    })
    .strict();

const AggregationSchema = z
    .object({
        fingerprint: z
            .object({
                algorithm: z.enum(['sha256', 'exact']).default('sha256'),
                evidenceKeys: z.array(z.string()).default([]),
            })
            .strict()
            .default({}),
    })
    .strict();

const PersonasSchema = z
    .object({
        directory: z.string().min(1).default('personas'),
        default: z.string().min(1).default('default'),
    })
    .strict();

const EventsSchema = z
    .object({
        bufferSize: z.number().int().min(10).default(1000),
    })
    .strict();

const ServerSchema = z
    .object({
        port: z.number().int().min(0).max(65535).default(4000),
        authSecret: z.string().min(1).optional(),
        corsOrigins: z.array(z.string()).default(['http://localhost:3000']),
    })
    .strict();

const LoggingSchema = z
    .object({
        level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
        json: z.boolean().default(false),
    })
    .strict();

export const OrchestratorConfigSchema = z
    .object({
        scope: ScopeSchema.default({}),
        personas: PersonasSchema.default({}),
        safety: SafetySchema.default({}),
        planner: PlannerSchema.default({}),
        execution: ExecutionSchema.default({}),
        toolServer: ToolServerSchema.default({}),
        storage: StorageSchema.default({}),
        aggregation: AggregationSchema.default({}),
        events: EventsSchema.default({}),
        server: ServerSchema.default({}),
        logging: LoggingSchema.default({}),
    })
    .strict();

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type BackendConfig = z.infer<typeof BackendSchema>;
export type FingerprintConfig = OrchestratorConfig['aggregation']['fingerprint'];

export const PersonaSchema = z
    .object({
        name: z.string().min(1).optional(),
        description: z.string().default(''),
        allowedTools: z.array(z.string().trim().toLowerCase().min(1)).default(['*']),
        recallPriorFindings: z.boolean().default(false),
        historyLimit: z.number().int().min(0).default(10),
        recallLimit: z.number().int().min(0).default(20),
        planningHint: z.string().optional(),
    })
    .strict();
