import fs from 'fs';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { OrchestratorConfigSchema, type OrchestratorConfig } from './schema';
import { ERROR_CODES, OrchestratorError, asMessage } from '../utils/errors';
import { deepFreeze, isRecord } from '../utils/json';

export interface LoadedConfig {
    readonly config: OrchestratorConfig;
    /** File the config came from, or null when built from defaults. */
    readonly source: string | null;
}

function deepMerge(a: unknown, b: unknown): Record<string, unknown> {
    const left = isRecord(a) ? a : {};
    const right = isRecord(b) ? b : {};
    const out: Record<string, unknown> = { ...left };
    for (const [key, value] of Object.entries(right)) {
        const existing = out[key];
        if (isRecord(existing) && isRecord(value)) {
            out[key] = deepMerge(existing, value);
            continue;
        }
        out[key] = value;
    }
    return out;
}

export function expandHome(filePath: string): string {
    if (filePath === '~') return os.homedir();
    if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
    return filePath;
}

function candidatePaths(explicit: string | undefined, env: NodeJS.ProcessEnv): string[] {
    if (explicit) return [explicit];
    const paths: string[] = [];
    if (env.SCOPEWARDEN_CONFIG) paths.push(env.SCOPEWARDEN_CONFIG);
    paths.push(
        path.join(process.cwd(), 'config', 'scopewarden.yaml'),
        path.join(os.homedir(), '.scopewarden', 'config.yaml')
    );
    return paths;
}

function numberFromEnv(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    return Number(value);
}

function booleanFromEnv(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function listFromEnv(value: string | undefined): string[] | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    return value.split(',').map((item) => item.trim()).filter(Boolean);
}

/** Drop undefined leaves so overrides only replace what the environment set. */
function prune(value: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
        if (item === undefined) continue;
        if (isRecord(item)) {
            const nested = prune(item);
            if (Object.keys(nested).length > 0) out[key] = nested;
            continue;
        }
        out[key] = item;
    }
    return out;
}

/** SCOPEWARDEN_* variables layered over the file. */
export function environmentOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
    return prune({
        scope: {
            strictMode: booleanFromEnv(env.SCOPEWARDEN_STRICT_MODE),
            allowedIps: listFromEnv(env.SCOPEWARDEN_ALLOWED_IPS),
            allowedDomains: listFromEnv(env.SCOPEWARDEN_ALLOWED_DOMAINS),
        },
        safety: {
            confirmationTimeoutMs: numberFromEnv(env.SCOPEWARDEN_CONFIRMATION_TIMEOUT_MS),
        },
        execution: {
            actionTimeoutMs: numberFromEnv(env.SCOPEWARDEN_ACTION_TIMEOUT_MS),
            concurrency: numberFromEnv(env.SCOPEWARDEN_CONCURRENCY),
        },
        toolServer: { url: env.SCOPEWARDEN_TOOL_SERVER_URL },
        storage: { path: env.SCOPEWARDEN_STORAGE_PATH },
        personas: { default: env.SCOPEWARDEN_PERSONA },
        server: {
            port: numberFromEnv(env.SCOPEWARDEN_PORT ?? env.PORT),
            authSecret: env.SCOPEWARDEN_AUTH_SECRET,
            corsOrigins: listFromEnv(env.CORS_ORIGINS),
        },
    });
}

export function parseConfig(raw: unknown): OrchestratorConfig {
    const parsed = OrchestratorConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Invalid configuration: ${issues}`);
    }
    return parsed.data;
}

/**
 * Load the configuration once: YAML file (first existing candidate), then
 * environment overrides, validated and frozen. Relative storage and persona
 * paths resolve against the config file's directory.
 */
export function loadConfig(options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}): LoadedConfig {
    const env = options.env ?? process.env;
    const source = candidatePaths(options.configPath, env).find((candidate) => fs.existsSync(candidate)) ?? null;

    if (options.configPath && !source) {
        throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Config file not found: ${options.configPath}`);
    }

    let fileData: unknown = {};
    if (source) {
        try {
            fileData = parseYaml(fs.readFileSync(source, 'utf-8')) ?? {};
        } catch (error) {
            throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Failed to read ${source}: ${asMessage(error)}`, {
                cause: error,
            });
        }
    }

    const config = parseConfig(deepMerge(fileData, environmentOverrides(env)));
    const baseDir = source ? path.dirname(path.resolve(source)) : process.cwd();

    const resolved: OrchestratorConfig = {
        ...config,
        storage: { path: resolvePath(config.storage.path, baseDir) },
        personas: { ...config.personas, directory: resolvePath(config.personas.directory, baseDir) },
    };
    return { config: deepFreeze(resolved), source };
}

function resolvePath(value: string, baseDir: string): string {
    if (value === ':memory:') return value;
    const expanded = expandHome(value);
    return path.isAbsolute(expanded) ? expanded : path.resolve(baseDir, expanded);
}

/** API key for a backend: inline value, else the named environment variable. */
export function resolveApiKey(backend: { apiKey?: string; apiKeyEnv?: string }, env: NodeJS.ProcessEnv): string | undefined {
    if (backend.apiKey) return backend.apiKey;
    if (backend.apiKeyEnv) return env[backend.apiKeyEnv];
    return undefined;
}
