import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { PersonaSchema } from './schema';
import type { Persona } from '../types';
import { ERROR_CODES, OrchestratorError, asMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const DEFAULT_PERSONA: Persona = Object.freeze({
    name: 'default',
    description: 'General-purpose operator with every registered tool',
    allowedTools: Object.freeze(['*']),
    recallPriorFindings: false,
    historyLimit: 10,
    recallLimit: 20,
});

export function parsePersona(raw: unknown, fallbackName: string): Persona {
    const parsed = PersonaSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Invalid persona '${fallbackName}': ${issues}`);
    }
    const { name, allowedTools, ...rest } = parsed.data;
    return Object.freeze({
        ...rest,
        name: name ?? fallbackName,
        allowedTools: Object.freeze([...allowedTools]),
    });
}

/**
 * Read every *.yaml / *.yml persona in `directory` once at startup.
 * The built-in `default` persona is present unless a file overrides it.
 */
export function loadPersonas(directory: string): ReadonlyMap<string, Persona> {
    const personas = new Map<string, Persona>([[DEFAULT_PERSONA.name, DEFAULT_PERSONA]]);

    if (!fs.existsSync(directory)) {
        logger.warn('Persona directory not found, using built-in default only', { directory });
        return personas;
    }

    const files = fs.readdirSync(directory).filter((file) => /\.ya?ml$/i.test(file)).sort();
    for (const file of files) {
        const stem = path.basename(file).replace(/\.ya?ml$/i, '');
        let raw: unknown;
        try {
            raw = parseYaml(fs.readFileSync(path.join(directory, file), 'utf-8'));
        } catch (error) {
            throw new OrchestratorError(ERROR_CODES.CONFIGURATION_ERROR, `Failed to read persona ${file}: ${asMessage(error)}`, {
                cause: error,
            });
        }
        const persona = parsePersona(raw, stem);
        personas.set(persona.name, persona);
    }

    logger.info(`Loaded ${personas.size} persona(s)`, { directory, personas: [...personas.keys()] });
    return personas;
}

export function permitsTool(persona: Persona, tool: string): boolean {
    return persona.allowedTools.includes('*') || persona.allowedTools.includes(tool.toLowerCase());
}
