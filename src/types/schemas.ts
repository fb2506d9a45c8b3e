import { z } from 'zod';
import { ERROR_CODES } from '../utils/errors';
import { SEVERITIES } from './index';

// Validation for records read back from the session log.

const ACTION_STATES = [
    'proposed',
    'rejected',
    'admitted',
    'pending_confirmation',
    'confirmed',
    'denied',
    'expired',
    'dispatched',
    'completed',
    'failed',
    'timed_out',
    'cancelled',
] as const;

export const SeveritySchema = z.enum(SEVERITIES);

const ActionStateSchema = z.enum(ACTION_STATES);

export const EvidenceSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const FindingSchema = z.object({
    id: z.string(),
    target: z.string(),
    category: z.string(),
    severity: SeveritySchema,
    title: z.string(),
    evidence: EvidenceSchema,
    timestamp: z.string(),
    sourceActionId: z.string(),
});

const ErrorInfoSchema = z.object({
    code: z.nativeEnum(ERROR_CODES),
    message: z.string(),
});

const ActionSchema = z.object({
    id: z.string(),
    planId: z.string(),
    sessionId: z.string(),
    tool: z.string(),
    target: z.string(),
    parameters: z.record(z.string()),
    description: z.string(),
    riskLevel: z.enum(['safe', 'requires_confirmation', 'blocked']),
    state: ActionStateSchema,
    trail: z.array(ActionStateSchema),
});

export const QueryPayloadSchema = z.object({
    planId: z.string(),
    text: z.string(),
});

export const ActionPayloadSchema = z.object({
    action: ActionSchema,
    plugin: z.string().optional(),
    error: ErrorInfoSchema.optional(),
    durationMs: z.number().optional(),
    findingCount: z.number().int(),
});
