import { Response } from 'express';
import { ERROR_CODES, OrchestratorError, asMessage, type ErrorCode } from '../utils/errors';
import { logger } from '../utils/logger';

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
    [ERROR_CODES.SESSION_NOT_FOUND]: 404,
    [ERROR_CODES.CONFIGURATION_ERROR]: 400,
    [ERROR_CODES.SCOPE_VIOLATION]: 403,
};

export function sendError(res: Response, error: unknown): void {
    if (error instanceof OrchestratorError) {
        const status = STATUS_BY_CODE[error.code] ?? 500;
        if (status >= 500) {
            logger.error('Request failed', { code: error.code, error: error.message });
        }
        res.status(status).json({ error: true, code: error.code, message: error.message });
        return;
    }
    logger.error('Request failed', { error: asMessage(error) });
    res.status(500).json({ error: true, message: asMessage(error) || 'Internal server error' });
}

export function badRequest(res: Response, message: string): void {
    res.status(400).json({ error: true, message });
}

/** Comma-separated query parameter as a list; absent or empty gives undefined. */
export function listParam(value: unknown): string[] | undefined {
    if (typeof value !== 'string' || value.trim() === '') return undefined;
    return value.split(',').map((item) => item.trim()).filter(Boolean);
}
