export const ERROR_CODES = Object.freeze({
    SCOPE_VIOLATION: 'SCOPE_VIOLATION',
    PLANNER_UNAVAILABLE: 'PLANNER_UNAVAILABLE',
    PLANNER_PARSE_ERROR: 'PLANNER_PARSE_ERROR',
    NO_PLUGIN_AVAILABLE: 'NO_PLUGIN_AVAILABLE',
    ACTION_TIMEOUT: 'ACTION_TIMEOUT',
    ACTION_EXECUTION_ERROR: 'ACTION_EXECUTION_ERROR',
    CONFIRMATION_EXPIRED: 'CONFIRMATION_EXPIRED',
    CONFIRMATION_DENIED: 'CONFIRMATION_DENIED',
    TOOL_NOT_PERMITTED: 'TOOL_NOT_PERMITTED',
    ACTION_CANCELLED: 'ACTION_CANCELLED',
    SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    BACKEND_ERROR: 'BACKEND_ERROR',
} as const);

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured error status carried on events and session records. */
export interface ErrorInfo {
    readonly code: ErrorCode;
    readonly message: string;
}

export class OrchestratorError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options: { cause?: unknown } = {}) {
        super(message, 'cause' in options ? { cause: options.cause } : undefined);
        this.name = 'OrchestratorError';
        this.code = code;
    }

    toInfo(): ErrorInfo {
        return { code: this.code, message: this.message };
    }
}

/**
 * Failure of a single reasoning backend call. `transient` marks failures
 * (timeouts, resets, 429/5xx) that are worth a retry.
 */
export class BackendError extends OrchestratorError {
    readonly backend: string;
    readonly transient: boolean;

    constructor(backend: string, message: string, options: { transient: boolean; cause?: unknown }) {
        super(ERROR_CODES.BACKEND_ERROR, `${backend}: ${message}`, { cause: options.cause });
        this.name = 'BackendError';
        this.backend = backend;
        this.transient = options.transient;
    }
}

export function asMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function toErrorInfo(error: unknown, fallback: ErrorCode): ErrorInfo {
    if (error instanceof OrchestratorError) {
        return error.toInfo();
    }
    return { code: fallback, message: asMessage(error) };
}

export function cancelledError(what: string): OrchestratorError {
    return new OrchestratorError(ERROR_CODES.ACTION_CANCELLED, `${what} cancelled`);
}

export function sessionNotFound(sessionId: string): OrchestratorError {
    return new OrchestratorError(ERROR_CODES.SESSION_NOT_FOUND, `Session ${sessionId} not found`);
}
