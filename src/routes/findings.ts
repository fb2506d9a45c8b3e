import { Router, Request, Response } from 'express';
import type { OrchestratorAgent } from '../agents/OrchestratorAgent';
import type { FindingFilter, Severity } from '../types';
import { SEVERITIES } from '../types';
import { badRequest, listParam, sendError } from './respond';

function severityParam(value: unknown): Severity | undefined | null {
    if (value === undefined) return undefined;
    return SEVERITIES.find((severity) => typeof value === 'string' && severity.toLowerCase() === value.toLowerCase()) ?? null;
}

export function createFindingRoutes(orchestrator: OrchestratorAgent): Router {
    const router = Router();

    // Cross-session recall
    router.get('/findings', (req: Request, res: Response) => {
        const severity = severityParam(req.query.severity);
        const minSeverity = severityParam(req.query.minSeverity);
        if (severity === null || minSeverity === null) {
            badRequest(res, `severity must be one of ${SEVERITIES.join(', ')}`);
            return;
        }
        const filter: FindingFilter = {
            target: typeof req.query.target === 'string' ? req.query.target : undefined,
            category: typeof req.query.category === 'string' ? req.query.category : undefined,
            severity,
            minSeverity,
            sessionIds: listParam(req.query.sessions),
        };
        try {
            const findings = orchestrator.recall(filter);
            res.json({ count: findings.length, findings });
        } catch (error) {
            sendError(res, error);
        }
    });

    router.get('/summary', (req: Request, res: Response) => {
        const sessionIds = listParam(req.query.sessions);
        if (!sessionIds) {
            badRequest(res, 'sessions is required (comma-separated session ids)');
            return;
        }
        try {
            res.json(orchestrator.getSessionSummary(sessionIds));
        } catch (error) {
            sendError(res, error);
        }
    });

    return router;
}
