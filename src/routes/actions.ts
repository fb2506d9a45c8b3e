import { Router, Request, Response } from 'express';
import type { OrchestratorAgent } from '../agents/OrchestratorAgent';
import { badRequest } from './respond';
import { isRecord } from '../utils/json';
import { logger } from '../utils/logger';

/** Operator decisions: confirm or deny a pending action, stop a running plan. */
export function createActionRoutes(orchestrator: OrchestratorAgent): Router {
    const router = Router();

    router.post('/actions/:id/confirm', (req: Request, res: Response) => {
        const approve = isRecord(req.body) ? req.body.approve : undefined;
        if (typeof approve !== 'boolean') {
            badRequest(res, 'approve must be true or false');
            return;
        }
        const actionId = req.params.id;
        if (!orchestrator.confirm(actionId, approve)) {
            res.status(409).json({ error: true, message: `No pending confirmation for action ${actionId}` });
            return;
        }
        logger.info(`Action ${approve ? 'approved' : 'denied'}`, { actionId });
        res.json({ actionId, status: approve ? 'approved' : 'denied' });
    });

    router.post('/plans/:id/stop', (req: Request, res: Response) => {
        const planId = req.params.id;
        if (!orchestrator.stop(planId)) {
            res.status(404).json({ error: true, message: `No running plan ${planId}` });
            return;
        }
        res.json({ planId, stopped: true });
    });

    return router;
}
