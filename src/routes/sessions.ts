import { Router, Request, Response } from 'express';
import type { OrchestratorAgent } from '../agents/OrchestratorAgent';
import type { EventChannel, EventEnvelope } from '../agents/EventChannel';
import { badRequest, sendError } from './respond';
import { isRecord } from '../utils/json';
import { logger } from '../utils/logger';

const HEARTBEAT_MS = 15000;

function writeEvent(res: Response, event: EventEnvelope): void {
    res.write(`id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
}

export function createSessionRoutes(orchestrator: OrchestratorAgent, events: EventChannel): Router {
    const router = Router();

    router.post('/', (req: Request, res: Response) => {
        const body = isRecord(req.body) ? req.body : {};
        const persona = typeof body.persona === 'string' ? body.persona : undefined;
        const id = typeof body.id === 'string' ? body.id : undefined;
        if ((body.persona !== undefined && persona === undefined) || (body.id !== undefined && id === undefined)) {
            badRequest(res, 'persona and id must be strings');
            return;
        }
        try {
            res.status(201).json(orchestrator.createSession(persona, id));
        } catch (error) {
            sendError(res, error);
        }
    });

    router.get('/', (req: Request, res: Response) => {
        try {
            res.json({ sessions: orchestrator.listSessions() });
        } catch (error) {
            sendError(res, error);
        }
    });

    router.get('/:id', (req: Request, res: Response) => {
        try {
            res.json(orchestrator.getSession(req.params.id));
        } catch (error) {
            sendError(res, error);
        }
    });

    router.post('/:id/queries', (req: Request, res: Response) => {
        const query = isRecord(req.body) ? req.body.query : undefined;
        if (typeof query !== 'string' || query.trim() === '') {
            badRequest(res, 'query is required');
            return;
        }
        try {
            const { planId } = orchestrator.submitQuery(req.params.id, query.trim());
            res.status(202).json({ planId, sessionId: req.params.id });
        } catch (error) {
            sendError(res, error);
        }
    });

    router.get('/:id/summary', (req: Request, res: Response) => {
        try {
            res.json(orchestrator.getSessionSummary(req.params.id));
        } catch (error) {
            sendError(res, error);
        }
    });

    router.get('/:id/confirmations', (req: Request, res: Response) => {
        res.json({ confirmations: orchestrator.pendingConfirmations(req.params.id) });
    });

    // Server-sent events: replay what is buffered after Last-Event-ID (or ?since=), then stream live
    router.get('/:id/events', (req: Request, res: Response) => {
        const sessionId = req.params.id;
        if (!orchestrator.hasSession(sessionId)) {
            res.status(404).json({ error: true, message: `Session ${sessionId} not found` });
            return;
        }

        const lastEventId = req.get('Last-Event-ID') ?? (typeof req.query.since === 'string' ? req.query.since : '0');
        const since = Number.parseInt(lastEventId, 10);

        res.status(200);
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();

        for (const event of events.since(Number.isNaN(since) ? 0 : since, { sessionId })) {
            writeEvent(res, event);
        }
        const unsubscribe = events.subscribe((event) => writeEvent(res, event), { sessionId });
        const heartbeat = setInterval(() => res.write(': keep-alive\n\n'), HEARTBEAT_MS);

        req.on('close', () => {
            clearInterval(heartbeat);
            unsubscribe();
            logger.debug('Event stream closed', { sessionId });
        });
    });

    return router;
}
