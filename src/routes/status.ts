import { Router, Request, Response } from 'express';
import type { OrchestratorAgent } from '../agents/OrchestratorAgent';
import type { ToolServerClient } from '../services/ToolServerClient';

export interface StatusInfo {
    version: string;
    /** Probed on each health request when present. */
    toolServer?: ToolServerClient;
}

export function createHealthRoute(orchestrator: OrchestratorAgent, info: StatusInfo): Router {
    const router = Router();

    router.get('/health', async (req: Request, res: Response) => {
        let toolServer: { url: string | null; available: boolean; tools: string[] } = {
            url: null,
            available: false,
            tools: [],
        };
        if (info.toolServer) {
            const available = await info.toolServer.isAvailable();
            const tools = available ? await info.toolServer.listTools() : [];
            toolServer = { url: info.toolServer.url, available, tools };
        }
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: info.version,
            backends: orchestrator.backendNames(),
            toolServer,
        });
    });

    return router;
}

export function createStatusRoutes(orchestrator: OrchestratorAgent): Router {
    const router = Router();

    router.get('/personas', (req: Request, res: Response) => {
        res.json({ personas: orchestrator.listPersonas() });
    });

    router.get('/confirmations', (req: Request, res: Response) => {
        res.json({ confirmations: orchestrator.pendingConfirmations() });
    });

    return router;
}
