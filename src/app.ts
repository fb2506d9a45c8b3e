import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import type { OrchestratorAgent } from './agents/OrchestratorAgent';
import type { EventChannel } from './agents/EventChannel';
import type { Authenticator } from './middleware/auth';
import type { ToolServerClient } from './services/ToolServerClient';
import { createSessionRoutes } from './routes/sessions';
import { createActionRoutes } from './routes/actions';
import { createFindingRoutes } from './routes/findings';
import { createHealthRoute, createStatusRoutes } from './routes/status';
import { asMessage } from './utils/errors';
import { logger } from './utils/logger';

export interface AppOptions {
    orchestrator: OrchestratorAgent;
    events: EventChannel;
    auth: Authenticator;
    corsOrigins: readonly string[];
    version: string;
    toolServer?: ToolServerClient;
}

export function createApp(options: AppOptions): express.Express {
    const { orchestrator, events, auth } = options;
    const app = express();

    // Security middleware
    app.use(helmet());
    app.use(
        cors({
            origin: [...options.corsOrigins],
            credentials: true,
        })
    );

    const apiLimiter = rateLimit({
        windowMs: 15 * 60 * 1000,
        max: 300,
        standardHeaders: true,
        legacyHeaders: false,
        message: { error: true, message: 'Too many requests, please try again later' },
    });
    app.use('/api', apiLimiter);

    app.use(express.json({ limit: '1mb' }));

    // Request logging
    app.use((req, res, next) => {
        logger.http(`${req.method} ${req.path}`, { ip: req.ip, userAgent: req.get('User-Agent') });
        next();
    });

    // Health check stays open for probes
    app.use('/api', createHealthRoute(orchestrator, { version: options.version, toolServer: options.toolServer }));

    const api = express.Router();
    api.use('/sessions', createSessionRoutes(orchestrator, events));
    api.use(createActionRoutes(orchestrator));
    api.use(createFindingRoutes(orchestrator));
    api.use(createStatusRoutes(orchestrator));
    app.use('/api', auth.authenticateToken, api);

    // Error handling
    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        logger.error('Unhandled error', { error: asMessage(err) });
        const status = err instanceof SyntaxError ? 400 : 500;
        res.status(status).json({ error: true, message: status === 400 ? 'Malformed JSON body' : 'Internal server error' });
    });

    // 404 handler
    app.use((req, res) => {
        res.status(404).json({ error: true, message: 'Not found' });
    });

    return app;
}
