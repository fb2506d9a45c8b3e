import http from 'http';
import { loadConfig } from './config/loader';
import { createRuntime } from './bootstrap';
import { createApp } from './app';
import { createAuthenticator } from './middleware/auth';
import { configureLogger, logger } from './utils/logger';
import { readVersion } from './utils/version';

export interface ServeOptions {
    configPath?: string;
    port?: number;
}

/** Load configuration, build the runtime and serve the HTTP API until a signal arrives. */
export async function startServer(options: ServeOptions = {}): Promise<http.Server> {
    const { config, source } = loadConfig({ configPath: options.configPath });
    configureLogger(config.logging);
    logger.info(source ? `Configuration loaded from ${source}` : 'No configuration file found, using defaults');

    const runtime = createRuntime(config);
    const auth = createAuthenticator(config.server.authSecret);
    const version = readVersion();
    const app = createApp({
        orchestrator: runtime.orchestrator,
        events: runtime.events,
        auth,
        corsOrigins: config.server.corsOrigins,
        version,
        toolServer: runtime.toolServerClient,
    });

    if (runtime.toolServerClient) {
        const available = await runtime.toolServerClient.isAvailable();
        if (available) {
            logger.info(`Tool server reachable at ${runtime.toolServerClient.url}`);
        } else {
            logger.warn(`Tool server not reachable at ${runtime.toolServerClient.url}; actions will fail until it is started`);
        }
    }

    const port = options.port ?? config.server.port;
    const server = await new Promise<http.Server>((resolve) => {
        const listening = app.listen(port, () => resolve(listening));
    });
    logger.info(`Server running on port ${port}`, { version });

    if (auth.ephemeral) {
        // Console only: the token must not land in the log files
        console.log(`\nOperator token for this run:\n${auth.generateToken('operator')}\n`);
    }

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close();
        runtime
            .close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Shutdown failed', { error });
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    return server;
}
