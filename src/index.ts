import dotenv from 'dotenv';
import { startServer } from './server';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

startServer().catch((error: unknown) => {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
