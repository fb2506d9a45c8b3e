import winston from 'winston';
import path from 'path';
import fs from 'fs';

const isTest = process.env.NODE_ENV === 'test';
const logsDir = process.env.LOG_DIR || path.join(__dirname, '../../logs');

// Ensure logs directory exists
if (!isTest && !fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
}

const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `${timestamp} [${level.toUpperCase()}]: ${message} ${metaStr}`;
    })
);

const jsonFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

function buildTransports(): winston.transport[] {
    const transports: winston.transport[] = [
        // Console output
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                logFormat
            ),
        }),
    ];
    if (!isTest) {
        // File output
        transports.push(
            new winston.transports.File({
                filename: path.join(logsDir, 'error.log'),
                level: 'error',
            }),
            new winston.transports.File({
                filename: path.join(logsDir, 'combined.log'),
            })
        );
    }
    return transports;
}

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    silent: isTest,
    transports: buildTransports(),
});

export interface LoggerSettings {
    level: string;
    json: boolean;
}

/**
 * Apply the `logging` section of the loaded configuration.
 * LOG_LEVEL in the environment still wins over the file.
 */
export function configureLogger(settings: LoggerSettings): void {
    logger.level = process.env.LOG_LEVEL || settings.level;
    if (settings.json) {
        logger.format = jsonFormat;
        for (const transport of logger.transports) {
            transport.format = jsonFormat;
        }
    }
}

/** Child logger whose lines carry `component`. */
export function componentLogger(component: string): winston.Logger {
    return logger.child({ component });
}
