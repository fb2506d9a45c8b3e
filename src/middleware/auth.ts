import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import crypto from 'crypto';
import { isRecord } from '../utils/json';
import { logger } from '../utils/logger';

export interface AuthRequest extends Request {
    operator?: string;
}

export interface Authenticator {
    /** True when no secret was configured and a random one is in use. */
    readonly ephemeral: boolean;
    readonly authenticateToken: RequestHandler;
    generateToken(operator: string): string;
}

/**
 * Bearer-token auth for the operator API. Without a configured secret a
 * random ephemeral one is used, so tokens die with the process.
 */
export function createAuthenticator(configuredSecret?: string): Authenticator {
    let secret: string;
    let ephemeral = false;
    if (configuredSecret) {
        secret = configuredSecret;
    } else {
        secret = crypto.randomBytes(64).toString('hex');
        ephemeral = true;
        logger.warn('Auth secret is not set; using a random ephemeral secret. Tokens are invalidated on restart.');
    }

    const authenticateToken = (req: AuthRequest, res: Response, next: NextFunction): void => {
        const authHeader = req.headers['authorization'];
        const token = authHeader && authHeader.split(' ')[1];

        if (!token) {
            res.status(401).json({ error: true, message: 'Authentication required' });
            return;
        }

        try {
            const decoded = jwt.verify(token, secret);
            if (!isRecord(decoded) || typeof decoded.sub !== 'string') {
                res.status(403).json({ error: true, message: 'Invalid or expired token' });
                return;
            }
            req.operator = decoded.sub;
            next();
        } catch (error) {
            logger.warn('Invalid token', { error });
            res.status(403).json({ error: true, message: 'Invalid or expired token' });
        }
    };

    return {
        ephemeral,
        authenticateToken,
        generateToken: (operator: string): string => jwt.sign({ sub: operator }, secret, { expiresIn: '7d' }),
    };
}
