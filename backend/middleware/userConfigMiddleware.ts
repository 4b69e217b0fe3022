import { Request, Response, NextFunction } from 'express';
import type { UserConfig } from '../lib/types.js';
import { decodeUserConfig } from '../lib/validators.js';

declare global {
    namespace Express {
        interface Request {
            userConfig?: UserConfig;
        }
    }
}

/**
 * Decode the `:config` path segment into req.userConfig. A malformed token
 * reaches the global error handler as a ConfigError (400).
 */
export const attachUserConfig = (req: Request, res: Response, next: NextFunction) => {
    try {
        req.userConfig = decodeUserConfig(req.params.config ?? '');
        next();
    } catch (error) {
        next(error);
    }
};
