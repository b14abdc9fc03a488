import type { Request, Response, NextFunction } from 'express';
import { createHash } from 'crypto';
import type { AuthenticatedRequest } from './auth';
import type { UsageTracker } from '../services/usageTracker';

const toKey = (value: string) => createHash('sha256').update(value).digest('hex');

const getClientIp = (req: Request) => {
    if (typeof req.ip === 'string' && req.ip.length > 0) return req.ip;
    const forwarded = req.headers['x-forwarded-for'];
    if (typeof forwarded === 'string' && forwarded.trim()) {
        return forwarded.split(',')[0]?.trim() || 'unknown';
    }
    return 'unknown';
};

export const guestIdentifier = (req: Request) => `guest_${toKey(getClientIp(req))}`;

/**
 * Blocks guests who have used up their quota. Signed-in users pass straight through.
 */
export const createGuestLimit = (tracker: UsageTracker) => {
    return async (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
        if (req.user) {
            next();
            return;
        }

        try {
            await tracker.assertWithinQuota(guestIdentifier(req));
            next();
        } catch (error) {
            next(error);
        }
    };
};
