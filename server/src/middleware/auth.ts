import type { Request, Response, NextFunction } from 'express';
import { getAuth } from '../utils/firebase';

export interface AuthenticatedUser {
    uid: string;
    email?: string;
}

export interface AuthenticatedRequest extends Request {
    user?: AuthenticatedUser;
}

export type TokenVerifier = (idToken: string) => Promise<AuthenticatedUser>;

export const verifyFirebaseToken: TokenVerifier = async (idToken) => {
    const decoded = await getAuth().verifyIdToken(idToken);
    return { uid: decoded.uid, email: decoded.email };
};

const bearerToken = (req: Request): string | null => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) return null;
    return authHeader.slice('Bearer '.length).trim() || null;
};

/**
 * Rejects requests without a valid ID token.
 */
export function createRequireAuth(verify: TokenVerifier) {
    return async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const idToken = bearerToken(req);
        if (!idToken) {
            res.status(401).json({ success: false, error: 'Unauthorized: No token provided' });
            return;
        }

        try {
            req.user = await verify(idToken);
            next();
        } catch (error) {
            console.error('[auth] Token verification failed:', error);
            res.status(401).json({ success: false, error: 'Unauthorized: Invalid token' });
        }
    };
}

/**
 * Attaches req.user when a valid token is present. Anyone else continues as a guest.
 */
export function createOptionalAuth(verify: TokenVerifier) {
    return async (req: AuthenticatedRequest, _res: Response, next: NextFunction): Promise<void> => {
        const idToken = bearerToken(req);
        if (idToken) {
            try {
                req.user = await verify(idToken);
            } catch (error) {
                console.warn('[auth] Ignoring invalid token, continuing as guest:', error);
            }
        }
        next();
    };
}
