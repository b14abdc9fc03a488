import { Router } from 'express';
import type { Response, NextFunction, RequestHandler } from 'express';
import type { AuthenticatedRequest } from '../middleware/auth';
import type { PresentationRepository } from '../services/presentationStore';

/**
 * Signed-in users' own decks, newest first.
 */
export function createPresentationRouter(deps: {
    presentations: PresentationRepository;
    requireAuth: RequestHandler;
}): Router {
    const router = Router();

    router.get('/presentations', deps.requireAuth, async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
        if (!req.user) {
            res.status(401).json({ success: false, error: 'Unauthorized' });
            return;
        }

        try {
            const presentations = await deps.presentations.listByOwner(req.user.uid);
            res.json({
                presentations: presentations.map(p => ({
                    ...p,
                    url: `/viewer/${p.id}`,
                    createdAt: p.createdAt.toISOString(),
                })),
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
