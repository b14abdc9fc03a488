import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { createElement } from 'react';
import type { PresentationRepository } from '../services/presentationStore';
import type { UsageTracker } from '../services/usageTracker';
import { guestIdentifier } from '../middleware/guestLimit';
import { IndexPage } from '../views/IndexPage';
import { ViewerPage } from '../views/ViewerPage';
import { renderPage } from '../views/render';

export function createPageRouter(deps: { usage: UsageTracker; presentations: PresentationRepository }): Router {
    const router = Router();

    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const guestUsage = await deps.usage.getUsage(guestIdentifier(req));
            res.type('html').send(renderPage(createElement(IndexPage, {
                guestUsage,
                guestLimit: deps.usage.limit,
            })));
        } catch (error) {
            next(error);
        }
    });

    router.get('/viewer/:pid', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const presentation = await deps.presentations.get(req.params.pid);
            if (!presentation) {
                res.status(404).type('text').send('Not Found');
                return;
            }
            res.type('html').send(renderPage(createElement(ViewerPage, { presentation })));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
