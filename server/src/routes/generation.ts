import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getErrorMessage } from '@shared/errors';
import { parseGenerationForm, parseLogChannel } from '@shared/utils/validation';
import type { GenerateResponse } from '@shared/types';
import type { AuthenticatedRequest } from '../middleware/auth';
import { createGuestLimit, guestIdentifier } from '../middleware/guestLimit';
import { toUploadedPdf } from '../middleware/upload';
import type { PresentationGenerator } from '../services/presentationGeneration';
import type { PresentationRepository } from '../services/presentationStore';
import type { UsageTracker } from '../services/usageTracker';
import type { LogBroadcaster } from '../streaming/logBroadcaster';

interface GenerationRouterDeps {
    generator: PresentationGenerator;
    usage: UsageTracker;
    presentations: PresentationRepository;
    broadcaster: LogBroadcaster;
    optionalAuth: RequestHandler;
    pdfUpload: RequestHandler;
}

/**
 * The progress channel travels in the query string so that failures raised before the
 * multipart body is parsed (quota, upload limits) still reach the right tab. The form
 * field is accepted as well.
 */
const progressChannelOf = (req: Request): string | undefined =>
    parseLogChannel(req.query.log_channel) ?? parseLogChannel(req.body?.log_channel);

export function createGenerationRouter(deps: GenerationRouterDeps): Router {
    const router = Router();

    router.get('/events', deps.broadcaster.handleEvents);

    router.post(
        '/generate',
        deps.optionalAuth,
        createGuestLimit(deps.usage),
        deps.pdfUpload,
        async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
            const report = deps.broadcaster.reporterFor(progressChannelOf(req));

            try {
                const request = parseGenerationForm(req.body, toUploadedPdf(req.file));
                const result = await deps.generator.generate(request, report);

                const presentation = await deps.presentations.save({
                    title: result.title,
                    ownerId: req.user?.uid ?? null,
                    hasVideo: result.hasVideo,
                    slides: result.slides,
                });

                if (!req.user) {
                    await deps.usage.recordGeneration(guestIdentifier(req));
                }

                report('Generation complete! Redirecting...');
                const body: GenerateResponse = { success: true, redirect: `/viewer/${presentation.id}` };
                res.json(body);
            } catch (error) {
                next(error);
            }
        }
    );

    // Every failure on /generate, from any middleware in the chain, is reported to the tab
    router.use('/generate', (error: unknown, req: Request, _res: Response, next: NextFunction) => {
        deps.broadcaster.publish(progressChannelOf(req), `Generation failed: ${getErrorMessage(error)}`);
        next(error);
    });

    return router;
}
