import express from 'express';
import cors from 'cors';
import { UPLOADS_ROUTE } from '@shared/constants';
import type { AppConfig } from './config';
import { createOptionalAuth, createRequireAuth } from './middleware/auth';
import type { TokenVerifier } from './middleware/auth';
import { createPdfUpload } from './middleware/upload';
import { errorHandler } from './middleware/errorHandler';
import { createGenerationRouter } from './routes/generation';
import { createPageRouter } from './routes/pages';
import { createPresentationRouter } from './routes/presentations';
import { PresentationGenerator } from './services/presentationGeneration';
import type { GenerationServices } from './services/presentationGeneration';
import type { PresentationRepository } from './services/presentationStore';
import { UsageTracker } from './services/usageTracker';
import type { UsageStore } from './services/usageTracker';
import { LogBroadcaster } from './streaming/logBroadcaster';

export interface AppDependencies {
    config: AppConfig;
    services?: GenerationServices;
    usageStore: UsageStore;
    presentations: PresentationRepository;
    verifyToken: TokenVerifier;
    broadcaster?: LogBroadcaster;
}

export function createApp(deps: AppDependencies): express.Express {
    const { config, presentations, verifyToken } = deps;
    const usage = new UsageTracker(deps.usageStore, config.guestLimit);
    const generator = new PresentationGenerator(config.uploadDir, deps.services);
    const broadcaster = deps.broadcaster ?? new LogBroadcaster();

    const app = express();
    if (config.trustProxy) app.set('trust proxy', true);

    // Middleware
    app.use(cors({ origin: true }));
    app.use(express.json());
    app.use(UPLOADS_ROUTE, express.static(config.uploadDir));
    app.use('/static', express.static(config.publicDir));

    // Routes
    app.use(createPageRouter({ usage, presentations }));
    app.use(createGenerationRouter({
        generator,
        usage,
        presentations,
        broadcaster,
        optionalAuth: createOptionalAuth(verifyToken),
        pdfUpload: createPdfUpload(config.uploadDir, config.maxPdfBytes),
    }));
    app.use('/api', createPresentationRouter({
        presentations,
        requireAuth: createRequireAuth(verifyToken),
    }));

    app.use(errorHandler);
    return app;
}
