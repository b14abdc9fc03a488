import 'module-alias/register';
import dotenv from 'dotenv';
import { mkdirSync } from 'fs';
import { ConfigError, getConfig } from './config';
import type { AppConfig } from './config';
import { createApp } from './app';
import { verifyFirebaseToken } from './middleware/auth';
import { FirestorePresentationRepository } from './services/presentationStore';
import { FirestoreUsageStore } from './services/usageTracker';
import { getFirestore } from './utils/firebase';

dotenv.config();

function loadConfigOrExit(): AppConfig {
    try {
        return getConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`[startup] ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

function start(): void {
    const config = loadConfigOrExit();

    mkdirSync(config.uploadDir, { recursive: true });

    const db = getFirestore();
    const app = createApp({
        config,
        usageStore: new FirestoreUsageStore(db),
        presentations: new FirestorePresentationRepository(db),
        verifyToken: verifyFirebaseToken,
    });

    app.listen(config.port, () => {
        console.log(`[startup] Listening on http://localhost:${config.port}`);
    });
}

start();
