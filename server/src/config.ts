import path from 'path';
import { z } from 'zod';
import { GUEST_GENERATION_LIMIT } from '@shared/constants';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(5000),
    GEMINI_API_KEY: z
        .string({ required_error: 'GEMINI_API_KEY is not set' })
        .trim()
        .min(1, 'GEMINI_API_KEY is not set'),
    UPLOAD_DIR: z.string().default('static/uploads'),
    PUBLIC_DIR: z.string().default('dist/public'),
    GUEST_LIMIT: z.coerce.number().int().nonnegative().default(GUEST_GENERATION_LIMIT),
    MAX_PDF_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
    FIREBASE_PROJECT_ID: z.string().optional(),
    TRUST_PROXY: z.enum(['true', 'false']).default('false'),
});

export interface AppConfig {
    port: number;
    geminiApiKey: string;
    uploadDir: string;
    publicDir: string;
    guestLimit: number;
    maxPdfBytes: number;
    firebaseProjectId?: string;
    trustProxy: boolean;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration - ${details}`);
    }

    const vars = parsed.data;
    return {
        port: vars.PORT,
        geminiApiKey: vars.GEMINI_API_KEY,
        uploadDir: path.resolve(vars.UPLOAD_DIR),
        publicDir: path.resolve(vars.PUBLIC_DIR),
        guestLimit: vars.GUEST_LIMIT,
        maxPdfBytes: vars.MAX_PDF_BYTES,
        firebaseProjectId: vars.FIREBASE_PROJECT_ID || undefined,
        trustProxy: vars.TRUST_PROXY === 'true',
    };
}

let cachedConfig: AppConfig | null = null;

export const getConfig = (): AppConfig => {
    if (cachedConfig) return cachedConfig;
    cachedConfig = loadConfig();
    return cachedConfig;
};
