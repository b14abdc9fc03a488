export type GeminiErrorCode = 'API_ERROR' | 'EMPTY_RESPONSE' | 'MALFORMED_RESPONSE' | 'FILE_PROCESSING';

export class GeminiError extends Error {
    constructor(
        message: string,
        public code: GeminiErrorCode,
        public details?: unknown
    ) {
        super(message);
        this.name = 'GeminiError';
    }
}

export type ImageGenErrorCode = 'API_ERROR' | 'NO_IMAGE_DATA' | 'BLOCKED';

export class ImageGenError extends Error {
    public code: ImageGenErrorCode;
    public context?: unknown;

    constructor(message: string, code: ImageGenErrorCode, context?: unknown) {
        super(message);
        this.name = 'ImageGenError';
        this.code = code;
        this.context = context;
    }
}

export type VideoGenErrorCode = 'API_ERROR' | 'OPERATION_FAILED' | 'NO_VIDEO' | 'TIMEOUT';

export class VideoGenError extends Error {
    constructor(
        message: string,
        public code: VideoGenErrorCode,
        public context?: unknown
    ) {
        super(message);
        this.name = 'VideoGenError';
    }
}

/**
 * Bad user input. The message is shown to the user as-is.
 */
export class ValidationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class QuotaExceededError extends Error {
    constructor(public limit: number, public used: number) {
        super(`Guest limit reached (${limit}). Please sign in to keep generating.`);
        this.name = 'QuotaExceededError';
    }
}

export type UpstreamError = GeminiError | ImageGenError | VideoGenError;

export function isUpstreamError(error: unknown): error is UpstreamError {
    return error instanceof GeminiError || error instanceof ImageGenError || error instanceof VideoGenError;
}

/**
 * Returns a string message from an unknown caught value.
 * Use in catch (error: unknown) blocks instead of error?.message.
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
