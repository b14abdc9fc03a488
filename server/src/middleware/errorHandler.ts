import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { QuotaExceededError, ValidationError, getErrorMessage, isUpstreamError } from '@shared/errors';
import type { GenerateResponse } from '@shared/types';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred. Please try again.';

/**
 * Maps the error taxonomy onto an HTTP status and the `{success: false, error}` body.
 */
export function toErrorResponse(error: unknown): { status: number; body: GenerateResponse } {
    if (error instanceof ValidationError) {
        return { status: 400, body: { success: false, error: error.message } };
    }
    if (error instanceof multer.MulterError) {
        const message = error.code === 'LIMIT_FILE_SIZE' ? 'PDF file is too large' : `Upload rejected: ${error.message}`;
        return { status: 400, body: { success: false, error: message } };
    }
    if (error instanceof QuotaExceededError) {
        return { status: 403, body: { success: false, error: error.message } };
    }
    if (isUpstreamError(error)) {
        return { status: 502, body: { success: false, error: `Generation failed: ${error.message}` } };
    }
    return { status: 500, body: { success: false, error: UNEXPECTED_ERROR_MESSAGE } };
}

export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(error);
        return;
    }

    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
        console.error(`[${req.method} ${req.path}] ${getErrorMessage(error)}`, error);
    } else {
        console.warn(`[${req.method} ${req.path}] ${status}: ${getErrorMessage(error)}`);
    }
    res.status(status).json(body);
}
