import path from 'path';
import { randomUUID } from 'crypto';
import multer from 'multer';
import { ValidationError } from '@shared/errors';
import type { UploadedPdf } from '@shared/types';

export const PDF_FIELD = 'pdf_file';

/**
 * Multipart parser for the generation form. A PDF, if any, lands in the uploads
 * directory as doc_<uuid>.pdf; everything else ends up in req.body as strings.
 */
export function createPdfUpload(uploadDir: string, maxPdfBytes: number) {
    const storage = multer.diskStorage({
        destination: uploadDir,
        filename: (_req, _file, cb) => cb(null, `doc_${randomUUID()}.pdf`),
    });

    return multer({
        storage,
        limits: { fileSize: maxPdfBytes, files: 1 },
        fileFilter: (_req, file, cb) => {
            const isPdf = file.mimetype === 'application/pdf' || path.extname(file.originalname).toLowerCase() === '.pdf';
            if (!isPdf) {
                cb(new ValidationError('Only PDF files can be attached', PDF_FIELD));
                return;
            }
            cb(null, true);
        },
    }).single(PDF_FIELD);
}

export const toUploadedPdf = (file: Express.Multer.File | undefined): UploadedPdf | undefined =>
    file ? { path: file.path, originalName: file.originalname } : undefined;
