import type { ZodError } from 'zod';
import { DEFAULT_NUM_SLIDES } from '../constants';
import { ValidationError } from '../errors';
import { generationFormSchema, logChannelSchema, presentationPlanSchema } from '../schemas';
import type { GenerationRequest, PresentationPlan, UploadedPdf } from '../types';

function firstIssue(error: ZodError): { message: string; field?: string } {
    const issue = error.issues[0];
    if (!issue) return { message: 'Invalid input' };
    const field = issue.path.length > 0 ? issue.path.join('.') : undefined;
    return { message: issue.message, field };
}

/**
 * Turns raw form fields into a GenerationRequest.
 * Throws ValidationError with a user-facing message on the first bad field.
 */
export function parseGenerationForm(fields: unknown, pdf?: UploadedPdf): GenerationRequest {
    const parsed = generationFormSchema.safeParse(fields ?? {});
    if (!parsed.success) {
        const { message, field } = firstIssue(parsed.error);
        throw new ValidationError(message, field);
    }

    const { topic, slide_count, enable_video, url_link } = parsed.data;
    const request: GenerationRequest = {
        topic,
        slideCount: slide_count ?? DEFAULT_NUM_SLIDES,
        enableVideo: enable_video,
    };
    if (url_link) request.urlLink = url_link;
    if (pdf) request.pdf = pdf;
    return request;
}

/**
 * Returns the channel id if it is well formed, otherwise undefined (broadcast).
 */
export function parseLogChannel(value: unknown): string | undefined {
    const parsed = logChannelSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
}

export type PlanValidationResult =
    | { ok: true; plan: PresentationPlan }
    | { ok: false; errors: string[] };

/**
 * Validates the planning model's outline. Extra slides beyond the requested
 * count are dropped so positions stay 1..slideCount.
 */
export function validatePresentationPlan(raw: unknown, slideCount: number): PlanValidationResult {
    const parsed = presentationPlanSchema.safeParse(raw);
    if (!parsed.success) {
        return {
            ok: false,
            errors: parsed.error.issues.map(issue => `${issue.path.join('.') || 'plan'}: ${issue.message}`),
        };
    }

    return {
        ok: true,
        plan: {
            title: parsed.data.title,
            slides: parsed.data.slides.slice(0, slideCount),
        },
    };
}
