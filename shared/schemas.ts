import { z } from 'zod';
import { MAX_NUM_SLIDES, MIN_NUM_SLIDES } from './constants';

// JSON schema handed to the planning model as responseJsonSchema
export const PRESENTATION_PLAN_SCHEMA = {
    type: "object",
    properties: {
        title: {
            type: "string",
            description: "Title of the whole deck."
        },
        slides: {
            type: "array",
            items: {
                type: "object",
                properties: {
                    title: { type: "string" },
                    content: {
                        type: "string",
                        description: "One or two short sentences shown on the slide."
                    },
                    visualPrompt: {
                        type: "string",
                        description: "Image prompt describing subject, camera, lighting and style."
                    },
                    videoPrompt: {
                        type: "string",
                        description: "Motion prompt describing camera movement and action."
                    },
                },
                required: ["title", "content", "visualPrompt", "videoPrompt"],
            },
        },
    },
    required: ["title", "slides"],
};

export const plannedSlideSchema = z.object({
    title: z.string().trim().min(1),
    content: z.string(),
    visualPrompt: z.string().trim().min(1),
    videoPrompt: z.string().default(''),
});

export const presentationPlanSchema = z.object({
    title: z.string().trim().min(1),
    slides: z.array(plannedSlideSchema).min(1),
});

const optionalText = z
    .string()
    .optional()
    .transform(value => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

// Raw multipart fields as multer hands them over: every value is a string
export const generationFormSchema = z.object({
    topic: z
        .string({ required_error: 'Enter a topic', invalid_type_error: 'Enter a topic' })
        .trim()
        .min(1, 'Enter a topic'),
    slide_count: optionalText.pipe(
        z.coerce
            .number({ invalid_type_error: 'Slide count must be a whole number' })
            .int('Slide count must be a whole number')
            .min(MIN_NUM_SLIDES, `Slide count must be between ${MIN_NUM_SLIDES} and ${MAX_NUM_SLIDES}`)
            .max(MAX_NUM_SLIDES, `Slide count must be between ${MIN_NUM_SLIDES} and ${MAX_NUM_SLIDES}`)
            .optional()
    ),
    enable_video: optionalText.transform(value => value === 'true'),
    url_link: optionalText.pipe(
        z
            .string()
            .url('Context URL must be a valid http(s) address')
            .refine(isHttpUrl, 'Context URL must be a valid http(s) address')
            .optional()
    ),
});

export const logChannelSchema = z.string().regex(/^[A-Za-z0-9_-]{1,64}$/);

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}
