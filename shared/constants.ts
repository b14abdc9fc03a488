export const DEFAULT_NUM_SLIDES = 3;
export const MIN_NUM_SLIDES = 1;
export const MAX_NUM_SLIDES = 10;

// Guests get this many generations before they have to sign in
export const GUEST_GENERATION_LIMIT = 15;

// Model Constants
export const MODEL_PRESENTATION_PLANNING = "gemini-3-pro-preview";
export const MODEL_IMAGE_GENERATION = "gemini-3-pro-image-preview";
export const MODEL_VIDEO_GENERATION = "veo-3.1-generate-preview";

export const SLIDE_ASPECT_RATIO = '16:9';
export const IMAGE_SIZE = '2K';
export const VIDEO_RESOLUTION = '720p';
export const VIDEO_DURATION_SECONDS = 8;
export const VIDEO_POLL_INTERVAL_MS = 5000;
export const VIDEO_MAX_POLLS = 120; // 10 minutes at the default interval

// Public path the uploads directory is served under
export const UPLOADS_ROUTE = '/static/uploads';

// Image Generation Style Guidelines
export const STYLE_GUIDELINES = `
VISUAL STYLE (Cinematic Keynote Standard):
- Goal: A full-bleed backdrop for a presentation slide. One clear subject, strong mood.
- Composition: Wide 16:9 framing with calm negative space on one side for slide text.
- Lighting: Dramatic, motivated lighting. Volumetric where it helps the mood.
- Style: Photorealistic or high-end 3D render. No clip art, no flat icons.
- Text: Do NOT render any words, captions, logos or watermarks.
`;
