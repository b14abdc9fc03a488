/**
 * A single slide of a generated presentation.
 * Positions are 1-based and contiguous within one presentation.
 */
export interface Slide {
    position: number;
    title: string;
    content: string;
    imageUrl: string | null;
    videoUrl: string | null;
}

/**
 * One slide of the outline returned by the planning model, before any media exists.
 */
export interface PlannedSlide {
    title: string;
    content: string;
    visualPrompt: string;
    videoPrompt: string;
}

export interface PresentationPlan {
    title: string;
    slides: PlannedSlide[];
}

export interface UploadedPdf {
    path: string;
    originalName: string;
}

/**
 * A validated form submission. Lives only as long as the request that carried it.
 */
export interface GenerationRequest {
    topic: string;
    slideCount: number;
    enableVideo: boolean;
    urlLink?: string;
    pdf?: UploadedPdf;
}

export interface Presentation {
    id: string;
    title: string;
    ownerId: string | null;
    hasVideo: boolean;
    slides: Slide[];
    createdAt: Date;
}

export type NewPresentation = Omit<Presentation, 'id' | 'createdAt'>;

export interface PresentationSummary {
    id: string;
    title: string;
    hasVideo: boolean;
    slideCount: number;
    createdAt: Date;
}

export type GenerateResponse =
    | { success: true; redirect: string }
    | { success: false; error: string };

// Payload of a progress-channel event
export interface LogEvent {
    msg: string;
}
