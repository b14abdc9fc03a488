import { planPresentation } from './presentationPlanning';
import { generateImage } from './imageGeneration';
import type { GeneratedMedia } from './imageGeneration';
import { generateVideo } from './videoGeneration';
import { UPLOADS_ROUTE } from '@shared/constants';
import type { GenerationRequest, PresentationPlan, Slide } from '@shared/types';

export type ProgressReporter = (msg: string) => void;

/**
 * The three model calls the pipeline depends on.
 */
export interface GenerationServices {
    planPresentation(request: GenerationRequest): Promise<PresentationPlan>;
    generateImage(visualPrompt: string, uploadDir: string): Promise<GeneratedMedia>;
    generateVideo(image: GeneratedMedia, videoPrompt: string, uploadDir: string): Promise<GeneratedMedia>;
}

export const geminiServices: GenerationServices = {
    planPresentation,
    generateImage,
    generateVideo,
};

export interface GeneratedPresentation {
    title: string;
    slides: Slide[];
    hasVideo: boolean;
}

export const mediaUrlFor = (fileName: string) => `${UPLOADS_ROUTE}/${encodeURIComponent(fileName)}`;

/**
 * Runs plan → images → optional video, strictly one call at a time.
 * Any failing model call rejects the whole generation; there is no partial result.
 */
export class PresentationGenerator {
    constructor(
        private readonly uploadDir: string,
        private readonly services: GenerationServices = geminiServices
    ) { }

    async generate(request: GenerationRequest, report: ProgressReporter): Promise<GeneratedPresentation> {
        report('Planning deck with the reasoning model...');
        if (request.urlLink) report(`Browsing URL context: ${request.urlLink}`);
        if (request.pdf) report('Analyzing PDF file content...');

        const plan = await this.services.planPresentation(request);
        report(`Outline ready: "${plan.title}" (${plan.slides.length} slides)`);

        const slides: Slide[] = [];
        let firstImage: GeneratedMedia | null = null;

        for (const [index, planned] of plan.slides.entries()) {
            report(`Slide ${index + 1}: rendering image...`);
            const image = await this.services.generateImage(planned.visualPrompt, this.uploadDir);
            if (index === 0) firstImage = image;

            slides.push({
                position: index + 1,
                title: planned.title,
                content: planned.content,
                imageUrl: mediaUrlFor(image.fileName),
                videoUrl: null,
            });
            report(`Slide ${index + 1}: image ready.`);
        }

        if (request.enableVideo && firstImage) {
            const opening = plan.slides[0];
            const videoPrompt = opening?.videoPrompt || opening?.visualPrompt || plan.title;

            report('Slide 1: animating with the video model (this can take a minute)...');
            const video = await this.services.generateVideo(firstImage, videoPrompt, this.uploadDir);
            slides[0] = { ...slides[0], videoUrl: mediaUrlFor(video.fileName) };
            report('Slide 1: video complete!');
        }

        return {
            title: plan.title,
            slides,
            hasVideo: slides.some(slide => slide.videoUrl !== null),
        };
    }
}
