import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { GenerateVideosOperation } from '@google/genai';
import { getAiClient } from '../utils/geminiClient';
import { buildVideoPrompt } from '@shared/promptBuilders';
import {
    MODEL_VIDEO_GENERATION,
    SLIDE_ASPECT_RATIO,
    VIDEO_DURATION_SECONDS,
    VIDEO_MAX_POLLS,
    VIDEO_POLL_INTERVAL_MS,
    VIDEO_RESOLUTION,
} from '@shared/constants';
import { VideoGenError, getErrorMessage } from '@shared/errors';
import type { GeneratedMedia } from './imageGeneration';

export interface VideoPollingOptions {
    pollIntervalMs?: number;
    maxPolls?: number;
}

/**
 * Animates a still image into a short clip and downloads it next to the image.
 * Veo runs as a long-running operation, so this polls until it is done.
 */
export async function generateVideo(
    image: GeneratedMedia,
    videoPrompt: string,
    uploadDir: string,
    options: VideoPollingOptions = {}
): Promise<GeneratedMedia> {
    const { pollIntervalMs = VIDEO_POLL_INTERVAL_MS, maxPolls = VIDEO_MAX_POLLS } = options;
    const ai = getAiClient();
    const imageBytes = (await fs.readFile(image.filePath)).toString('base64');

    let operation: GenerateVideosOperation;
    try {
        operation = await ai.models.generateVideos({
            model: MODEL_VIDEO_GENERATION,
            prompt: buildVideoPrompt(videoPrompt),
            image: { imageBytes, mimeType: image.mimeType },
            config: {
                aspectRatio: SLIDE_ASPECT_RATIO,
                resolution: VIDEO_RESOLUTION,
                durationSeconds: VIDEO_DURATION_SECONDS,
                numberOfVideos: 1,
            },
        });

        let polls = 0;
        while (!operation.done && polls < maxPolls) {
            await new Promise(resolve => setTimeout(resolve, pollIntervalMs));
            operation = await ai.operations.getVideosOperation({ operation });
            polls++;

            if (polls % 6 === 0) {
                console.log(`[video] Still generating... (${Math.round((polls * pollIntervalMs) / 1000)}s elapsed)`);
            }
        }
    } catch (error) {
        throw new VideoGenError(`Video request failed: ${getErrorMessage(error)}`, 'API_ERROR', error);
    }

    if (!operation.done) {
        throw new VideoGenError("Video generation timed out", 'TIMEOUT', { name: operation.name });
    }

    if (operation.error) {
        throw new VideoGenError("Video generation failed", 'OPERATION_FAILED', operation.error);
    }

    const video = operation.response?.generatedVideos?.[0]?.video;
    if (!video) {
        throw new VideoGenError("No video in response", 'NO_VIDEO');
    }

    const fileName = `veo_${randomUUID()}.mp4`;
    const filePath = path.join(uploadDir, fileName);
    try {
        await ai.files.download({ file: video, downloadPath: filePath });
    } catch (error) {
        throw new VideoGenError(`Video download failed: ${getErrorMessage(error)}`, 'API_ERROR', error);
    }

    console.log(`[video] Saved ${fileName}`);
    return { fileName, filePath, mimeType: 'video/mp4' };
}
