import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { Modality } from '@google/genai';
import type { GenerateContentResponse } from '@google/genai';
import { getAiClient } from '../utils/geminiClient';
import { buildImagePrompt } from '@shared/promptBuilders';
import { IMAGE_SIZE, MODEL_IMAGE_GENERATION, SLIDE_ASPECT_RATIO } from '@shared/constants';
import { ImageGenError, getErrorMessage } from '@shared/errors';

/**
 * A media file written to the uploads directory.
 */
export interface GeneratedMedia {
    fileName: string;
    filePath: string;
    mimeType: string;
}

const EXTENSIONS: Record<string, string> = {
    'image/png': '.png',
    'image/jpeg': '.jpg',
    'image/webp': '.webp',
};

function extractInlineImage(response: GenerateContentResponse): { data: string; mimeType: string } | null {
    const parts = response.candidates?.[0]?.content?.parts ?? [];
    for (const part of parts) {
        if (part.inlineData?.data) {
            return { data: part.inlineData.data, mimeType: part.inlineData.mimeType || 'image/png' };
        }
    }
    return null;
}

export async function generateImage(visualPrompt: string, uploadDir: string): Promise<GeneratedMedia> {
    let response: GenerateContentResponse;
    try {
        response = await getAiClient().models.generateContent({
            model: MODEL_IMAGE_GENERATION,
            contents: [{ role: 'user', parts: [{ text: buildImagePrompt(visualPrompt) }] }],
            config: {
                responseModalities: [Modality.IMAGE],
                imageConfig: {
                    aspectRatio: SLIDE_ASPECT_RATIO,
                    imageSize: IMAGE_SIZE,
                },
            },
        });
    } catch (error) {
        throw new ImageGenError(`Image request failed: ${getErrorMessage(error)}`, 'API_ERROR', error);
    }

    const image = extractInlineImage(response);
    if (!image) {
        const blockReason = response.promptFeedback?.blockReason;
        if (blockReason) {
            throw new ImageGenError("Image generation blocked by safety filters", 'BLOCKED', { blockReason });
        }
        throw new ImageGenError("No image data returned", 'NO_IMAGE_DATA');
    }

    const fileName = `img_${randomUUID()}${EXTENSIONS[image.mimeType] ?? '.png'}`;
    const filePath = path.join(uploadDir, fileName);
    await fs.writeFile(filePath, Buffer.from(image.data, 'base64'));

    console.log(`[image] Saved ${fileName}`);
    return { fileName, filePath, mimeType: image.mimeType };
}
