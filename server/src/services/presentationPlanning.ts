import { createPartFromUri, FileState, ThinkingLevel } from '@google/genai';
import type { File as GeminiFile, GenerateContentConfig, Part, Tool } from '@google/genai';
import { getAiClient } from '../utils/geminiClient';
import { buildPresentationSystemPrompt, buildPresentationUserPrompt } from '@shared/promptBuilders';
import { extractFirstJsonObject } from '@shared/utils/jsonExtraction';
import { validatePresentationPlan } from '@shared/utils/validation';
import { PRESENTATION_PLAN_SCHEMA } from '@shared/schemas';
import { MODEL_PRESENTATION_PLANNING } from '@shared/constants';
import { GeminiError, getErrorMessage } from '@shared/errors';
import type { GenerationRequest, PresentationPlan } from '@shared/types';

const FILE_POLL_INTERVAL_MS = 1000;
const FILE_MAX_POLLS = 60;

/**
 * Uploads a PDF through the Files API and waits until Gemini has finished processing it.
 */
export async function uploadPdfForContext(
    pdfPath: string,
    pollIntervalMs = FILE_POLL_INTERVAL_MS
): Promise<{ uri: string; mimeType: string }> {
    const ai = getAiClient();
    let file: GeminiFile = await ai.files.upload({ file: pdfPath, config: { mimeType: 'application/pdf' } });

    let polls = 0;
    while (file.state === FileState.PROCESSING) {
        if (!file.name || polls >= FILE_MAX_POLLS) {
            throw new GeminiError('PDF processing did not finish', 'FILE_PROCESSING', { name: file.name });
        }
        await new Promise(resolve => setTimeout(resolve, pollIntervalMs));
        file = await ai.files.get({ name: file.name });
        polls++;
    }

    if (file.state === FileState.FAILED || !file.uri) {
        throw new GeminiError('PDF processing failed', 'FILE_PROCESSING', { name: file.name, error: file.error });
    }

    return { uri: file.uri, mimeType: file.mimeType || 'application/pdf' };
}

/**
 * Search and code execution let the model check the figures it quotes.
 * URL context is added only when there is a page to read.
 */
export function planningTools(urlLink?: string): Tool[] {
    const tools: Tool[] = [{ googleSearch: {} }, { codeExecution: {} }];
    if (urlLink) tools.unshift({ urlContext: {} });
    return tools;
}

/**
 * Asks the reasoning model for a slide outline, grounded with search and returned
 * against the outline's JSON schema.
 * Grounded replies can carry prose around the JSON, so the first object is scanned out.
 */
export async function planPresentation(request: GenerationRequest): Promise<PresentationPlan> {
    const ai = getAiClient();
    const parts: Part[] = [];

    let hasPdf = false;
    if (request.pdf) {
        try {
            const file = await uploadPdfForContext(request.pdf.path);
            parts.push(createPartFromUri(file.uri, file.mimeType));
            hasPdf = true;
        } catch (error) {
            // The deck can still be planned from the topic alone
            console.warn(`[planning] PDF upload failed for ${request.pdf.originalName}: ${getErrorMessage(error)}`);
        }
    }

    parts.push({
        text: buildPresentationUserPrompt(request.topic, request.slideCount, {
            urlLink: request.urlLink,
            hasPdf,
        }),
    });

    const config: GenerateContentConfig = {
        systemInstruction: buildPresentationSystemPrompt(),
        tools: planningTools(request.urlLink),
        responseMimeType: 'application/json',
        responseJsonSchema: PRESENTATION_PLAN_SCHEMA,
        thinkingConfig: { thinkingLevel: ThinkingLevel.HIGH },
    };

    let text: string | undefined;
    try {
        const response = await ai.models.generateContent({
            model: MODEL_PRESENTATION_PLANNING,
            contents: [{ role: 'user', parts }],
            config,
        });
        text = response.text;
    } catch (error) {
        throw new GeminiError(`Planning request failed: ${getErrorMessage(error)}`, 'API_ERROR', error);
    }

    if (!text) {
        throw new GeminiError("Empty response from planning model", 'EMPTY_RESPONSE');
    }

    let raw: unknown;
    try {
        raw = extractFirstJsonObject(text);
    } catch {
        throw new GeminiError("Failed to parse JSON from model response", 'MALFORMED_RESPONSE', { responseText: text });
    }

    const result = validatePresentationPlan(raw, request.slideCount);
    if (!result.ok) {
        console.warn('[planning] Outline failed validation:', result.errors);
        throw new GeminiError("Planning model returned an invalid outline", 'MALFORMED_RESPONSE', { errors: result.errors });
    }

    console.log(`[planning] "${result.plan.title}" planned with ${result.plan.slides.length} slides`);
    return result.plan;
}
