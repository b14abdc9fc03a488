import { GoogleGenAI } from "@google/genai";
import { getConfig } from '../config';

let aiInstance: GoogleGenAI | null = null;

export const getAiClient = () => {
    if (aiInstance) return aiInstance;

    aiInstance = new GoogleGenAI({ apiKey: getConfig().geminiApiKey });
    return aiInstance;
};
