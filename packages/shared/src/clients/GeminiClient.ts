import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';

export interface GeminiConfigs {
    apiKey: string;
    apiBase: string;
    model: string;
    timeoutMs: number;
    adapter?: AxiosAdapter;
}

export type ContentPart =
    | { text: string }
    | { inlineData: { mimeType: string; data: string } };

export interface GenerateContentRequest {
    parts: ContentPart[];
    temperature: number;
}

export type GenerateContentResult =
    | { success: true; text: string }
    | { success: false; error: string };

export interface ContentGenerator {
    generateContent(request: GenerateContentRequest): Promise<GenerateContentResult>;
}

const GeminiResponseSchema = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({ text: z.unknown().optional() })).optional()
        }).nullish()
    })).optional()
});

export function extractCandidateText(payload: unknown): string {
    const parsed = GeminiResponseSchema.safeParse(payload);
    if (!parsed.success) {
        throw new Error('Gemini response body is malformed');
    }

    const candidates = parsed.data.candidates ?? [];
    if (candidates.length === 0) {
        throw new Error('Gemini returned no candidates');
    }

    const parts = candidates[0].content?.parts ?? [];
    if (parts.length === 0) {
        throw new Error('Gemini response has no content parts');
    }

    for (const part of parts) {
        if (typeof part.text === 'string' && part.text.trim()) {
            return part.text.trim();
        }
    }
    throw new Error('Gemini response text is empty');
}

export class GeminiClient implements ContentGenerator {
    private client: AxiosInstance;
    private configs: GeminiConfigs;

    constructor(configs: GeminiConfigs) {
        this.configs = configs;
        this.client = axios.create({
            baseURL: configs.apiBase.replace(/\/+$/, ''),
            timeout: configs.timeoutMs,
            headers: this.getGeminiHeaders(),
            ...(configs.adapter && { adapter: configs.adapter })
        });
    }

    private getGeminiHeaders() {
        return {
            'Content-Type': 'application/json',
            'x-goog-api-key': this.configs.apiKey
        };
    }

    getModelPath(): string {
        return `/v1beta/models/${this.configs.model.trim()}:generateContent`;
    }

    async generateContent(request: GenerateContentRequest): Promise<GenerateContentResult> {
        try {
            const response = await this.client.post<unknown>(this.getModelPath(), {
                contents: [{ parts: request.parts }],
                generationConfig: {
                    temperature: request.temperature,
                    responseMimeType: 'application/json'
                }
            });

            return {
                success: true,
                text: extractCandidateText(response.data)
            };
        } catch (error) {
            const message = axios.isAxiosError(error)
                ? `${error.code ?? 'HTTP_ERROR'}${error.response ? ` (${error.response.status})` : ''}: ${error.message}`
                : error instanceof Error ? error.message : 'Unknown error';
            console.error('[GeminiClient] generateContent failed:', message);
            return {
                success: false,
                error: message
            };
        }
    }
}
