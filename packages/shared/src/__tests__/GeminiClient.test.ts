import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, test, vi } from 'vitest';
import { GeminiClient, extractCandidateText } from '../clients/GeminiClient.js';

function respondWith(body: unknown, captured: InternalAxiosRequestConfig[] = []): AxiosAdapter {
    return async (config) => {
        captured.push(config);
        return { data: body, status: 200, statusText: 'OK', headers: {}, config };
    };
}

function createClient(adapter: AxiosAdapter): GeminiClient {
    return new GeminiClient({
        apiKey: 'test-key',
        apiBase: 'https://llm.test/',
        model: 'gemini-test',
        timeoutMs: 1000,
        adapter
    });
}

describe('GeminiClient', () => {
    test('posts the prompt parts with a JSON response hint', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const captured: InternalAxiosRequestConfig[] = [];
        const client = createClient(respondWith({
            candidates: [{ content: { parts: [{ text: ' {"ok":true} ' }] } }]
        }, captured));

        const result = await client.generateContent({
            parts: [{ text: 'hello' }, { inlineData: { mimeType: 'image/png', data: 'aGk=' } }],
            temperature: 0.1
        });

        expect(result).toEqual({ success: true, text: '{"ok":true}' });
        expect(captured).toHaveLength(1);
        expect(captured[0].baseURL).toBe('https://llm.test');
        expect(captured[0].url).toBe('/v1beta/models/gemini-test:generateContent');
        expect(captured[0].headers['x-goog-api-key']).toBe('test-key');
        expect(JSON.parse(captured[0].data)).toEqual({
            contents: [{
                parts: [{ text: 'hello' }, { inlineData: { mimeType: 'image/png', data: 'aGk=' } }]
            }],
            generationConfig: { temperature: 0.1, responseMimeType: 'application/json' }
        });
    });

    test('reports a failure when there are no candidates', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const client = createClient(respondWith({ candidates: [] }));

        const result = await client.generateContent({ parts: [{ text: 'hello' }], temperature: 0.1 });

        expect(result).toEqual({ success: false, error: 'Gemini returned no candidates' });
    });

    test('reports a failure for non-2xx responses instead of throwing', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const client = createClient(async (config) => {
            throw new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null, {
                data: {},
                status: 503,
                statusText: 'Service Unavailable',
                headers: {},
                config
            });
        });

        const result = await client.generateContent({ parts: [{ text: 'hello' }], temperature: 0.1 });

        expect(result).toEqual({
            success: false,
            error: 'ERR_BAD_RESPONSE (503): Request failed with status code 503'
        });
    });
});

describe('extractCandidateText', () => {
    test('skips empty parts and returns the first non-empty text', () => {
        const payload = { candidates: [{ content: { parts: [{ text: '  ' }, { text: 'answer' }] } }] };
        expect(extractCandidateText(payload)).toBe('answer');
    });

    test('rejects a candidate without parts', () => {
        expect(() => extractCandidateText({ candidates: [{ content: {} }] }))
            .toThrow('Gemini response has no content parts');
    });

    test('rejects whitespace-only text', () => {
        expect(() => extractCandidateText({ candidates: [{ content: { parts: [{ text: ' ' }] } }] }))
            .toThrow('Gemini response text is empty');
    });

    test('rejects a malformed body', () => {
        expect(() => extractCandidateText({ candidates: 'nope' })).toThrow('Gemini response body is malformed');
    });
});
