import {
    CHAT_DISCLAIMER,
    CHAT_LIST_LIMIT,
    ChatResultSchema,
    extractJsonObject,
    hasPrescriptionImage,
    includesAny,
    toBoolean,
    toStringList,
    toText,
    type AnalysisOutput,
    type ChatResult,
    type ChatTurn,
    type ContentGenerator,
    type ContentPart,
    type JsonObject
} from '@medicare/shared';
import { MedicalChatPrompt } from '../prompts/MedicalChatPrompt.js';

export const CHAT_EMERGENCY_TERMS = [
    'chest pain',
    'severe breathlessness',
    'fainting',
    'seizure',
    'unconscious',
    'heavy bleeding'
] as const;

export const EMERGENCY_REPLY =
    'Your message may include emergency warning signs. ' +
    'Please seek immediate medical care or call emergency services now.';

export const GENERIC_REPLY =
    'I can help explain medicines from your prescription and provide health guidance. ' +
    'Please share medicine names, schedule, and any symptoms for a more accurate answer.';

const CHAT_TEMPERATURE = 0.25;

export function fallbackChat(turn: ChatTurn): ChatResult {
    const emergency = includesAny(turn.user_message.toLowerCase(), CHAT_EMERGENCY_TERMS);

    return {
        reply: emergency ? EMERGENCY_REPLY : GENERIC_REPLY,
        medicine_uses: [
            'Share medicine name and purpose to get use-specific guidance.',
            'Follow doctor-prescribed timing and dose exactly.'
        ],
        health_guidance: [
            'Track symptoms with date/time and discuss persistent issues with a clinician.',
            'Do not stop essential medicines abruptly without advice.'
        ],
        diet_guidance: [
            'Stay hydrated and maintain balanced meals with protein and fiber.',
            'Avoid alcohol unless your doctor confirms safety with medicines.'
        ],
        exercise_guidance: [
            'Use moderate daily activity such as walking unless advised otherwise.',
            'Pause exercise and seek care if dizziness, chest pain, or severe weakness occurs.'
        ],
        precautions: [
            'Check drug interactions before adding OTC medicines or supplements.',
            'Report allergy symptoms such as rash, swelling, or breathing trouble urgently.'
        ],
        image_received: hasPrescriptionImage(turn),
        emergency,
        disclaimer: CHAT_DISCLAIMER
    };
}

export function normalizeChat(data: JsonObject): ChatResult {
    return ChatResultSchema.parse({
        reply: toText(data.reply),
        medicine_uses: toStringList(data.medicine_uses, CHAT_LIST_LIMIT),
        health_guidance: toStringList(data.health_guidance, CHAT_LIST_LIMIT),
        diet_guidance: toStringList(data.diet_guidance, CHAT_LIST_LIMIT),
        exercise_guidance: toStringList(data.exercise_guidance, CHAT_LIST_LIMIT),
        precautions: toStringList(data.precautions, CHAT_LIST_LIMIT),
        image_received: toBoolean(data.image_received, false),
        emergency: toBoolean(data.emergency, false),
        disclaimer: CHAT_DISCLAIMER
    });
}

export class MedicalChatAssistant {
    private generator: ContentGenerator | null;
    private prompt: MedicalChatPrompt;

    constructor(generator: ContentGenerator | null, prompt: MedicalChatPrompt = new MedicalChatPrompt()) {
        this.generator = generator;
        this.prompt = prompt;
    }

    buildParts(turn: ChatTurn): ContentPart[] {
        const parts: ContentPart[] = [{ text: this.prompt.build(turn) }];
        if (hasPrescriptionImage(turn) && turn.prescription_image_mime_type) {
            parts.push({
                inlineData: {
                    mimeType: turn.prescription_image_mime_type,
                    data: turn.prescription_image_base64
                }
            });
        }
        return parts;
    }

    async chat(turn: ChatTurn): Promise<AnalysisOutput<ChatResult>> {
        if (!this.generator) {
            return this.fallback(turn, 'no LLM credential configured');
        }

        try {
            const outcome = await this.generator.generateContent({
                parts: this.buildParts(turn),
                temperature: CHAT_TEMPERATURE
            });

            if (!outcome.success) {
                return this.fallback(turn, outcome.error);
            }

            const normalized = normalizeChat(extractJsonObject(outcome.text));
            // image_received reflects the request, never the model
            const result: ChatResult = { ...normalized, image_received: hasPrescriptionImage(turn) };
            return { result, source: 'llm' };
        } catch (error) {
            return this.fallback(turn, error instanceof Error ? error.message : 'Unknown error');
        }
    }

    private fallback(turn: ChatTurn, reason: string): AnalysisOutput<ChatResult> {
        console.warn(`[MedicalChatAssistant] Using canned fallback reply: ${reason}`);
        return { result: fallbackChat(turn), source: 'fallback' };
    }
}
