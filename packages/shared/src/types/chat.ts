import { z } from 'zod';

export const CHAT_DISCLAIMER =
    'This guidance is educational and does not replace a doctor or pharmacist. ' +
    'Do not change doses without medical advice.';

export const CHAT_LIST_LIMIT = 6;

export const PRESCRIPTION_IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/jpg'] as const;

export const ChatTurnSchema = z.object({
    user_message: z.string().trim()
        .min(2, 'user_message must be at least 2 characters')
        .max(4000),
    prescription_text: z.string().max(6000).default(''),
    prescription_image_base64: z.string().max(6_000_000).default(''),
    prescription_image_mime_type: z.enum(PRESCRIPTION_IMAGE_MIME_TYPES).nullish(),
    history: z.array(z.string()).max(12).default([])
        .transform((entries) => entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0))
});

export type ChatTurn = z.infer<typeof ChatTurnSchema>;

/** Consent travels with the HTTP body but never reaches the assistant. */
export const ChatRequestSchema = ChatTurnSchema.extend({
    ai_consent: z.boolean().default(false)
});

export const ChatResultSchema = z.object({
    reply: z.string(),
    medicine_uses: z.array(z.string()).max(CHAT_LIST_LIMIT),
    health_guidance: z.array(z.string()).max(CHAT_LIST_LIMIT),
    diet_guidance: z.array(z.string()).max(CHAT_LIST_LIMIT),
    exercise_guidance: z.array(z.string()).max(CHAT_LIST_LIMIT),
    precautions: z.array(z.string()).max(CHAT_LIST_LIMIT),
    image_received: z.boolean(),
    emergency: z.boolean(),
    disclaimer: z.literal(CHAT_DISCLAIMER)
});

export type ChatResult = z.infer<typeof ChatResultSchema>;

export function hasPrescriptionImage(turn: Pick<ChatTurn, 'prescription_image_base64'>): boolean {
    return turn.prescription_image_base64.trim().length > 0;
}
