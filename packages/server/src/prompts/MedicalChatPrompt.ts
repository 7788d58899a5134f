import { hasPrescriptionImage, type ChatTurn } from '@medicare/shared';
import { AnalysisPrompt } from './PromptInterface.js';

export class MedicalChatPrompt extends AnalysisPrompt<ChatTurn> {
    protected readonly goals = [
        'You are an experienced medication and wellness assistant.',
        'Goals:',
        '1) Explain medicine usage from the provided prescription/context.',
        '2) Give practical guidance on health, medicine safety, exercise, food, and diet.',
        '3) Use simple patient-friendly language.',
        '4) If you suspect emergency risk, set emergency=true and clearly advise urgent care.'
    ].join('\n');

    protected readonly schema = [
        'Return STRICT JSON only with this schema:',
        '{' +
            '"reply":"short paragraph answer",' +
            '"medicine_uses":["..."],' +
            '"health_guidance":["..."],' +
            '"diet_guidance":["..."],' +
            '"exercise_guidance":["..."],' +
            '"precautions":["..."],' +
            '"emergency":true|false' +
        '}'
    ].join('\n');

    protected readonly rules = [
        'Rules:',
        '- No extra keys.',
        '- Never prescribe dosage changes as a doctor replacement.',
        '- Keep each list concise (max 6 points).'
    ].join('\n');

    imageNote(turn: ChatTurn): string {
        return hasPrescriptionImage(turn) && turn.prescription_image_mime_type
            ? 'A prescription image is attached. Extract relevant medicine details from it.'
            : 'No prescription image attached.';
    }

    build(turn: ChatTurn): string {
        const history = turn.history.length > 0
            ? turn.history.map((entry) => `- ${entry}`).join('\n')
            : 'none';

        return [
            this.goals,
            '',
            this.schema,
            this.rules,
            this.jsonOnlyRules,
            '',
            `Image context: ${this.imageNote(turn)}`,
            `Prescription text:\n${this.orPlaceholder(turn.prescription_text, 'none')}`,
            '',
            `Conversation history:\n${history}`,
            '',
            `User question:\n${turn.user_message}`,
            ''
        ].join('\n');
    }
}
