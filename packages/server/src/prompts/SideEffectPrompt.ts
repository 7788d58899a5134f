import type { SymptomReport } from '@medicare/shared';
import { AnalysisPrompt } from './PromptInterface.js';

export class SideEffectPrompt extends AnalysisPrompt<SymptomReport> {
    protected readonly role = [
        'You are a careful clinical triage assistant.',
        'Task: Analyze possible side-effects for the medicine and symptoms below.'
    ].join('\n');

    protected readonly schema = [
        'Return STRICT JSON only with keys:',
        '{' +
            '"severity":"low|medium|high|emergency",' +
            '"doctor_consultation_needed":true|false,' +
            '"urgency":"self_monitor|call_doctor_24h|seek_urgent_care|emergency_now",' +
            '"possible_reasons":["..."],' +
            '"immediate_actions":["..."],' +
            '"warning_signs":["..."],' +
            '"recommendation":"...",' +
            '"confidence":0.0' +
        '}'
    ].join('\n');

    protected readonly safetyRules = [
        'Safety rules:',
        '1) If life-threatening symptoms are possible, mark emergency.',
        '2) Be conservative. If uncertain, increase urgency.',
        '3) Keep each list to at most 10 short points.',
        '4) confidence is a number between 0 and 1.'
    ].join('\n');

    build(report: SymptomReport): string {
        const details = [
            `Medicine name: ${report.medicine_name}`,
            `Dose: ${this.orPlaceholder(report.dose, 'unknown')}`,
            `Taken at: ${this.orPlaceholder(report.taken_at, 'unknown')}`,
            `Symptoms: ${report.symptoms.join(', ')}`,
            `Age: ${report.patient_age ?? 'unknown'}`,
            `Gender: ${this.orPlaceholder(report.patient_gender, 'unknown')}`,
            `Known conditions: ${this.joinOrNone(report.known_conditions)}`,
            `Extra notes: ${this.orPlaceholder(report.extra_notes, 'none')}`
        ].join('\n');

        return [this.role, this.schema, this.safetyRules, this.jsonOnlyRules, '', details, ''].join('\n');
    }
}
