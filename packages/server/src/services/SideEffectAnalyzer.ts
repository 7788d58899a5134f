import {
    SEVERITIES,
    TRIAGE_DISCLAIMER,
    TRIAGE_LIST_LIMIT,
    TriageResultSchema,
    URGENCY_BY_SEVERITY,
    extractJsonObject,
    includesAny,
    toBoolean,
    toConfidence,
    toStringList,
    toText,
    type AnalysisOutput,
    type ContentGenerator,
    type JsonObject,
    type Severity,
    type SymptomReport,
    type TriageResult
} from '@medicare/shared';
import { SideEffectPrompt } from '../prompts/SideEffectPrompt.js';

export const EMERGENCY_TERMS = [
    'chest pain',
    'shortness of breath',
    'breathlessness',
    'fainting',
    'seizure',
    'unconscious',
    'severe bleeding',
    'swelling of face',
    'swelling of tongue',
    'anaphylaxis'
] as const;

export const HIGH_TERMS = [
    'high fever',
    'persistent vomiting',
    'bloody stool',
    'black stool',
    'confusion',
    'severe headache',
    'severe rash',
    'yellow eyes',
    'yellow skin'
] as const;

const RECOMMENDATION_BY_SEVERITY: Readonly<Record<Severity, string>> = {
    low: 'Monitor symptoms, hydrate, and continue tracking. If symptoms persist, consult your doctor.',
    medium: 'Consult your doctor within 24 hours for guidance and possible medicine adjustment.',
    high: 'Seek urgent medical care today and avoid the next dose until advised by a clinician.',
    emergency: 'Seek emergency care immediately or call emergency services now.'
};

export const FALLBACK_CONFIDENCE = 0.45;
const TRIAGE_TEMPERATURE = 0.1;

function isSeverity(value: string): value is Severity {
    return (SEVERITIES as readonly string[]).includes(value);
}

function fallbackSeverity(symptoms: readonly string[]): Severity {
    const symptomsText = symptoms.join(' | ').toLowerCase();
    if (includesAny(symptomsText, EMERGENCY_TERMS)) return 'emergency';
    if (includesAny(symptomsText, HIGH_TERMS)) return 'high';
    if (symptoms.length >= 3) return 'medium';
    return 'low';
}

export function fallbackTriage(report: Pick<SymptomReport, 'symptoms'>): TriageResult {
    const severity = fallbackSeverity(report.symptoms);

    return {
        severity,
        doctor_consultation_needed: severity !== 'low',
        urgency: URGENCY_BY_SEVERITY[severity],
        possible_reasons: [
            'Possible medicine side effect',
            'Interaction with another medicine',
            'Underlying condition worsening'
        ],
        immediate_actions: [
            'Record exact symptom start time',
            'Avoid self-medicating additional drugs',
            'Keep hydration and rest'
        ],
        warning_signs: [
            'Breathing difficulty',
            'Chest pain',
            'Severe swelling/rash'
        ],
        recommendation: RECOMMENDATION_BY_SEVERITY[severity],
        confidence: FALLBACK_CONFIDENCE,
        disclaimer: TRIAGE_DISCLAIMER
    };
}

/**
 * Coerces an untrusted model object into a triage result. Severity drives urgency: an urgency
 * that is missing, unknown, or disagrees with the severity is replaced by the table value.
 * Throws if the coerced value still fails the result schema.
 */
export function normalizeTriage(data: JsonObject): TriageResult {
    const rawSeverity = toText(data.severity).toLowerCase();
    const severity: Severity = isSeverity(rawSeverity) ? rawSeverity : 'medium';

    const urgency = URGENCY_BY_SEVERITY[severity];
    const rawUrgency = toText(data.urgency).toLowerCase();
    if (rawUrgency && rawUrgency !== urgency) {
        console.warn(`[SideEffectAnalyzer] Overriding urgency "${rawUrgency}" with "${urgency}" for severity ${severity}`);
    }

    let doctorNeeded = toBoolean(data.doctor_consultation_needed, severity !== 'low');
    if (severity === 'high' || severity === 'emergency') {
        doctorNeeded = true;
    }

    return TriageResultSchema.parse({
        severity,
        doctor_consultation_needed: doctorNeeded,
        urgency,
        possible_reasons: toStringList(data.possible_reasons, TRIAGE_LIST_LIMIT),
        immediate_actions: toStringList(data.immediate_actions, TRIAGE_LIST_LIMIT),
        warning_signs: toStringList(data.warning_signs, TRIAGE_LIST_LIMIT),
        recommendation: toText(data.recommendation),
        confidence: toConfidence(data.confidence),
        disclaimer: TRIAGE_DISCLAIMER
    });
}

export class SideEffectAnalyzer {
    private generator: ContentGenerator | null;
    private prompt: SideEffectPrompt;

    constructor(generator: ContentGenerator | null, prompt: SideEffectPrompt = new SideEffectPrompt()) {
        this.generator = generator;
        this.prompt = prompt;
    }

    async analyze(report: SymptomReport): Promise<AnalysisOutput<TriageResult>> {
        if (!this.generator) {
            return this.fallback(report, 'no LLM credential configured');
        }

        try {
            const outcome = await this.generator.generateContent({
                parts: [{ text: this.prompt.build(report) }],
                temperature: TRIAGE_TEMPERATURE
            });

            if (!outcome.success) {
                return this.fallback(report, outcome.error);
            }

            const result = normalizeTriage(extractJsonObject(outcome.text));
            console.log(`[SideEffectAnalyzer] LLM triage for ${report.medicine_name}: ${result.severity}`);
            return { result, source: 'llm' };
        } catch (error) {
            return this.fallback(report, error instanceof Error ? error.message : 'Unknown error');
        }
    }

    private fallback(report: SymptomReport, reason: string): AnalysisOutput<TriageResult> {
        console.warn(`[SideEffectAnalyzer] Using rule-based fallback: ${reason}`);
        return { result: fallbackTriage(report), source: 'fallback' };
    }
}
