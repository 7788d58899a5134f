import { beforeEach, describe, expect, test, vi } from 'vitest';
import { SymptomReportSchema, TRIAGE_DISCLAIMER, URGENCY_BY_SEVERITY, type SymptomReport } from '@medicare/shared';
import { FALLBACK_CONFIDENCE, SideEffectAnalyzer, fallbackTriage, normalizeTriage } from '../services/SideEffectAnalyzer.js';
import { FakeGenerator } from './fakes.js';

function report(symptoms: string[], overrides: Record<string, unknown> = {}): SymptomReport {
    return SymptomReportSchema.parse({ medicine_name: 'Amoxicillin', symptoms, ...overrides });
}

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

describe('fallbackTriage', () => {
    test('emergency terms match in any case', () => {
        const result = fallbackTriage(report(['Mild itching', 'CHEST PAIN after dose']));
        expect(result.severity).toBe('emergency');
        expect(result.urgency).toBe('emergency_now');
        expect(result.doctor_consultation_needed).toBe(true);
        expect(result.recommendation).toBe('Seek emergency care immediately or call emergency services now.');
    });

    test('high terms win over the symptom count', () => {
        const result = fallbackTriage(report(['high fever']));
        expect(result.severity).toBe('high');
        expect(result.urgency).toBe('seek_urgent_care');
        expect(result.doctor_consultation_needed).toBe(true);
    });

    test('three generic symptoms are medium', () => {
        const result = fallbackTriage(report(['nausea', 'dizziness', 'dry mouth']));
        expect(result.severity).toBe('medium');
        expect(result.urgency).toBe('call_doctor_24h');
        expect(result.doctor_consultation_needed).toBe(true);
    });

    test('one or two generic symptoms are low', () => {
        const result = fallbackTriage(report(['nausea', 'dry mouth']));
        expect(result.severity).toBe('low');
        expect(result.urgency).toBe('self_monitor');
        expect(result.doctor_consultation_needed).toBe(false);
        expect(result.confidence).toBe(FALLBACK_CONFIDENCE);
        expect(result.disclaimer).toBe(TRIAGE_DISCLAIMER);
    });

    test('is deterministic for the same symptoms', () => {
        const symptoms = ['persistent vomiting', 'tiredness'];
        expect(fallbackTriage(report(symptoms))).toEqual(fallbackTriage(report(symptoms)));
    });
});

describe('normalizeTriage', () => {
    test('severity overrides a contradicting urgency and forces a consultation', () => {
        const result = normalizeTriage({
            severity: 'high',
            urgency: 'self_monitor',
            doctor_consultation_needed: false,
            confidence: 0.9
        });
        expect(result.urgency).toBe('seek_urgent_care');
        expect(result.doctor_consultation_needed).toBe(true);
        expect(result.confidence).toBe(0.9);
    });

    test('unparseable confidence defaults to 0.5', () => {
        expect(normalizeTriage({ severity: 'low', confidence: 'not-a-number' }).confidence).toBe(0.5);
    });

    test('unknown severity defaults to medium', () => {
        const result = normalizeTriage({ severity: 'Catastrophic', urgency: 'whenever' });
        expect(result.severity).toBe('medium');
        expect(result.urgency).toBe('call_doctor_24h');
        expect(result.doctor_consultation_needed).toBe(true);
    });

    test('severity is lowercased and trimmed', () => {
        expect(normalizeTriage({ severity: '  EMERGENCY ' }).severity).toBe('emergency');
    });

    test('low severity keeps the model consultation flag', () => {
        expect(normalizeTriage({ severity: 'low', doctor_consultation_needed: true }).doctor_consultation_needed).toBe(true);
        expect(normalizeTriage({ severity: 'low' }).doctor_consultation_needed).toBe(false);
    });

    test('coerces list fields', () => {
        const result = normalizeTriage({
            severity: 'medium',
            possible_reasons: 'Known side effect',
            immediate_actions: Array.from({ length: 12 }, (_, i) => ` step ${i} `),
            warning_signs: 7,
            recommendation: '  Call your doctor.  '
        });
        expect(result.possible_reasons).toEqual(['Known side effect']);
        expect(result.immediate_actions).toHaveLength(10);
        expect(result.immediate_actions[0]).toBe('step 0');
        expect(result.warning_signs).toEqual([]);
        expect(result.recommendation).toBe('Call your doctor.');
    });

    test('every severity maps to its canonical urgency', () => {
        for (const severity of ['low', 'medium', 'high', 'emergency'] as const) {
            expect(normalizeTriage({ severity, urgency: 'emergency_now' }).urgency).toBe(URGENCY_BY_SEVERITY[severity]);
        }
    });
});

describe('SideEffectAnalyzer.analyze', () => {
    test('falls back without a generator', async () => {
        const output = await new SideEffectAnalyzer(null).analyze(report(['chest pain']));
        expect(output.source).toBe('fallback');
        expect(output.result.severity).toBe('emergency');
    });

    test('uses the model result when it parses', async () => {
        const generator = FakeGenerator.replying({
            severity: 'medium',
            urgency: 'call_doctor_24h',
            doctor_consultation_needed: true,
            possible_reasons: ['GI upset from antibiotics'],
            immediate_actions: ['Take with food'],
            warning_signs: ['Bloody stool'],
            recommendation: 'Call your doctor within a day.',
            confidence: 0.72
        });

        const output = await new SideEffectAnalyzer(generator).analyze(report(['nausea']));

        expect(output).toEqual({
            source: 'llm',
            result: {
                severity: 'medium',
                urgency: 'call_doctor_24h',
                doctor_consultation_needed: true,
                possible_reasons: ['GI upset from antibiotics'],
                immediate_actions: ['Take with food'],
                warning_signs: ['Bloody stool'],
                recommendation: 'Call your doctor within a day.',
                confidence: 0.72,
                disclaimer: TRIAGE_DISCLAIMER
            }
        });
        expect(generator.requests).toHaveLength(1);
        expect(generator.requests[0].temperature).toBe(0.1);
        expect(generator.requests[0].parts).toHaveLength(1);
    });

    test('falls back when the upstream call fails', async () => {
        const generator = new FakeGenerator({ success: false, error: 'ECONNABORTED: timeout of 20000ms exceeded' });
        const output = await new SideEffectAnalyzer(generator).analyze(report(['nausea', 'dizziness', 'rash']));
        expect(output.source).toBe('fallback');
        expect(output.result.severity).toBe('medium');
    });

    test('falls back when the model text has no JSON object', async () => {
        const output = await new SideEffectAnalyzer(FakeGenerator.replying('I cannot help with that.'))
            .analyze(report(['nausea']));
        expect(output.source).toBe('fallback');
        expect(output.result.severity).toBe('low');
    });

    test('falls back when the generator throws', async () => {
        const output = await new SideEffectAnalyzer(new FakeGenerator(new Error('boom'))).analyze(report(['seizure']));
        expect(output).toMatchObject({ source: 'fallback', result: { severity: 'emergency' } });
    });
});
