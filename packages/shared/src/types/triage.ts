import { z } from 'zod';

export const SEVERITIES = ['low', 'medium', 'high', 'emergency'] as const;
export const URGENCIES = ['self_monitor', 'call_doctor_24h', 'seek_urgent_care', 'emergency_now'] as const;

export type Severity = typeof SEVERITIES[number];
export type Urgency = typeof URGENCIES[number];

export const URGENCY_BY_SEVERITY: Readonly<Record<Severity, Urgency>> = {
    low: 'self_monitor',
    medium: 'call_doctor_24h',
    high: 'seek_urgent_care',
    emergency: 'emergency_now'
};

export const TRIAGE_DISCLAIMER =
    'This is educational support, not a diagnosis. ' +
    'If symptoms are severe or worsening, contact a doctor immediately.';

export const TRIAGE_LIST_LIMIT = 10;

/** ISO 8601 date-time; seconds and the UTC offset may be omitted. */
const ISO_DATETIME = /^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])T([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;

const isoDateTime = z.string().trim()
    .regex(ISO_DATETIME, 'Invalid datetime')
    .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid datetime');

const trimmedList = (max: number) =>
    z.array(z.string()).max(max).default([])
        .transform((entries) => entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0));

export const SymptomReportSchema = z.object({
    medicine_name: z.string().trim().min(1, 'medicine_name is required').max(120),
    dose: z.string().max(120).default(''),
    taken_at: isoDateTime.nullish(),
    symptoms: z.array(z.string()).min(1, 'At least one symptom is required.').max(20)
        .transform((entries) => entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0))
        .refine((entries) => entries.length > 0, { message: 'At least one symptom is required.' }),
    patient_age: z.number().int().min(0).max(120).nullish(),
    patient_gender: z.string().max(40).default(''),
    known_conditions: trimmedList(20),
    extra_notes: z.string().max(1000).default('')
});

export type SymptomReport = z.infer<typeof SymptomReportSchema>;

export const TriageResultSchema = z.object({
    severity: z.enum(SEVERITIES),
    doctor_consultation_needed: z.boolean(),
    urgency: z.enum(URGENCIES),
    possible_reasons: z.array(z.string()).max(TRIAGE_LIST_LIMIT),
    immediate_actions: z.array(z.string()).max(TRIAGE_LIST_LIMIT),
    warning_signs: z.array(z.string()).max(TRIAGE_LIST_LIMIT),
    recommendation: z.string(),
    confidence: z.number().min(0).max(1),
    disclaimer: z.literal(TRIAGE_DISCLAIMER)
}).refine(
    (result) => result.urgency === URGENCY_BY_SEVERITY[result.severity],
    { message: 'urgency does not match severity' }
).refine(
    (result) => result.doctor_consultation_needed || (result.severity !== 'high' && result.severity !== 'emergency'),
    { message: 'high and emergency severity require a doctor consultation' }
);

export type TriageResult = z.infer<typeof TriageResultSchema>;
