import { z } from 'zod';

export const REMINDER_MODES = ['caregiver_patient', 'self_patient'] as const;
export type ReminderMode = typeof REMINDER_MODES[number];

export const ReminderTemplateSchema = z.object({
    patient_name: z.string().max(80).default(''),
    caregiver_name: z.string().max(80).default(''),
    medicine_name: z.string().trim().min(1, 'medicine_name is required').max(120),
    dosage: z.string().max(120).default(''),
    scheduled_time: z.string().max(40).default(''),
    date_key: z.string().max(40).default(''),
    mode: z.enum(REMINDER_MODES).default('caregiver_patient')
});

export type ReminderTemplate = z.infer<typeof ReminderTemplateSchema>;

export const ReminderCallRequestSchema = ReminderTemplateSchema.extend({
    to_phone: z.string().trim().min(1, 'to_phone is required').max(32)
});

export type ReminderCallRequest = z.infer<typeof ReminderCallRequestSchema>;

export type CallResponse = 'pending' | 'taken' | 'missed';

export interface CallRecord {
    call_sid: string;
    to: string;
    status: string;
    response: CallResponse;
    speech_result: string;
    updated_at: string;
}

export interface PlacedCall {
    call_sid: string;
    status: string;
}
