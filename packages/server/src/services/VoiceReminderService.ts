import type {
    CallPlacer,
    CallRecord,
    CallResponse,
    CallResultStore,
    PlacedCall,
    ReminderCallRequest,
    ReminderTemplate
} from '@medicare/shared';
import { normalizePhone } from '../utils/phone.js';

export const VOICE_ROUTE_PREFIX = '/api/v1/voice';

export interface GatherContext {
    patient_name: string;
    medicine_name: string;
    scheduled_time: string;
    date_key: string;
}

const AFFIRMATIVE_WORDS = ['yes', 'haan'];

/** Spoken "yes"/"haan" (or exactly "ha") or keypad 1 counts as taken. */
export function classifyReminderResponse(speechResult: string, digits: string): CallResponse {
    const spoken = speechResult.trim().toLowerCase();
    const taken = (spoken !== '' && (AFFIRMATIVE_WORDS.some((word) => spoken.includes(word)) || spoken === 'ha'))
        || digits.trim() === '1';
    return taken ? 'taken' : 'missed';
}

export class VoiceReminderService {
    private placer: CallPlacer | null;
    private store: CallResultStore;
    private publicBaseUrl: string;

    constructor(placer: CallPlacer | null, store: CallResultStore, publicBaseUrl: string) {
        this.placer = placer;
        this.store = store;
        this.publicBaseUrl = publicBaseUrl.replace(/\/+$/, '');
    }

    isConfigured(): boolean {
        return this.placer !== null && this.publicBaseUrl !== '';
    }

    twimlUrl(template: ReminderTemplate): string {
        const query = new URLSearchParams({
            patient_name: template.patient_name,
            caregiver_name: template.caregiver_name,
            medicine_name: template.medicine_name,
            dosage: template.dosage,
            scheduled_time: template.scheduled_time,
            date_key: template.date_key,
            mode: template.mode
        });
        return `${this.publicBaseUrl}${VOICE_ROUTE_PREFIX}/twiml?${query.toString()}`;
    }

    gatherUrl(context: GatherContext): string {
        const query = new URLSearchParams({ ...context });
        return `${this.publicBaseUrl}${VOICE_ROUTE_PREFIX}/gather?${query.toString()}`;
    }

    statusCallbackUrl(): string {
        return `${this.publicBaseUrl}${VOICE_ROUTE_PREFIX}/status`;
    }

    async placeCall(request: ReminderCallRequest): Promise<PlacedCall> {
        if (!this.placer || !this.isConfigured()) {
            throw new Error(
                'Twilio Voice is not configured. Set PUBLIC_BASE_URL, ' +
                'TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_VOICE_FROM_NUMBER.'
            );
        }

        const to = normalizePhone(request.to_phone);
        if (!to) {
            throw new Error(`Invalid destination phone: ${request.to_phone}`);
        }

        console.log('[VoiceReminderService] Placing reminder call to:', to);
        const result = await this.placer.createCall({
            to,
            twimlUrl: this.twimlUrl(request),
            statusCallbackUrl: this.statusCallbackUrl()
        });

        if (!result.success) {
            throw new Error(result.error);
        }

        const record = this.store.create(result.callSid, to, result.status);
        return { call_sid: record.call_sid, status: record.status };
    }

    recordResponse(callSid: string, to: string, response: CallResponse, speechResult: string): CallRecord {
        console.log(`[VoiceReminderService] Call ${callSid} response: ${response}`);
        return this.store.recordResponse({ callSid, to, response, speechResult });
    }

    recordStatus(callSid: string, status: string): CallRecord {
        console.log(`[VoiceReminderService] Call ${callSid} status: ${status}`);
        return this.store.recordStatus(callSid, status);
    }

    getResult(callSid: string): CallRecord | null {
        return this.store.get(callSid);
    }
}
