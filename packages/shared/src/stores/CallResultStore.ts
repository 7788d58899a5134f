import type { CallRecord, CallResponse } from '../types/voice.js';

export interface ResponseUpdate {
    callSid: string;
    to: string;
    response: CallResponse;
    speechResult: string;
}

/**
 * Process-lifetime record of reminder calls keyed by call sid. Records are never removed.
 *
 * Every method reads and writes the map without awaiting, so on the event loop each update
 * is applied whole before any other request touches the same record. Callers get copies.
 */
export class CallResultStore {
    private records = new Map<string, CallRecord>();
    private clock: () => Date;

    constructor(clock: () => Date = () => new Date()) {
        this.clock = clock;
    }

    private timestamp(): string {
        return this.clock().toISOString();
    }

    create(callSid: string, to: string, status: string): CallRecord {
        const record: CallRecord = {
            call_sid: callSid,
            to,
            status,
            response: 'pending',
            speech_result: '',
            updated_at: this.timestamp()
        };
        this.records.set(callSid, record);
        return { ...record };
    }

    recordResponse(update: ResponseUpdate): CallRecord {
        const existing = this.records.get(update.callSid);
        const record: CallRecord = {
            call_sid: update.callSid,
            to: update.to || existing?.to || '',
            status: existing?.status ?? 'completed',
            response: update.response,
            speech_result: update.speechResult,
            updated_at: this.timestamp()
        };
        this.records.set(update.callSid, record);
        return { ...record };
    }

    recordStatus(callSid: string, status: string): CallRecord {
        const existing = this.records.get(callSid);
        const record: CallRecord = existing
            ? { ...existing, status, updated_at: this.timestamp() }
            : {
                call_sid: callSid,
                to: '',
                status,
                response: 'pending',
                speech_result: '',
                updated_at: this.timestamp()
            };
        this.records.set(callSid, record);
        return { ...record };
    }

    get(callSid: string): CallRecord | null {
        const record = this.records.get(callSid);
        return record ? { ...record } : null;
    }
}
