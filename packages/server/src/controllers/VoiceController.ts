import Twilio from 'twilio';
import type { CallResponse, ReminderMode } from '@medicare/shared';
import type { VoiceReminderService } from '../services/VoiceReminderService.js';

const SAY_OPTIONS = { voice: 'alice', language: 'en-IN' } as const;
const GATHER_TIMEOUT_SECONDS = 60;

export interface ReminderDisplay {
    patient_name: string;
    caregiver_name: string;
    medicine_name: string;
    dosage: string;
    scheduled_time: string;
    date_key: string;
    mode: ReminderMode;
}

type ReminderQuery = Partial<Record<keyof ReminderDisplay, string>>;

function orDefault(value: string | undefined, fallback: string): string {
    const trimmed = value?.trim();
    return trimmed ? trimmed : fallback;
}

export function toReminderDisplay(query: ReminderQuery): ReminderDisplay {
    return {
        patient_name: orDefault(query.patient_name, 'patient'),
        caregiver_name: orDefault(query.caregiver_name, 'caregiver'),
        medicine_name: orDefault(query.medicine_name, 'medicine'),
        dosage: orDefault(query.dosage, 'as prescribed'),
        scheduled_time: orDefault(query.scheduled_time, 'now'),
        date_key: orDefault(query.date_key, 'today'),
        mode: query.mode === 'self_patient' ? 'self_patient' : 'caregiver_patient'
    };
}

export function reminderIntro(display: ReminderDisplay): string {
    const dose = `${display.medicine_name}, ${display.dosage}, at ${display.scheduled_time} on ${display.date_key}.`;
    if (display.mode === 'self_patient') {
        return `This is an automated medicine reminder. It is time to take ${dose}`;
    }
    return `This is an automated call set by ${display.caregiver_name}. ` +
        `Hello ${display.patient_name}, it is time to take ${dose}`;
}

export class VoiceController {
    private voiceService: VoiceReminderService;

    constructor(voiceService: VoiceReminderService) {
        this.voiceService = voiceService;
    }

    generateReminderTwiml(query: ReminderQuery): string {
        const display = toReminderDisplay(query);
        const response = new Twilio.twiml.VoiceResponse();

        const gather = response.gather({
            input: ['speech', 'dtmf'],
            timeout: GATHER_TIMEOUT_SECONDS,
            speechTimeout: 'auto',
            action: this.voiceService.gatherUrl({
                patient_name: display.patient_name,
                medicine_name: display.medicine_name,
                scheduled_time: display.scheduled_time,
                date_key: display.date_key
            }),
            method: 'POST'
        });
        gather.say(SAY_OPTIONS, reminderIntro(display));
        gather.pause({ length: 1 });
        gather.say(
            SAY_OPTIONS,
            'Please say yes if you took your medicine. ' +
            'If you do not respond within one minute, this dose will be marked as missed.'
        );

        response.say(SAY_OPTIONS, 'No response received. This reminder is marked as missed. Take care.');
        response.hangup();
        return response.toString();
    }

    generateGatherTwiml(outcome: CallResponse): string {
        const response = new Twilio.twiml.VoiceResponse();
        if (outcome === 'taken') {
            response.say(SAY_OPTIONS, 'Thank you. Your response has been recorded as taken. Stay healthy.');
        } else {
            response.say(SAY_OPTIONS, 'No valid yes response detected. This reminder is marked as missed.');
            response.pause({ length: 1 });
            response.say(SAY_OPTIONS, 'Please take your medicine as soon as possible or contact your caregiver.');
        }
        response.hangup();
        return response.toString();
    }

    generateErrorTwiml(): string {
        const response = new Twilio.twiml.VoiceResponse();
        response.say(SAY_OPTIONS, "I'm sorry, there was a technical issue. Please try again later.");
        response.hangup();
        return response.toString();
    }
}
