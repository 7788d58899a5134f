import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import {
    ReminderCallRequestSchema,
    type CallRecord,
    type ErrorEnvelope,
    type PlacedCall
} from '@medicare/shared';
import { classifyReminderResponse, type VoiceReminderService } from '../services/VoiceReminderService.js';
import type { VoiceController } from '../controllers/VoiceController.js';
import { errorMessage, parseBody } from './validation.js';

const webhookField = z.unknown().transform((value) => (typeof value === 'string' ? value.trim() : ''));

const GatherWebhookSchema = z.object({
    CallSid: webhookField,
    SpeechResult: webhookField,
    Digits: webhookField,
    To: webhookField
});

const StatusWebhookSchema = z.object({
    CallSid: webhookField,
    CallStatus: webhookField
});

function queryValue(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

export function createVoiceRouter(voiceService: VoiceReminderService, voiceController: VoiceController): Router {
    const router = Router();

    router.post('/voice/reminder/call', async (req: Request, res: Response<{ ok: true; data: PlacedCall } | ErrorEnvelope>) => {
        const request = parseBody(ReminderCallRequestSchema, req.body, res);
        if (!request) return;

        try {
            const data = await voiceService.placeCall(request);
            res.json({ ok: true, data });
        } catch (error) {
            console.error('[VoiceRoutes] Error placing reminder call:', error);
            res.status(500).json({ ok: false, error: `Voice call failed: ${errorMessage(error)}` });
        }
    });

    router.post('/voice/twiml', (req, res) => {
        try {
            const twiml = voiceController.generateReminderTwiml({
                patient_name: queryValue(req.query.patient_name),
                caregiver_name: queryValue(req.query.caregiver_name),
                medicine_name: queryValue(req.query.medicine_name),
                dosage: queryValue(req.query.dosage),
                scheduled_time: queryValue(req.query.scheduled_time),
                date_key: queryValue(req.query.date_key),
                mode: queryValue(req.query.mode)
            });
            res.type('application/xml').send(twiml);
        } catch (error) {
            console.error('[VoiceRoutes] Error generating TwiML:', error);
            res.status(500).type('application/xml').send(voiceController.generateErrorTwiml());
        }
    });

    router.post('/voice/gather', (req, res) => {
        const form = parseBody(GatherWebhookSchema, req.body, res);
        if (!form) return;
        const outcome = classifyReminderResponse(form.SpeechResult, form.Digits);

        if (form.CallSid) {
            voiceService.recordResponse(form.CallSid, form.To, outcome, form.SpeechResult);
        }

        res.type('application/xml').send(voiceController.generateGatherTwiml(outcome));
    });

    router.post('/voice/status', (req, res) => {
        const form = parseBody(StatusWebhookSchema, req.body, res);
        if (!form) return;
        if (form.CallSid) {
            voiceService.recordStatus(form.CallSid, form.CallStatus || 'unknown');
        }
        res.type('text/plain').send('ok');
    });

    router.get('/voice/reminder/result/:callSid', (req: Request<{ callSid: string }>, res: Response<{ ok: true; data: CallRecord } | ErrorEnvelope>) => {
        const data = voiceService.getResult(req.params.callSid.trim());
        if (!data) {
            res.status(404).json({ ok: false, error: 'Call result not found' });
            return;
        }
        res.json({ ok: true, data });
    });

    return router;
}
