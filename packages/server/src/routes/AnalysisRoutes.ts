import { Router, type Request, type Response } from 'express';
import {
    ChatRequestSchema,
    SymptomReportSchema,
    toEnvelope,
    type AnalysisEnvelope,
    type ChatResult,
    type ErrorEnvelope,
    type TriageResult
} from '@medicare/shared';
import type { SideEffectAnalyzer } from '../services/SideEffectAnalyzer.js';
import type { MedicalChatAssistant } from '../services/MedicalChatAssistant.js';
import { errorMessage, parseBody } from './validation.js';

export function createAnalysisRouter(analyzer: SideEffectAnalyzer, assistant: MedicalChatAssistant): Router {
    const router = Router();

    router.post('/side-effects/analyze', async (req: Request, res: Response<AnalysisEnvelope<TriageResult> | ErrorEnvelope>) => {
        const report = parseBody(SymptomReportSchema, req.body, res);
        if (!report) return;

        try {
            const output = await analyzer.analyze(report);
            res.json(toEnvelope(output));
        } catch (error) {
            console.error('[AnalysisRoutes] Error analyzing side effects:', error);
            res.status(500).json({ ok: false, error: `Analysis failed: ${errorMessage(error)}` });
        }
    });

    router.post('/assistant/chat', async (req: Request, res: Response<AnalysisEnvelope<ChatResult> | ErrorEnvelope>) => {
        const request = parseBody(ChatRequestSchema, req.body, res);
        if (!request) return;

        if (request.ai_consent !== true) {
            res.status(400).json({ ok: false, error: 'AI consent required for assistant processing.' });
            return;
        }

        try {
            const { ai_consent: _consent, ...turn } = request;
            const output = await assistant.chat(turn);
            res.json(toEnvelope(output));
        } catch (error) {
            console.error('[AnalysisRoutes] Error in assistant chat:', error);
            res.status(500).json({ ok: false, error: `Assistant failed: ${errorMessage(error)}` });
        }
    });

    return router;
}
