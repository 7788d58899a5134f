import { Router, type Request, type Response } from 'express';

export const SERVICE_NAME = 'medicare-assistant';

export function StatusRouter(voiceConfigured: boolean, llmConfigured: boolean): Router {
    const router = Router();

    router.get('/health', (req: Request, res: Response) => {
        res.status(200).json({
            ok: true,
            service: SERVICE_NAME,
            llm_configured: llmConfigured,
            voice_configured: voiceConfigured,
            timestamp: new Date().toISOString()
        });
    });

    return router;
}
