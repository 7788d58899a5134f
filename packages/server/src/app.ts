import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { CallResultStore, GeminiClient, TwilioClient, type CallPlacer, type ContentGenerator } from '@medicare/shared';
import { isVoiceConfigured, type AppConfig } from './config.js';
import { SideEffectAnalyzer } from './services/SideEffectAnalyzer.js';
import { MedicalChatAssistant } from './services/MedicalChatAssistant.js';
import { VoiceReminderService } from './services/VoiceReminderService.js';
import { VoiceController } from './controllers/VoiceController.js';
import { createAnalysisRouter } from './routes/AnalysisRoutes.js';
import { createVoiceRouter } from './routes/VoiceRoutes.js';
import { StatusRouter } from './routes/StatusRoute.js';
import { createCorsMiddleware } from './middleware/Cors.js';

export const API_PREFIX = '/api/v1';

/** Base64 prescription images can reach six million characters. */
const JSON_BODY_LIMIT = '10mb';

export interface AppDependencies {
    generator: ContentGenerator | null;
    callPlacer: CallPlacer | null;
    callStore: CallResultStore;
    publicBaseUrl: string;
    allowedOrigins: string[];
}

export function createDependencies(config: AppConfig): AppDependencies {
    const generator = config.gemini.apiKey
        ? new GeminiClient({ ...config.gemini, timeoutMs: config.requestTimeoutMs })
        : null;

    const callPlacer = isVoiceConfigured(config.voice)
        ? new TwilioClient({
            accountSid: config.voice.accountSid,
            authToken: config.voice.authToken,
            fromNumber: config.voice.fromNumber,
            timeoutMs: config.requestTimeoutMs
        })
        : null;

    return {
        generator,
        callPlacer,
        callStore: new CallResultStore(),
        publicBaseUrl: config.voice.publicBaseUrl,
        allowedOrigins: config.allowedOrigins
    };
}

/** body-parser rejects malformed and oversized bodies with a 4xx `status`. */
function isClientError(error: unknown): error is Error & { status: number } {
    return error instanceof Error
        && 'status' in error
        && typeof error.status === 'number'
        && error.status >= 400
        && error.status < 500;
}

export function createApp(deps: AppDependencies): Express {
    const analyzer = new SideEffectAnalyzer(deps.generator);
    const assistant = new MedicalChatAssistant(deps.generator);
    const voiceService = new VoiceReminderService(deps.callPlacer, deps.callStore, deps.publicBaseUrl);
    const voiceController = new VoiceController(voiceService);

    const app = express();

    app.use(createCorsMiddleware(deps.allowedOrigins));
    app.use(express.urlencoded({ extended: false }));
    app.use(express.json({ limit: JSON_BODY_LIMIT }));
    app.use(StatusRouter(voiceService.isConfigured(), deps.generator !== null));
    app.use(API_PREFIX, createAnalysisRouter(analyzer, assistant));
    app.use(API_PREFIX, createVoiceRouter(voiceService, voiceController));

    app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        if (isClientError(error)) {
            const message = error instanceof SyntaxError ? 'Malformed JSON body' : error.message;
            res.status(error.status).json({ ok: false, error: message });
            return;
        }
        console.error('[App] Unhandled error:', error);
        res.status(500).json({ ok: false, error: 'Internal server error' });
    });

    return app;
}
