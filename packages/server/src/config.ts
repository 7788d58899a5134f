import { z } from 'zod';
import { parseAllowedOrigins } from './middleware/Cors.js';

const blank = z.string().trim().default('');

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    GEMINI_API_KEY: blank,
    GEMINI_MODEL: z.string().trim().min(1).default('gemini-2.5-flash'),
    GEMINI_API_BASE: z.string().trim().url().default('https://generativelanguage.googleapis.com'),
    ALLOWED_ORIGINS: z.string().default('*'),
    REQUEST_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(20),
    PUBLIC_BASE_URL: blank,
    TWILIO_ACCOUNT_SID: blank,
    TWILIO_AUTH_TOKEN: blank,
    TWILIO_VOICE_FROM_NUMBER: blank
});

export interface AppConfig {
    port: number;
    requestTimeoutMs: number;
    allowedOrigins: string[];
    gemini: {
        apiKey: string;
        apiBase: string;
        model: string;
    };
    voice: {
        publicBaseUrl: string;
        accountSid: string;
        authToken: string;
        fromNumber: string;
    };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration - ${details}`);
    }

    const values = parsed.data;
    return {
        port: values.PORT,
        requestTimeoutMs: values.REQUEST_TIMEOUT_SECONDS * 1000,
        allowedOrigins: parseAllowedOrigins(values.ALLOWED_ORIGINS),
        gemini: {
            apiKey: values.GEMINI_API_KEY,
            apiBase: values.GEMINI_API_BASE.replace(/\/+$/, ''),
            model: values.GEMINI_MODEL
        },
        voice: {
            publicBaseUrl: values.PUBLIC_BASE_URL.replace(/\/+$/, ''),
            accountSid: values.TWILIO_ACCOUNT_SID,
            authToken: values.TWILIO_AUTH_TOKEN,
            fromNumber: values.TWILIO_VOICE_FROM_NUMBER
        }
    };
}

export function isVoiceConfigured(voice: AppConfig['voice']): boolean {
    return Boolean(voice.publicBaseUrl && voice.accountSid && voice.authToken && voice.fromNumber);
}
