import type { NextFunction, Request, RequestHandler, Response } from 'express';

export const ANY_ORIGIN = '*';

const DEFAULT_ALLOWED_METHODS = 'GET, POST, OPTIONS';
const DEFAULT_ALLOWED_HEADERS = 'Content-Type, Authorization';

/** Comma-separated origins; blank or `*` allows every origin. */
export function parseAllowedOrigins(raw: string): string[] {
    const trimmed = raw.trim();
    if (!trimmed || trimmed === ANY_ORIGIN) {
        return [ANY_ORIGIN];
    }
    return trimmed.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

export function createCorsMiddleware(allowedOrigins: readonly string[]): RequestHandler {
    const allowAny = allowedOrigins.includes(ANY_ORIGIN);

    return (req: Request, res: Response, next: NextFunction) => {
        const origin = req.header('Origin');

        if (allowAny) {
            res.header('Access-Control-Allow-Origin', ANY_ORIGIN);
        } else {
            res.vary('Origin');
            if (origin && allowedOrigins.includes(origin)) {
                res.header('Access-Control-Allow-Origin', origin);
                res.header('Access-Control-Allow-Credentials', 'true');
            }
        }

        if (req.method === 'OPTIONS') {
            res.header('Access-Control-Allow-Methods', req.header('Access-Control-Request-Method') ?? DEFAULT_ALLOWED_METHODS);
            res.header('Access-Control-Allow-Headers', req.header('Access-Control-Request-Headers') ?? DEFAULT_ALLOWED_HEADERS);
            res.sendStatus(200);
            return;
        }
        next();
    };
}
