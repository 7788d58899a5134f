import type { Response } from 'express';
import type { ErrorEnvelope } from '@medicare/shared';
import type { ZodTypeAny, z } from 'zod';

export function describeIssues(error: z.ZodError): string {
    const [first] = error.issues;
    if (!first) {
        return 'Invalid request body';
    }
    return first.path.length > 0 ? `${first.path.join('.')}: ${first.message}` : first.message;
}

/** Parses a request body, answering 400 and returning null when it does not match. */
export function parseBody<TSchema extends ZodTypeAny>(
    schema: TSchema,
    body: unknown,
    res: Response<ErrorEnvelope>
): z.output<TSchema> | null {
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
        res.status(400).json({ ok: false, error: describeIssues(parsed.error) });
        return null;
    }
    return parsed.data;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
