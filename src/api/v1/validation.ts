// src/api/v1/validation.ts
import { z } from 'zod';
import { RequestValidationError } from '../../types/legacySystem.types';

/**
 * Parses `value` with `schema`, throwing a 400 `RequestValidationError` listing every issue.
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
        throw new RequestValidationError(issues);
    }
    return parsed.data;
}
