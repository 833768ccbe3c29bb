// src/utils/errorUtils.ts

/**
 * Normalizes any thrown value into a message and an optional stack.
 * Strings and plain objects with a `message` are accepted as well as `Error` instances.
 */
export function getErrorMessageAndStack(error: unknown): { message: string; stack?: string } {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    if (typeof error === 'object' && error !== null && 'message' in error) {
        if (typeof error.message === 'string') {
            return { message: error.message };
        }
    }
    try {
        return { message: JSON.stringify(error) ?? String(error) };
    } catch {
        return { message: String(error) };
    }
}
