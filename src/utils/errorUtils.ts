// src/utils/errorUtils.ts

/**
 * Extracts a printable message and stack from any thrown value.
 * Non-Error values are stringified; objects are JSON-encoded when possible.
 *
 * @param {unknown} error - The caught value.
 * @returns {{ message: string; stack?: string }} The message and, for Error instances, the stack.
 */
export const getErrorMessageAndStack = (error: unknown): { message: string; stack?: string } => {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    // Errors raised in another realm (Node internals under Jest) fail `instanceof Error`.
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : undefined;
        return { message: error.message, stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    if (error !== null && typeof error === 'object') {
        try {
            return { message: JSON.stringify(error) };
        } catch {
            return { message: String(error) };
        }
    }
    return { message: String(error) };
};
