import axios from 'axios';
import { ZodError } from 'zod';

/**
 * Flattens whatever an API call threw into a single line for logs and
 * status output. HTTP failures carry the status code and the body the
 * service sent back.
 */
export function describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const body = error.response?.data;
        const detail = typeof body === 'string'
            ? body
            : body && typeof body === 'object'
                ? JSON.stringify(body)
                : '';
        if (status) {
            return detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}: ${error.message}`;
        }
        return error.message;
    }
    if (error instanceof ZodError) {
        return error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
