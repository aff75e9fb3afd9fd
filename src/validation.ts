import type { z } from 'zod';

/**
 * Formats zod issues as `path: message, path: message`.
 */
export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join(', ');
}

/**
 * Safely truncates a string for logging/error messages.
 */
export function truncate(str: string, maxLength: number = 200): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength) + `... (${str.length - maxLength} more chars)`;
}
