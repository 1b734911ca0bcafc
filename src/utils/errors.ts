/**
 * Unrecoverable startup problem: missing or unreadable input, bad arguments,
 * invalid config. The CLI reports the message and exits with status 1.
 */
export class InputError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'InputError';
    }
}
