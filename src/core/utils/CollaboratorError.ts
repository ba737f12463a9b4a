/**
 * Failure categories of the external services the player talks to.
 */
export type CollaboratorErrorKind = 'auth' | 'network' | 'not-found' | 'malformed';

export class CollaboratorError extends Error {
    public readonly kind: CollaboratorErrorKind;

    constructor(kind: CollaboratorErrorKind, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'CollaboratorError';
        this.kind = kind;
    }
}

/**
 * Text for the diagnostic log. Never shown to the user.
 */
export function describeError(error: unknown): string {
    if (error instanceof CollaboratorError) return `${error.kind}: ${error.message}`;
    if (error instanceof Error) return error.message;
    return String(error);
}

export function isAbortError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}
