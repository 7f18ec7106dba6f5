export enum SessionErrorType {
    CACHE_WRITE_FAILED = 'CACHE_WRITE_FAILED',
    TOO_MANY_REDIRECTS = 'TOO_MANY_REDIRECTS',
    SESSION_CLOSED = 'SESSION_CLOSED',
    INVALID_URL = 'INVALID_URL',
    INVALID_OPTION = 'INVALID_OPTION',
}

/**
 * Raised by the session for failures the caller must see. The underlying
 * error, when there is one, is kept as `cause`.
 */
export class SessionError extends Error {
    constructor(
        public readonly type: SessionErrorType,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'SessionError';
    }
}
