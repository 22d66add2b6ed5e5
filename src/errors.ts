/**
 * Base class for every error raised by a BOSH session.
 */
export class BoshError extends Error {
    public readonly cause?: unknown;
    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = "BoshError";
        this.cause = cause;
    }
}

/**
 * Thrown by `connect` when the session could not be started, either because
 * the options were unusable or the parser could not be allocated.
 */
export class StartupError extends BoshError {
    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = "StartupError";
    }
}

/**
 * An HTTP request to the BOSH endpoint failed, or the endpoint answered with
 * a non-2xx status.
 */
export class TransportError extends BoshError {
    public readonly status?: number;
    constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, options.cause);
        this.name = "TransportError";
        this.status = options.status;
    }
}

/**
 * A reply from the endpoint was not a complete, well-formed `<body/>`.
 */
export class BodyParseError extends BoshError {
    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = "BodyParseError";
    }
}

export class SessionStoppedError extends BoshError {
    constructor(message = "The BOSH session has stopped") {
        super(message);
        this.name = "SessionStoppedError";
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
