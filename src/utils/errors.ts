
export class ReconcilerError extends Error {
    /** Remote system the error came from, when there was one */
    readonly service?: string;
    readonly context?: Record<string, unknown>;
    /** A later run may succeed without anyone changing data or settings */
    readonly isRecoverable: boolean;

    constructor(
        message: string,
        options: {
            service?: string;
            context?: Record<string, unknown>;
            isRecoverable?: boolean;
            cause?: unknown;
        } = {}
    ) {
        super(message, { cause: options.cause });
        this.name = 'ReconcilerError';
        this.service = options.service;
        this.context = options.context;
        this.isRecoverable = options.isRecoverable ?? false;
    }
}


/**
 * A remote endpoint could not be reached, timed out, or answered with a
 * non-2xx status. `status` is the remote HTTP status when there was one.
 */
export class ExternalAPIError extends ReconcilerError {
    readonly status?: number;
    readonly responseBody?: string;

    constructor(
        service: string,
        message: string,
        options: {
            status?: number;
            responseBody?: string;
            context?: Record<string, unknown>;
            cause?: unknown;
        } = {}
    ) {
        super(`${service}: ${message}`, {
            service,
            isRecoverable: true,
            context: options.status ? { status: options.status, ...options.context } : options.context,
            cause: options.cause,
        });
        this.name = 'ExternalAPIError';
        this.status = options.status;
        this.responseBody = options.responseBody;
    }
}


export class ResponseParseError extends ReconcilerError {
    constructor(
        service: string,
        message: string,
        options: {
            context?: Record<string, unknown>;
            cause?: unknown;
        } = {}
    ) {
        super(`${service}: ${message}`, {
            service,
            isRecoverable: false,
            ...options,
        });
        this.name = 'ResponseParseError';
    }
}


/** The remote system accepted the request but refused the change. */
export class BusinessRejectionError extends ReconcilerError {
    constructor(service: string, reasons: string[]) {
        super(`${service} rejected the change: ${reasons.join('; ')}`, {
            service,
            isRecoverable: false,
            context: { reasons },
        });
        this.name = 'BusinessRejectionError';
    }
}


export class ConfigurationError extends ReconcilerError {
    readonly variables: string[];

    constructor(message: string, variables: string[] = []) {
        super(message, {
            isRecoverable: false,
            context: variables.length ? { variables } : undefined,
        });
        this.name = 'ConfigurationError';
        this.variables = variables;
    }
}


/** Message text of any thrown value. */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
}
