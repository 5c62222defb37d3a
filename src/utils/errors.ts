// Application error types - every error carries a machine readable code

export interface AppErrorOptions {
    code: string;
    status: number;
    details?: Record<string, unknown>;
    cause?: unknown;
}

export class AppError extends Error {
    public readonly code: string;
    public readonly status: number;
    public readonly details?: Record<string, unknown>;

    constructor(message: string, options: AppErrorOptions) {
        super(message, { cause: options.cause });
        this.name = 'AppError';
        this.code = options.code;
        this.status = options.status;
        this.details = options.details;
    }
}

export class ValidationError extends AppError {
    constructor(message: string, code = 'VALIDATION_ERROR', details?: Record<string, unknown>) {
        super(message, { code, status: 400, details });
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string, code = 'NOT_FOUND') {
        super(message, { code, status: 404 });
        this.name = 'NotFoundError';
    }
}

/**
 * Fatal at startup or reload. The coordinator also raises it (code NO_ENGINES)
 * when a request resolves to no enabled source at all.
 */
export class ConfigurationError extends AppError {
    constructor(message: string, code = 'CONFIGURATION_ERROR', cause?: unknown) {
        super(message, { code, status: 400, cause });
        this.name = 'ConfigurationError';
    }
}

export type SourceFailureKind = 'timeout' | 'network' | 'http' | 'decode' | 'aborted';

export class SourceFetchError extends Error {
    public readonly source: string;
    public readonly kind: SourceFailureKind;
    public readonly status: number | null;

    constructor(
        message: string,
        options: { source: string; kind: SourceFailureKind; status?: number | null; cause?: unknown },
    ) {
        super(message, { cause: options.cause });
        this.name = 'SourceFetchError';
        this.source = options.source;
        this.kind = options.kind;
        this.status = options.status ?? null;
    }

    /** Whether a retry could plausibly succeed. */
    get retryable(): boolean {
        if (this.kind === 'network') return true;
        if (this.kind === 'http' && this.status !== null) {
            return this.status === 429 || this.status >= 500;
        }
        return false;
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
