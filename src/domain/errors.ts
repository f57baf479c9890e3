/**
 * Base class for every failure a wrapper reports. `code` names the category
 * in logs; the message is what ends up in the result JSON.
 */
export class GenerationError extends Error {
    constructor(
        public readonly code: string,
        message: string,
        public readonly details?: string
    ) {
        super(message);
        this.name = 'GenerationError';
    }
}

/**
 * A required request field is absent or empty.
 */
export class MissingFieldError extends GenerationError {
    constructor(public readonly field: string) {
        super('MISSING_FIELD', `No ${field} provided`);
        this.name = 'MissingFieldError';
    }
}

/**
 * The request could not be decoded (bad JSON, wrong field type, unknown mode).
 */
export class InvalidInputError extends GenerationError {
    constructor(message: string) {
        super('INVALID_INPUT', message);
        this.name = 'InvalidInputError';
    }
}

export class MissingCredentialError extends GenerationError {
    constructor(public readonly envVar: string) {
        super('MISSING_CREDENTIAL', `${envVar} environment variable is not set`);
        this.name = 'MissingCredentialError';
    }
}

/**
 * An optional client library could not be loaded.
 */
export class DependencyError extends GenerationError {
    constructor(message: string) {
        super('MISSING_DEPENDENCY', message);
        this.name = 'DependencyError';
    }
}

/**
 * A vendor API answered with an error, or did not answer at all.
 */
export class UpstreamError extends GenerationError {
    constructor(
        public readonly service: string,
        message: string,
        public readonly statusCode?: number,
        details?: string
    ) {
        super('UPSTREAM_ERROR', message, details);
        this.name = 'UpstreamError';
    }
}

/**
 * A vendor response lacked a field we need, usually the result URL.
 */
export class MissingResultError extends GenerationError {
    constructor(message: string, details?: string) {
        super('MISSING_RESULT', message, details);
        this.name = 'MissingResultError';
    }
}

/**
 * The remote job reached its `failed` state.
 */
export class JobFailedError extends GenerationError {
    constructor(public readonly jobId: string, reason: string) {
        super('JOB_FAILED', `Video generation failed: ${reason}`);
        this.name = 'JobFailedError';
    }
}

/**
 * The polling budget ran out before the job reached a terminal state.
 * Carries what a caller needs to resume checking out-of-band.
 */
export class PollTimeoutError extends GenerationError {
    constructor(
        public readonly jobId: string,
        public readonly elapsedMinutes: number,
        public readonly checkUrl?: string
    ) {
        super('POLL_TIMEOUT', `Video generation timed out after ${elapsedMinutes} minutes`);
        this.name = 'PollTimeoutError';
    }
}

export class DownloadError extends GenerationError {
    constructor(public readonly url: string, reason: string) {
        super('DOWNLOAD_FAILED', `Failed to download ${url}: ${reason}`);
        this.name = 'DownloadError';
    }
}
