// src/errors.ts

/**
 * Base error for anything the scheduling API reports to a caller
 *
 * statusCode is the HTTP status the error middleware answers with.
 */
export class SchedulingError extends Error {
    readonly statusCode: number;

    constructor(message: string, statusCode = 500, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SchedulingError';
        this.statusCode = statusCode;
    }
}

/**
 * Request body has the wrong shape - nothing was extracted
 */
export class RequestValidationError extends SchedulingError {
    constructor(message: string) {
        super(message, 400);
        this.name = 'RequestValidationError';
    }
}

/**
 * A message could not be turned into a participant schedule
 *
 * Fatal for the whole batch.
 */
export class ExtractionError extends SchedulingError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 500, options);
        this.name = 'ExtractionError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
