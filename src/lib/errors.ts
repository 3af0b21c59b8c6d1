// src/lib/errors.ts

/**
 * Error taxonomy for the clinic engine.
 * Messages carry ids only, never patient details, so they are safe to return to API callers.
 */

export interface SafeErrorDetails {
    code: string;
    message: string;
    statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(message: string, code: string, statusCode = 500, isOperational = true) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        Error.captureStackTrace(this, this.constructor);
    }

    toSafeError(): SafeErrorDetails {
        return {
            code: this.code,
            message: this.message,
            statusCode: this.statusCode
        };
    }
}

export class ValidationError extends AppError {
    public readonly details: unknown;

    constructor(message: string, details?: unknown) {
        super(message, 'VALIDATION_ERROR', 400);
        this.name = 'ValidationError';
        this.details = details;
    }
}

/**
 * Unknown patient, doctor, slot or token id
 */
export class NotFoundError extends AppError {
    constructor(resource: string) {
        super(`${resource} not found`, 'NOT_FOUND', 404);
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super(message, 'CONFLICT', 409);
        this.name = 'ConflictError';
    }
}

/**
 * Capacity exhausted. Recoverable: the caller may retry later.
 */
export class NoCapacityError extends AppError {
    constructor(message: string, code = 'NO_CAPACITY') {
        super(message, code, 409);
        this.name = 'NoCapacityError';
    }
}

export class NoFreeSlotError extends NoCapacityError {
    public readonly doctorId: number;

    constructor(doctorId: number) {
        super(`No free slot for doctor ${doctorId}`, 'NO_FREE_SLOT');
        this.name = 'NoFreeSlotError';
        this.doctorId = doctorId;
    }
}

export class QueueFullError extends NoCapacityError {
    public readonly capacity: number;

    constructor(capacity: number) {
        super(`Routine queue is full (capacity ${capacity})`, 'QUEUE_FULL');
        this.name = 'QueueFullError';
        this.capacity = capacity;
    }
}

/**
 * Internal logic defect, e.g. an undo record that cannot be inverted.
 * Not a user error, so it is flagged non-operational.
 */
export class InvalidActionError extends AppError {
    constructor(message: string) {
        super(message, 'INVALID_ACTION', 500, false);
        this.name = 'InvalidActionError';
    }
}
