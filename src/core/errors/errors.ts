// src/core/errors/errors.ts

import { OrchestrationError } from './OrchestrationError';
import { ErrorContext } from './ErrorContext';

/**
 * Thrown when an order request or step input fails validation.
 * Never retried: the same input fails the same way.
 */
export class ValidationError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'VALIDATION_ERROR',
            component: 'CORE_VALIDATION',
            retryable: false,
            ...context
        });
        this.name = 'ValidationError';
    }
}

/**
 * Thrown when a referenced workflow instance does not exist.
 */
export class NotFoundError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'NOT_FOUND',
            component: 'WORKFLOW_HOST',
            retryable: false,
            ...context
        });
        this.name = 'NotFoundError';
    }
}

/**
 * Thrown when a start request reuses an order id that already has an instance.
 */
export class DuplicateWorkflowError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'WORKFLOW_ALREADY_STARTED',
            component: 'WORKFLOW_HOST',
            retryable: false,
            ...context
        });
        this.name = 'DuplicateWorkflowError';
    }
}

/**
 * Thrown by a step service when its downstream dependency misbehaves.
 */
export class ExternalServiceError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'SERVICE_ERROR',
            component: 'STEP_SERVICE',
            retryable: true,
            ...context
        });
        this.name = 'ExternalServiceError';
    }
}

/**
 * A single step attempt ran past its start-to-close timeout.
 */
export class StepTimeoutError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'STEP_TIMEOUT',
            component: 'STEP_DISPATCHER',
            retryable: true,
            ...context
        });
        this.name = 'StepTimeoutError';
    }
}

/**
 * A step failed for good: attempts exhausted or the failure was non-retryable.
 */
export class StepFailureError extends OrchestrationError {
    public readonly step: string;
    public readonly attempts: number;

    constructor(step: string, attempts: number, message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'STEP_FAILED',
            component: 'STEP_DISPATCHER',
            retryable: false,
            ...context
        });
        this.name = 'StepFailureError';
        this.step = step;
        this.attempts = attempts;
    }
}

/**
 * An event does not fit the order state machine in its current phase.
 */
export class InvalidTransitionError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'INVALID_TRANSITION',
            component: 'ORDER_MACHINE',
            retryable: false,
            ...context
        });
        this.name = 'InvalidTransitionError';
    }
}

/**
 * Replaying recorded history produced a different decision than the one recorded.
 */
export class NonDeterminismError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'NON_DETERMINISM',
            component: 'WORKFLOW_REPLAY',
            retryable: false,
            suggestion: 'Inspect the recorded history; the instance is left open for manual review',
            ...context
        });
        this.name = 'NonDeterminismError';
    }
}

/**
 * Thrown for checkpoint store operations.
 */
export class PersistenceError extends OrchestrationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'PERSISTENCE_ERROR',
            component: 'INFRA_DB',
            ...context
        });
        this.name = 'PersistenceError';
    }
}
