// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ErrorContext } from './ErrorContext';

/**
 * Factory class to create consistent error instances across the application.
 */
export class ErrorFactory {
    static validation(message: string, context?: ErrorContext) {
        return new Errors.ValidationError(message, context);
    }

    static notFound(message: string, context?: ErrorContext) {
        return new Errors.NotFoundError(message, context);
    }

    static duplicate(message: string, context?: ErrorContext) {
        return new Errors.DuplicateWorkflowError(message, context);
    }

    static external(message: string, context?: ErrorContext) {
        return new Errors.ExternalServiceError(message, context);
    }

    static timeout(message: string, context?: ErrorContext) {
        return new Errors.StepTimeoutError(message, context);
    }

    static stepFailure(step: string, attempts: number, message: string, context?: ErrorContext) {
        return new Errors.StepFailureError(step, attempts, message, context);
    }

    static invalidTransition(message: string, context?: ErrorContext) {
        return new Errors.InvalidTransitionError(message, context);
    }

    static nonDeterminism(message: string, context?: ErrorContext) {
        return new Errors.NonDeterminismError(message, context);
    }

    static persistence(message: string, context?: ErrorContext) {
        return new Errors.PersistenceError(message, context);
    }
}

/**
 * Best-effort message extraction for values thrown by step executors.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
