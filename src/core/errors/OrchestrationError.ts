// src/core/errors/OrchestrationError.ts

import { ErrorContext } from './ErrorContext';

export interface SerializedError {
    name: string;
    message: string;
    timestamp: number;
    context: ErrorContext;
    stack?: string;
}

/**
 * Base error class for all orchestrator errors.
 * Provides structured metadata and user-friendly formatting.
 */
export class OrchestrationError extends Error {
    public readonly context: ErrorContext;
    public readonly timestamp: number;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'OrchestrationError';
        this.context = context;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Whether a step dispatcher may try the failed operation again.
     */
    public get retryable(): boolean {
        return this.context.retryable !== false;
    }

    /**
     * Converts the error to a plain object for JSON serialization.
     */
    public toJSON(): SerializedError {
        return {
            name: this.name,
            message: this.message,
            timestamp: this.timestamp,
            context: this.context,
            stack: process.env.NODE_ENV === 'development' ? this.stack : undefined
        };
    }

    /**
     * Formats a message suitable for callers of the tool interface.
     */
    public toUserFriendly(): string {
        let msg = `[${this.context.code || 'ERROR'}] ${this.message}`;
        if (this.context.suggestion) {
            msg += `\nTip: ${this.context.suggestion}`;
        }
        return msg;
    }
}
