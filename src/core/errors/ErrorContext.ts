// src/core/errors/ErrorContext.ts

/**
 * Metadata provided with an error to help with debugging and retry decisions.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'STEP_FAILED')
    operation?: string;      // The function or process that failed
    suggestion?: string;     // Helpful tip for the caller or operator
    component?: string;      // The layer where the error occurred
    retryable?: boolean;     // false stops the step dispatcher from retrying
    details?: unknown;       // Original error or additional technical context
}
