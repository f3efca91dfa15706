// src/core/workflow/RetryPolicy.ts

import { z } from 'zod';
import { CONFIG } from '../../config/config';
import { ErrorFactory, OrchestrationError } from '../errors';

/**
 * Retry/backoff contract attached to every step invocation.
 * Value object: frozen on creation.
 */
export interface RetryPolicy {
    readonly maximumAttempts: number;
    readonly initialIntervalMs: number;
    readonly backoffCoefficient: number;
    /** Upper bound for a single backoff delay */
    readonly maximumIntervalMs: number;
    /** Error names that fail the step at once, without further attempts */
    readonly nonRetryableErrorNames: readonly string[];
}

const RetryPolicySchema = z.object({
    maximumAttempts: z.number().int().min(1),
    initialIntervalMs: z.number().min(0),
    backoffCoefficient: z.number().min(1),
    maximumIntervalMs: z.number().min(0),
    nonRetryableErrorNames: z.array(z.string().min(1)),
}).refine(policy => policy.maximumIntervalMs >= policy.initialIntervalMs, {
    message: 'maximumIntervalMs must not be smaller than initialIntervalMs',
});

/**
 * The default policy expressed in time units: 5 attempts, first delay 1 unit,
 * doubling each time, capped at 100 units.
 */
export function defaultRetryPolicy(timeUnitMs: number = CONFIG.TIMEOUTS.TIME_UNIT_MS): RetryPolicy {
    return createRetryPolicy({
        maximumAttempts: CONFIG.RETRY.MAXIMUM_ATTEMPTS,
        initialIntervalMs: CONFIG.RETRY.INITIAL_INTERVAL_UNITS * timeUnitMs,
        backoffCoefficient: CONFIG.RETRY.BACKOFF_COEFFICIENT,
        maximumIntervalMs: CONFIG.RETRY.MAXIMUM_INTERVAL_UNITS * timeUnitMs,
    });
}

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
    const initialIntervalMs = overrides.initialIntervalMs ?? CONFIG.RETRY.INITIAL_INTERVAL_UNITS * CONFIG.TIMEOUTS.TIME_UNIT_MS;
    const candidate = {
        maximumAttempts: overrides.maximumAttempts ?? CONFIG.RETRY.MAXIMUM_ATTEMPTS,
        initialIntervalMs,
        backoffCoefficient: overrides.backoffCoefficient ?? CONFIG.RETRY.BACKOFF_COEFFICIENT,
        maximumIntervalMs: overrides.maximumIntervalMs ?? initialIntervalMs * CONFIG.RETRY.MAXIMUM_INTERVAL_UNITS,
        nonRetryableErrorNames: [...(overrides.nonRetryableErrorNames ?? [])],
    };

    const parsed = RetryPolicySchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'policy'}: ${i.message}`).join(', ');
        throw ErrorFactory.validation(`Invalid retry policy: ${issues}`, { operation: 'createRetryPolicy' });
    }

    return Object.freeze({
        ...parsed.data,
        nonRetryableErrorNames: Object.freeze(parsed.data.nonRetryableErrorNames),
    });
}

/**
 * Delay before the attempt that follows failed attempt `failedAttempt` (1-based).
 * With the default policy: 1 -> 1 unit, 2 -> 2, 3 -> 4, 4 -> 8.
 */
export function computeRetryDelay(policy: RetryPolicy, failedAttempt: number): number {
    const raw = policy.initialIntervalMs * Math.pow(policy.backoffCoefficient, Math.max(0, failedAttempt - 1));
    return Math.min(raw, policy.maximumIntervalMs);
}

/**
 * Every delay the policy would wait through if all attempts failed.
 */
export function retrySchedule(policy: RetryPolicy): number[] {
    return Array.from({ length: policy.maximumAttempts - 1 }, (_, i) => computeRetryDelay(policy, i + 1));
}

export function isRetryableError(policy: RetryPolicy, error: unknown): boolean {
    if (error instanceof OrchestrationError && !error.retryable) return false;
    if (error instanceof Error && policy.nonRetryableErrorNames.includes(error.name)) return false;
    return true;
}
