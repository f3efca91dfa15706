// src/core/workflow/StepDispatcher.ts

import { ErrorFactory, describeError } from '../errors';
import { Logger } from '../logging/Logger';
import { StepInputs, StepName } from '../orders/types';
import { computeRetryDelay, isRetryableError } from './RetryPolicy';
import { defaultSleeper } from './timers';
import { Sleeper, StepExecutor, StepExecutors, StepInvocationOptions } from './types';

/**
 * StepDispatcher
 * Delivers a step to its executor at least once, retrying with exponential
 * backoff until the attempt cap is reached. Each attempt is bounded by the
 * invocation's start-to-close timeout; a timed-out attempt counts as failed.
 */
export class StepDispatcher {
    constructor(
        private readonly executors: StepExecutors,
        private readonly sleep: Sleeper = defaultSleeper
    ) { }

    public async dispatch<S extends StepName>(
        step: S,
        input: StepInputs[S],
        options: StepInvocationOptions
    ): Promise<void> {
        const { retryPolicy, timeoutMs } = options;
        const executor: StepExecutor<StepInputs[S]> = this.executors[step];
        let attempt = Math.min(Math.max(options.startAttempt ?? 1, 1), retryPolicy.maximumAttempts);

        for (; ;) {
            try {
                await this.runAttempt(step, executor, input, attempt, timeoutMs);
                if (attempt > 1) {
                    Logger.info('StepDispatcher', `Step ${step} succeeded on attempt ${attempt}`);
                }
                return;
            } catch (error) {
                const message = describeError(error);
                const retryable = isRetryableError(retryPolicy, error);

                if (!retryable || attempt >= retryPolicy.maximumAttempts) {
                    Logger.warn('StepDispatcher', `Step ${step} giving up after ${attempt} attempt(s)`, {
                        error: message,
                        retryable,
                    });
                    throw ErrorFactory.stepFailure(step, attempt, `Step ${step} failed: ${message}`, {
                        operation: step,
                        details: { attempts: attempt, retryable, cause: message },
                    });
                }

                const nextDelayMs = computeRetryDelay(retryPolicy, attempt);
                Logger.warn('StepDispatcher', `Step ${step} attempt ${attempt} failed, retrying in ${nextDelayMs}ms`, {
                    error: message,
                });

                if (options.onAttemptFailed) {
                    await options.onAttemptFailed({
                        step,
                        attempt,
                        errorName: error instanceof Error ? error.name : 'Error',
                        message,
                        nextDelayMs,
                    });
                }

                await this.sleep(nextDelayMs);
                attempt++;
            }
        }
    }

    private async runAttempt<TInput>(
        step: StepName,
        executor: StepExecutor<TInput>,
        input: TInput,
        attempt: number,
        timeoutMs: number
    ): Promise<void> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = ErrorFactory.timeout(`Step ${step} attempt ${attempt} timed out after ${timeoutMs}ms`, {
                    operation: step,
                });
                controller.abort(error);
                reject(error);
            }, timeoutMs);
        });

        try {
            await Promise.race([executor(input, { attempt, signal: controller.signal }), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }
}
