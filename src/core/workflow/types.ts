// src/core/workflow/types.ts

import { ExecutionCheckpoint, OrderEvent, StepInputs, StepName } from '../orders/types';
import { RetryPolicy } from './RetryPolicy';

/**
 * Per-attempt context handed to a step executor.
 * `signal` aborts when the attempt exceeds its start-to-close timeout.
 */
export interface StepContext {
    readonly attempt: number;
    readonly signal: AbortSignal;
}

export type StepExecutor<TInput> = (input: TInput, context: StepContext) => Promise<unknown>;

export type StepExecutors = {
    readonly [S in StepName]: StepExecutor<StepInputs[S]>;
};

export interface AttemptFailure {
    readonly step: StepName;
    readonly attempt: number;
    readonly errorName: string;
    readonly message: string;
    readonly nextDelayMs: number;
}

/**
 * Options attached to one step invocation.
 */
export interface StepInvocationOptions {
    readonly retryPolicy: RetryPolicy;
    readonly timeoutMs: number;
    /** First attempt number to run; > 1 when resuming after a restart */
    readonly startAttempt?: number;
    /** Called before backing off so the failed attempt is checkpointed */
    readonly onAttemptFailed?: (failure: AttemptFailure) => Promise<void>;
}

/**
 * Primitives the host offers to a running instance.
 */
export interface WorkflowContext {
    readonly workflowId: string;

    /**
     * Suspends the instance until the step succeeds, or rejects with
     * StepFailureError once its retry policy gives up.
     */
    dispatchStep<S extends StepName>(step: S, input: StepInputs[S], options: StepInvocationOptions): Promise<void>;

    /**
     * Runs `operation` with exclusive access to the instance state.
     * Step continuations and signals for one instance never interleave.
     */
    exclusive<T>(operation: () => Promise<T>): Promise<T>;

    /** Appends an event to the durable history together with the new checkpoint */
    record(event: OrderEvent, checkpoint: ExecutionCheckpoint): Promise<void>;
}

export type Sleeper = (ms: number) => Promise<void>;
