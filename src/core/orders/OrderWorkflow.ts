// src/core/orders/OrderWorkflow.ts

import { ErrorFactory, StepFailureError, describeError } from '../errors';
import { Logger } from '../logging/Logger';
import { RetryPolicy } from '../workflow/RetryPolicy';
import { StepInvocationOptions, WorkflowContext } from '../workflow/types';
import { decide, evolve, replayOrderHistory, toCheckpoint, toOrderResult, toStatusSnapshot } from './orderMachine';
import { PricingPolicy } from './pricing';
import {
    ExecutionCheckpoint,
    OrderEvent,
    OrderMachineState,
    OrderRequest,
    OrderResult,
    OrderStatusSnapshot,
    StepName,
} from './types';

export interface OrderWorkflowOptions {
    readonly pricing: PricingPolicy;
    readonly retryPolicy: RetryPolicy;
    readonly stepTimeoutMs: number;
}

/**
 * OrderWorkflow
 * One running order: executes the actions chosen by `decide` and records
 * each outcome as an event. Also serves the `cancel` signal and the `status`
 * query for its instance.
 *
 * Constructing it with a recorded history resumes the order where the history
 * ends; steps already completed are not dispatched again.
 */
export class OrderWorkflow {
    private state: OrderMachineState;

    constructor(
        private readonly request: OrderRequest,
        private readonly ctx: WorkflowContext,
        private readonly options: OrderWorkflowOptions,
        history: readonly OrderEvent[] = []
    ) {
        this.state = replayOrderHistory(request.orderId, history);

        if (this.state.amount !== null) {
            const repriced = options.pricing.price(request);
            if (repriced !== this.state.amount) {
                throw ErrorFactory.nonDeterminism(
                    `Order ${request.orderId} was priced at ${this.state.amount} but replay computes ${repriced}`,
                    { operation: 'replay', details: { recorded: this.state.amount, replayed: repriced } }
                );
            }
        }
    }

    public get workflowId(): string {
        return this.ctx.workflowId;
    }

    /**
     * Runs the order to a terminal result. Step failures never escape:
     * they end the order as FAILED. Only host faults (persistence) reject.
     */
    public async run(): Promise<OrderResult> {
        for (; ;) {
            const decision = decide(this.state);

            switch (decision.kind) {
                case 'price': {
                    const amount = this.options.pricing.price(this.request);
                    Logger.info('OrderWorkflow', `Starting order ${this.request.orderId}: ${this.request.item} (${this.request.size}) for ${amount}`);
                    await this.apply({ type: 'ORDER_PRICED', amount });
                    break;
                }

                case 'dispatch':
                    await this.runStep(decision.step, decision.resumed);
                    break;

                case 'close':
                    await this.apply({ type: 'ORDER_CLOSED', status: decision.status });
                    Logger.info('OrderWorkflow', `Order ${this.request.orderId} closed as ${decision.status}`);
                    return this.result();

                case 'done':
                    return this.result();
            }
        }
    }

    /**
     * Signal handler. Sets the cancellation flag in memory and returns the
     * event for the host to checkpoint, or null when there is nothing to
     * record (already cancelled, or the order is terminal).
     */
    public cancel(): OrderEvent | null {
        if (this.state.flags.cancelled || toOrderResult(this.state) !== null) {
            return null;
        }

        const event: OrderEvent = { type: 'CANCEL_REQUESTED' };
        this.state = evolve(this.state, event);
        Logger.info('OrderWorkflow', `Cancellation requested for order ${this.request.orderId}`, {
            phase: this.state.phase,
        });
        return event;
    }

    /**
     * Query handler: a frozen copy of the current state.
     */
    public status(): OrderStatusSnapshot {
        return toStatusSnapshot(this.state);
    }

    public checkpoint(): ExecutionCheckpoint {
        return toCheckpoint(this.state);
    }

    private result(): OrderResult {
        const result = toOrderResult(this.state);
        if (result === null) {
            throw ErrorFactory.invalidTransition(`Order ${this.request.orderId} has no result in phase ${this.state.phase}`);
        }
        return result;
    }

    private async runStep(step: StepName, resumed: boolean): Promise<void> {
        if (!resumed) {
            if (!(await this.schedule(step))) return;
        } else {
            Logger.info('OrderWorkflow', `Redelivering step ${step} of order ${this.request.orderId} after restart`, {
                failedAttempts: this.state.failedAttempts,
            });
        }

        try {
            await this.dispatch(step);
        } catch (error) {
            if (!(error instanceof StepFailureError)) throw error;

            Logger.error('OrderWorkflow', `Order ${this.request.orderId} failed at step ${step}`, error);
            await this.apply({
                type: 'STEP_FAILED',
                step,
                attempts: error.attempts,
                error: describeError(error),
            });
            return;
        }

        await this.apply({ type: 'STEP_COMPLETED', step });
    }

    private dispatch(step: StepName): Promise<void> {
        const options: StepInvocationOptions = {
            retryPolicy: this.options.retryPolicy,
            timeoutMs: this.options.stepTimeoutMs,
            startAttempt: this.state.failedAttempts + 1,
            onAttemptFailed: (failure) => this.apply({
                type: 'STEP_ATTEMPT_FAILED',
                step,
                attempt: failure.attempt,
                error: failure.message,
            }),
        };
        const { orderId, item, size } = this.request;

        switch (step) {
            case 'charge':
                return this.ctx.dispatchStep('charge', { orderId, amount: this.state.amount ?? 0 }, options);
            case 'prepare':
                return this.ctx.dispatchStep('prepare', { orderId, item, size }, options);
            case 'notify':
                return this.ctx.dispatchStep('notify', { orderId }, options);
        }
    }

    /**
     * Applies and records one event while holding the instance lock, so the
     * recorded history has the same order as the in-memory transitions.
     */
    private apply(event: OrderEvent): Promise<void> {
        return this.ctx.exclusive(() => this.commit(event));
    }

    /**
     * Checkpoints `step` as dispatched, unless a signal handled since `run`
     * decided has changed the decision. Returns whether the step may run.
     */
    private schedule(step: StepName): Promise<boolean> {
        return this.ctx.exclusive(async () => {
            const decision = decide(this.state);
            if (decision.kind !== 'dispatch' || decision.step !== step) {
                Logger.info('OrderWorkflow', `Step ${step} of order ${this.request.orderId} not dispatched`, {
                    decision: decision.kind,
                    cancelled: this.state.flags.cancelled,
                });
                return false;
            }

            await this.commit({ type: 'STEP_SCHEDULED', step });
            return true;
        });
    }

    /** Caller holds the instance lock */
    private async commit(event: OrderEvent): Promise<void> {
        this.state = evolve(this.state, event);
        await this.ctx.record(event, this.checkpoint());
    }
}
