// src/core/workflow/OrderOrchestrator.ts

import { Mutex } from 'async-mutex';
import { setImmediate as nextTick } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { CONFIG } from '../../config/config';
import { ResultCache } from '../../infrastructure/cache/ResultCache';
import { ExecutionRecord, ExecutionStore } from '../../infrastructure/database/ExecutionStore';
import { ErrorFactory, NonDeterminismError } from '../errors';
import { Logger } from '../logging/Logger';
import { OrderWorkflow } from '../orders/OrderWorkflow';
import { initialOrderState, toStatusSnapshot } from '../orders/orderMachine';
import { PricingPolicy } from '../orders/pricing';
import {
    OrderEvent,
    OrderRequest,
    OrderResult,
    OrderStatusSnapshot,
    StepInputs,
    StepName,
} from '../orders/types';
import { parseOrderRequest } from '../validation';
import { RetryPolicy } from './RetryPolicy';
import { StepDispatcher } from './StepDispatcher';
import { StepInvocationOptions, WorkflowContext } from './types';

export interface OrderOrchestratorOptions {
    store: ExecutionStore;
    dispatcher: StepDispatcher;
    pricing: PricingPolicy;
    retryPolicy: RetryPolicy;
    stepTimeoutMs: number;
    resultCache?: ResultCache;
    workflowIdPrefix?: string;
}

/**
 * Caller-side reference to one order instance.
 */
export interface WorkflowHandle {
    readonly workflowId: string;
    readonly orderId: string;
    result(): Promise<OrderResult>;
    cancel(): Promise<void>;
    status(): Promise<OrderStatusSnapshot>;
}

interface LiveInstance {
    workflowId: string;
    workflow: OrderWorkflow;
    mutex: Mutex;
    completion: Promise<OrderResult>;
}

/**
 * OrderOrchestrator
 * In-process host for order instances: starts them, delivers cancel signals
 * and status queries, hands out results and resumes open instances from
 * their recorded history after a restart.
 */
export class OrderOrchestrator {
    private readonly live = new Map<string, LiveInstance>();
    private readonly registryMutex = new Mutex();
    private readonly resultCache: ResultCache;
    private readonly workflowIdPrefix: string;

    constructor(private readonly options: OrderOrchestratorOptions) {
        this.resultCache = options.resultCache ?? new ResultCache({
            max: CONFIG.CACHE.MAX_RESULTS,
            ttl: CONFIG.CACHE.TTL_MS,
        });
        this.workflowIdPrefix = options.workflowIdPrefix ?? CONFIG.WORKFLOW.ID_PREFIX;
    }

    /**
     * Creates an instance for a new order id and starts it in the background.
     * Rejects with DuplicateWorkflowError when the id was used before.
     */
    public async start(input: unknown): Promise<WorkflowHandle> {
        const request = parseOrderRequest(input);
        const { orderId } = request;

        const instance = await this.registryMutex.runExclusive(async () => {
            if (this.live.has(orderId)) {
                throw ErrorFactory.duplicate(`Order ${orderId} already has a workflow instance`, {
                    operation: 'start',
                    suggestion: 'Use a new order id, or query the existing order',
                });
            }

            const workflowId = `${this.workflowIdPrefix}${orderId}`;
            const runId = uuidv4();
            await this.options.store.createExecution({
                workflowId,
                orderId,
                runId,
                request,
                checkpoint: initialOrderState(orderId),
            });

            Logger.info('OrderOrchestrator', `Started workflow ${workflowId}`, { runId });
            return this.launch(request, workflowId, []);
        });

        return this.createHandle(orderId, instance.workflowId);
    }

    /**
     * Delivers the cancel signal. No-op for terminal instances and for open
     * instances whose history no longer replays.
     */
    public async cancel(orderId: string): Promise<void> {
        const instance = await this.attachForSignal(orderId);
        if (instance === null) return;

        await instance.mutex.runExclusive(async () => {
            const event = instance.workflow.cancel();
            if (event !== null) {
                await this.options.store.appendEvent(instance.workflowId, event, instance.workflow.checkpoint());
            }
        });
    }

    public async status(orderId: string): Promise<OrderStatusSnapshot> {
        const instance = this.live.get(orderId);
        if (instance) {
            return instance.workflow.status();
        }

        const record = await this.requireRecord(orderId, 'status');
        return toStatusSnapshot(record.checkpoint);
    }

    /**
     * Waits for the terminal result. Repeated calls return the same result;
     * an instance left open by an earlier process is resumed first.
     */
    public async result(orderId: string): Promise<OrderResult> {
        const cached = this.resultCache.get(orderId);
        if (cached) return cached;

        const running = this.live.get(orderId);
        if (running) return running.completion;

        const record = await this.requireRecord(orderId, 'result');
        if (record.result) {
            return this.remember(orderId, record.result);
        }

        const instance = await this.attach(orderId);
        if (instance !== null) return instance.completion;

        // Closed while we were attaching
        const closed = await this.requireRecord(orderId, 'result');
        if (!closed.result) {
            throw ErrorFactory.persistence(`Order ${orderId} is closed without a result`, { operation: 'result' });
        }
        return this.remember(orderId, closed.result);
    }

    /**
     * Terminal result if there already is one; null while the order runs.
     */
    public async tryResult(orderId: string): Promise<OrderResult | null> {
        const cached = this.resultCache.get(orderId);
        if (cached) return cached;
        if (this.live.has(orderId)) return null;

        const record = await this.requireRecord(orderId, 'result');
        return record.result ? this.remember(orderId, record.result) : null;
    }

    public getHandle(orderId: string): WorkflowHandle {
        return this.createHandle(orderId, `${this.workflowIdPrefix}${orderId}`);
    }

    /**
     * Resumes every open execution that is not running in this process.
     * Instances whose history no longer replays are left in the store.
     * Returns the number of resumed instances.
     */
    public async recover(): Promise<number> {
        const open = await this.options.store.listOpenExecutions();
        let resumed = 0;

        for (const record of open) {
            try {
                const started = await this.registryMutex.runExclusive(async () => {
                    if (this.live.has(record.orderId)) return false;
                    await this.resume(record);
                    return true;
                });
                if (started) resumed++;
            } catch (error) {
                if (error instanceof NonDeterminismError) {
                    Logger.error('OrderOrchestrator', `Workflow ${record.workflowId} diverged on replay, left for manual review`, error);
                } else {
                    Logger.error('OrderOrchestrator', `Failed to resume workflow ${record.workflowId}`, error);
                }
            }
        }

        if (resumed > 0) {
            Logger.info('OrderOrchestrator', `Resumed ${resumed} open workflow(s)`);
        }
        return resumed;
    }

    /**
     * Settles once no instance is running in this process.
     */
    public async drain(): Promise<void> {
        while (this.live.size > 0) {
            await Promise.allSettled(Array.from(this.live.values(), instance => instance.completion));
        }
    }

    public get runningCount(): number {
        return this.live.size;
    }

    /**
     * Like attach(), but a history that no longer replays leaves the signal
     * undelivered instead of failing it, as recover() does.
     */
    private async attachForSignal(orderId: string): Promise<LiveInstance | null> {
        let instance: LiveInstance | null;
        try {
            instance = await this.attach(orderId);
        } catch (error) {
            if (!(error instanceof NonDeterminismError)) throw error;
            Logger.error('OrderOrchestrator', `Cancel for order ${orderId} not delivered, history diverged on replay`, error);
            return null;
        }

        if (instance === null) {
            Logger.debug('OrderOrchestrator', `Cancel for closed order ${orderId} ignored`);
        }
        return instance;
    }

    private async attach(orderId: string): Promise<LiveInstance | null> {
        return this.registryMutex.runExclusive(async () => {
            const existing = this.live.get(orderId);
            if (existing) return existing;

            const record = await this.requireRecord(orderId, 'attach');
            if (record.status !== 'RUNNING') return null;
            return this.resume(record);
        });
    }

    private async resume(record: ExecutionRecord): Promise<LiveInstance> {
        const history = await this.options.store.loadHistory(record.workflowId);
        Logger.info('OrderOrchestrator', `Resuming workflow ${record.workflowId} from ${history.length} event(s)`);
        return this.launch(record.request, record.workflowId, history.map(entry => entry.event));
    }

    /**
     * Registers the instance and schedules its first task. Must run under the
     * registry mutex.
     */
    private launch(request: OrderRequest, workflowId: string, history: readonly OrderEvent[]): LiveInstance {
        const mutex = new Mutex();
        const { store, dispatcher } = this.options;

        const ctx: WorkflowContext = {
            workflowId,
            dispatchStep<S extends StepName>(step: S, input: StepInputs[S], options: StepInvocationOptions): Promise<void> {
                return dispatcher.dispatch(step, input, options);
            },
            exclusive<T>(operation: () => Promise<T>): Promise<T> {
                return mutex.runExclusive(operation);
            },
            async record(event, checkpoint) {
                await store.appendEvent(workflowId, event, checkpoint);
            },
        };

        const workflow = new OrderWorkflow(request, ctx, {
            pricing: this.options.pricing,
            retryPolicy: this.options.retryPolicy,
            stepTimeoutMs: this.options.stepTimeoutMs,
        }, history);

        const completion = this.execute(request.orderId, workflow);
        completion.catch((error: unknown) => {
            Logger.error('OrderOrchestrator', `Workflow ${workflowId} stopped without a result`, error);
        });

        const instance: LiveInstance = { workflowId, workflow, mutex, completion };
        this.live.set(request.orderId, instance);
        return instance;
    }

    private async execute(orderId: string, workflow: OrderWorkflow): Promise<OrderResult> {
        // First task runs after start() has returned, so an immediate cancel is seen before the first step
        await nextTick();
        try {
            const result = await workflow.run();
            return this.remember(orderId, result);
        } finally {
            this.live.delete(orderId);
        }
    }

    private remember(orderId: string, result: OrderResult): OrderResult {
        this.resultCache.set(orderId, result);
        return result;
    }

    private async requireRecord(orderId: string, operation: string): Promise<ExecutionRecord> {
        const record = await this.options.store.findByOrderId(orderId);
        if (!record) {
            throw ErrorFactory.notFound(`No workflow instance for order ${orderId}`, {
                operation,
                suggestion: 'Check the order id, or place the order first',
            });
        }
        return record;
    }

    private createHandle(orderId: string, workflowId: string): WorkflowHandle {
        return {
            workflowId,
            orderId,
            result: () => this.result(orderId),
            cancel: () => this.cancel(orderId),
            status: () => this.status(orderId),
        };
    }
}
