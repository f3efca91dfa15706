// tests/support/harness.ts

import { evolve, initialOrderState, toCheckpoint } from '../../src/core/orders/orderMachine';
import { PricingPolicy, StandardPricingPolicy } from '../../src/core/orders/pricing';
import { ChargeInput, NotifyInput, OrderEvent, OrderRequest, PrepareInput, StepName } from '../../src/core/orders/types';
import { OrderOrchestrator } from '../../src/core/workflow/OrderOrchestrator';
import { defaultRetryPolicy } from '../../src/core/workflow/RetryPolicy';
import { StepDispatcher } from '../../src/core/workflow/StepDispatcher';
import { StepExecutor, StepExecutors } from '../../src/core/workflow/types';
import { DatabaseConnection, IN_MEMORY, openDatabase } from '../../src/infrastructure/database';
import { SqliteExecutionStore } from '../../src/infrastructure/database/ExecutionStore';

export const TIME_UNIT_MS = 1000;

export interface StepOverrides {
    charge?: StepExecutor<ChargeInput>;
    prepare?: StepExecutor<PrepareInput>;
    notify?: StepExecutor<NotifyInput>;
}

export interface Harness {
    connection: DatabaseConnection;
    store: SqliteExecutionStore;
    orchestrator: OrderOrchestrator;
    /** Every executor invocation, in order */
    calls: StepName[];
    /** Every backoff delay the dispatcher waited through */
    delays: number[];
}

/**
 * In-memory store plus recording executors. Backoff sleeps return at once
 * and are recorded instead.
 */
export function createHarness(
    steps: StepOverrides = {},
    options: { connection?: DatabaseConnection; pricing?: PricingPolicy } = {}
): Harness {
    const connection = options.connection ?? openDatabase(IN_MEMORY);
    const store = new SqliteExecutionStore(connection.db);
    const calls: StepName[] = [];
    const delays: number[] = [];

    const executors: StepExecutors = {
        charge: async (input, ctx) => {
            calls.push('charge');
            if (steps.charge) await steps.charge(input, ctx);
        },
        prepare: async (input, ctx) => {
            calls.push('prepare');
            if (steps.prepare) await steps.prepare(input, ctx);
        },
        notify: async (input, ctx) => {
            calls.push('notify');
            if (steps.notify) await steps.notify(input, ctx);
        },
    };

    const dispatcher = new StepDispatcher(executors, async (ms) => {
        delays.push(ms);
    });

    const orchestrator = new OrderOrchestrator({
        store,
        dispatcher,
        pricing: options.pricing ?? new StandardPricingPolicy(),
        retryPolicy: defaultRetryPolicy(TIME_UNIT_MS),
        stepTimeoutMs: 10 * TIME_UNIT_MS,
    });

    return { connection, store, orchestrator, calls, delays };
}

/**
 * Writes an execution and its history the way a host that crashed after the
 * last event would have left it.
 */
export async function seedExecution(
    store: SqliteExecutionStore,
    request: OrderRequest,
    events: readonly OrderEvent[]
): Promise<string> {
    const workflowId = `order-${request.orderId}`;
    let state = initialOrderState(request.orderId);
    await store.createExecution({
        workflowId,
        orderId: request.orderId,
        runId: 'run-seeded',
        request,
        checkpoint: state,
    });

    for (const event of events) {
        state = evolve(state, event);
        await store.appendEvent(workflowId, event, toCheckpoint(state));
    }
    return workflowId;
}

/**
 * A promise the test opens by hand.
 */
export class Gate {
    private release: () => void = () => undefined;
    readonly opened = new Promise<void>(resolve => {
        this.release = resolve;
    });

    open(): void {
        this.release();
    }
}

export async function historyTypes(store: SqliteExecutionStore, workflowId: string): Promise<string[]> {
    const history = await store.loadHistory(workflowId);
    return history.map(entry => entry.event.type);
}
