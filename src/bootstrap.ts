// src/bootstrap.ts

import { CONFIG } from './config/config';
import { Logger } from './core/logging/Logger';
import { PricingPolicy, StandardPricingPolicy } from './core/orders/pricing';
import { OrderOrchestrator } from './core/workflow/OrderOrchestrator';
import { RecoveryWorker } from './core/workflow/RecoveryWorker';
import { RetryPolicy, defaultRetryPolicy } from './core/workflow/RetryPolicy';
import { StepDispatcher } from './core/workflow/StepDispatcher';
import { defaultSleeper } from './core/workflow/timers';
import { Sleeper, StepExecutors } from './core/workflow/types';
import { ResultCache } from './infrastructure/cache/ResultCache';
import { DatabaseConnection, openDatabase } from './infrastructure/database';
import { SqliteExecutionStore } from './infrastructure/database/ExecutionStore';
import { NotificationService } from './services/NotificationService';
import { PaymentService } from './services/PaymentService';
import { PreparationService } from './services/PreparationService';
import { OrderServices, createOrderSteps } from './services/steps';

export interface RuntimeOptions {
    /** SQLite file, or ':memory:' */
    databasePath?: string;
    timeUnitMs?: number;
    pricing?: PricingPolicy;
    retryPolicy?: RetryPolicy;
    services?: Partial<OrderServices>;
    /** Replaces the service-backed executors entirely */
    steps?: StepExecutors;
    sleep?: Sleeper;
}

export interface OrderRuntime {
    orchestrator: OrderOrchestrator;
    recoveryWorker: RecoveryWorker;
    services: OrderServices;
    connection: DatabaseConnection;
    /** Stops the recovery worker, waits for running orders, closes the database */
    shutdown(): Promise<void>;
}

function createServices(overrides: Partial<OrderServices>): OrderServices {
    const latency = CONFIG.SERVICES.SIMULATED_LATENCY ? CONFIG.SERVICES.LATENCY_MS : { CHARGE: 0, PREPARE: 0, NOTIFY: 0 };
    return {
        payment: overrides.payment ?? new PaymentService({ latencyMs: latency.CHARGE }),
        preparation: overrides.preparation ?? new PreparationService({
            latencyMs: latency.PREPARE,
            failureRate: CONFIG.SERVICES.PREPARE_FAILURE_RATE,
        }),
        notification: overrides.notification ?? new NotificationService({ latencyMs: latency.NOTIFY }),
    };
}

/**
 * Composition root. Every service and collaborator is constructed here once
 * and passed down; nothing below this point looks up a shared instance.
 */
export function createRuntime(options: RuntimeOptions = {}): OrderRuntime {
    const timeUnitMs = options.timeUnitMs ?? CONFIG.TIMEOUTS.TIME_UNIT_MS;
    const connection = openDatabase(options.databasePath ?? CONFIG.PATHS.DATABASE_FILE);
    const services = createServices(options.services ?? {});

    const dispatcher = new StepDispatcher(options.steps ?? createOrderSteps(services), options.sleep ?? defaultSleeper);
    const orchestrator = new OrderOrchestrator({
        store: new SqliteExecutionStore(connection.db),
        dispatcher,
        pricing: options.pricing ?? new StandardPricingPolicy(),
        retryPolicy: options.retryPolicy ?? defaultRetryPolicy(timeUnitMs),
        stepTimeoutMs: CONFIG.TIMEOUTS.START_TO_CLOSE_UNITS * timeUnitMs,
        resultCache: new ResultCache({ max: CONFIG.CACHE.MAX_RESULTS, ttl: CONFIG.CACHE.TTL_MS }),
    });
    const recoveryWorker = new RecoveryWorker(orchestrator);

    Logger.debug('Bootstrap', 'Order runtime created', { timeUnitMs, databasePath: options.databasePath });

    return {
        orchestrator,
        recoveryWorker,
        services,
        connection,
        async shutdown() {
            recoveryWorker.stop();
            await orchestrator.drain();
            connection.sqlite.close();
            Logger.info('Bootstrap', 'Order runtime shut down');
        },
    };
}
