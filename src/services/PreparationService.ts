import { ErrorFactory } from '../core/errors';
import { Logger } from '../core/logging/Logger';
import { parsePrepareInput } from '../core/validation';
import { sleep } from '../core/workflow/timers';
import { PrepareInput } from '../core/orders/types';

export interface PreparationServiceOptions {
    latencyMs?: number;
    /** Probability in [0, 1] that an attempt fails */
    failureRate?: number;
    /** Source of randomness; Math.random unless injected */
    random?: () => number;
}

/**
 * Simulated drink station. Fails a configurable share of attempts to model a
 * flaky downstream dependency. Randomness stays here, outside the state machine.
 */
export class PreparationService {
    private readonly latencyMs: number;
    private readonly failureRate: number;
    private readonly random: () => number;

    constructor(options: PreparationServiceOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
        this.failureRate = options.failureRate ?? 0;
        this.random = options.random ?? Math.random;
    }

    async prepare(input: PrepareInput, signal?: AbortSignal): Promise<boolean> {
        const { orderId, item, size } = parsePrepareInput(input);
        Logger.info('PreparationService', `Preparing ${item} (${size}) for order ${orderId}`);
        await sleep(this.latencyMs, signal);

        if (this.random() < this.failureRate) {
            throw ErrorFactory.external(`Preparation station jammed for order ${orderId}`, {
                operation: 'prepare',
                retryable: true,
            });
        }

        Logger.info('PreparationService', `Preparation complete for order ${orderId}`);
        return true;
    }
}
