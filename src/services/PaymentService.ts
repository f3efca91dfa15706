import { Logger } from '../core/logging/Logger';
import { parseChargeInput } from '../core/validation';
import { sleep } from '../core/workflow/timers';
import { ChargeInput } from '../core/orders/types';

export interface PaymentServiceOptions {
    latencyMs?: number;
}

/**
 * Simulated payment gateway. Always succeeds; a real gateway failure would
 * surface here and be retried by the step dispatcher.
 */
export class PaymentService {
    private readonly latencyMs: number;

    constructor(options: PaymentServiceOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
    }

    async charge(input: ChargeInput, signal?: AbortSignal): Promise<boolean> {
        const { orderId, amount } = parseChargeInput(input);
        Logger.info('PaymentService', `Charging order ${orderId} for ${amount}`);
        await sleep(this.latencyMs, signal);
        Logger.info('PaymentService', `Charge successful for order ${orderId}`);
        return true;
    }
}
