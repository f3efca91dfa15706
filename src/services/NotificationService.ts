import { Logger } from '../core/logging/Logger';
import { parseNotifyInput } from '../core/validation';
import { sleep } from '../core/workflow/timers';
import { NotifyInput } from '../core/orders/types';

export interface NotificationServiceOptions {
    latencyMs?: number;
}

/**
 * Simulated receipt delivery (email / push).
 */
export class NotificationService {
    private readonly latencyMs: number;
    private readonly sent = new Set<string>();

    constructor(options: NotificationServiceOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
    }

    async sendReceipt(input: NotifyInput, signal?: AbortSignal): Promise<boolean> {
        const { orderId } = parseNotifyInput(input);
        if (this.sent.has(orderId)) {
            // Redelivered after a retry or restart; the customer already has it
            Logger.info('NotificationService', `Receipt for order ${orderId} already sent, skipping`);
            return true;
        }

        Logger.info('NotificationService', `Sending receipt for order ${orderId}`);
        await sleep(this.latencyMs, signal);
        this.sent.add(orderId);
        Logger.info('NotificationService', `Receipt sent for order ${orderId}`);
        return true;
    }

    public receiptsSent(): number {
        return this.sent.size;
    }
}
