import { StepExecutors } from '../core/workflow/types';
import { NotificationService } from './NotificationService';
import { PaymentService } from './PaymentService';
import { PreparationService } from './PreparationService';

export interface OrderServices {
    payment: PaymentService;
    preparation: PreparationService;
    notification: NotificationService;
}

/**
 * Binds the services to the step names the order state machine dispatches.
 * Services are built once by the caller and passed in.
 */
export function createOrderSteps(services: OrderServices): StepExecutors {
    return {
        charge: (input, { signal }) => services.payment.charge(input, signal),
        prepare: (input, { signal }) => services.preparation.prepare(input, signal),
        notify: (input, { signal }) => services.notification.sendReceipt(input, signal),
    };
}
