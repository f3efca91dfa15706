// src/core/validation/orderValidator.ts

import { z } from 'zod';
import { ErrorFactory } from '../errors';
import type {
    ChargeInput,
    NotifyInput,
    OrderEvent,
    OrderRequest,
    PrepareInput,
} from '../orders/types';

const MAX_ID_LENGTH = 200;
const MAX_ITEM_LENGTH = 200;

export const DrinkSizeSchema = z.enum(['S', 'M', 'L']);
export const OrderStatusSchema = z.enum(['COMPLETED', 'FAILED', 'CANCELLED']);
export const StepNameSchema = z.enum(['charge', 'prepare', 'notify']);

const OrderIdSchema = z.string().min(1, 'orderId must not be empty').max(MAX_ID_LENGTH);
const ItemSchema = z.string().min(1, 'item must not be empty').max(MAX_ITEM_LENGTH);

export const OrderRequestSchema = z.object({
    orderId: OrderIdSchema,
    item: ItemSchema,
    size: DrinkSizeSchema,
});

export const ChargeInputSchema = z.object({
    orderId: OrderIdSchema,
    amount: z.number().int().nonnegative(),
});

export const PrepareInputSchema = z.object({
    orderId: OrderIdSchema,
    item: ItemSchema,
    size: DrinkSizeSchema,
});

export const NotifyInputSchema = z.object({
    orderId: OrderIdSchema,
});

/**
 * Shape of a recorded history event; checked when history is read back.
 */
export const OrderEventSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('ORDER_PRICED'), amount: z.number().int().nonnegative() }),
    z.object({ type: z.literal('STEP_SCHEDULED'), step: StepNameSchema }),
    z.object({ type: z.literal('STEP_ATTEMPT_FAILED'), step: StepNameSchema, attempt: z.number().int().positive(), error: z.string() }),
    z.object({ type: z.literal('STEP_COMPLETED'), step: StepNameSchema }),
    z.object({ type: z.literal('STEP_FAILED'), step: StepNameSchema, attempts: z.number().int().positive(), error: z.string() }),
    z.object({ type: z.literal('CANCEL_REQUESTED') }),
    z.object({ type: z.literal('ORDER_CLOSED'), status: OrderStatusSchema }),
]);

export function formatIssues(error: z.ZodError): string {
    return error.issues.map(i => `${i.path.join('.') || 'value'}: ${i.message}`).join(', ');
}

function parseWith<T>(schema: z.ZodType<T>, input: unknown, label: string, operation: string): T {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        throw ErrorFactory.validation(`Invalid ${label}: ${formatIssues(parsed.error)}`, {
            operation,
            details: parsed.error.issues,
        });
    }
    return parsed.data;
}

export function parseOrderRequest(input: unknown): OrderRequest {
    return Object.freeze(parseWith(OrderRequestSchema, input, 'order request', 'parseOrderRequest'));
}

export function parseChargeInput(input: unknown): ChargeInput {
    return parseWith(ChargeInputSchema, input, 'charge input', 'charge');
}

export function parsePrepareInput(input: unknown): PrepareInput {
    return parseWith(PrepareInputSchema, input, 'prepare input', 'prepare');
}

export function parseNotifyInput(input: unknown): NotifyInput {
    return parseWith(NotifyInputSchema, input, 'notify input', 'notify');
}

export function parseOrderEvent(input: unknown): OrderEvent {
    return parseWith(OrderEventSchema, input, 'history event', 'loadHistory');
}
