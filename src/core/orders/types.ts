// src/core/orders/types.ts

/**
 * Drink sizes; each maps to a base price in the pricing policy.
 */
export type DrinkSize = 'S' | 'M' | 'L';

/**
 * Terminal status of an order instance.
 */
export type OrderStatus = 'COMPLETED' | 'FAILED' | 'CANCELLED';

/**
 * Lifecycle phase of an order instance. The last three are terminal.
 */
export type OrderPhase =
    | 'Pending'
    | 'Charging'
    | 'Preparing'
    | 'Notifying'
    | 'Completed'
    | 'Failed'
    | 'Cancelled';

/**
 * Input submitted by the caller. Never mutated after validation.
 */
export interface OrderRequest {
    readonly orderId: string;
    readonly item: string;
    readonly size: DrinkSize;
}

/**
 * Progress flags of one order. Each flag only ever goes false -> true.
 */
export interface OrderState {
    readonly charged: boolean;
    readonly prepared: boolean;
    readonly notified: boolean;
    readonly cancelled: boolean;
}

/**
 * Immutable outcome of an order, built once at the terminal transition.
 */
export interface OrderResult {
    readonly orderId: string;
    readonly status: OrderStatus;
    readonly charged: boolean;
    readonly prepared: boolean;
    readonly notified: boolean;
    readonly amount: number;
}

/**
 * Read-only view returned by the status query.
 * `amount` is null until pricing has run.
 */
export interface OrderStatusSnapshot {
    readonly orderId: string;
    readonly phase: OrderPhase;
    readonly charged: boolean;
    readonly prepared: boolean;
    readonly notified: boolean;
    readonly cancelled: boolean;
    readonly amount: number | null;
}

// -------------------------------------------------------------------------
// Step payloads
// -------------------------------------------------------------------------

export interface ChargeInput {
    readonly orderId: string;
    readonly amount: number;
}

export interface PrepareInput {
    readonly orderId: string;
    readonly item: string;
    readonly size: DrinkSize;
}

export interface NotifyInput {
    readonly orderId: string;
}

export interface StepInputs {
    charge: ChargeInput;
    prepare: PrepareInput;
    notify: NotifyInput;
}

export type StepName = keyof StepInputs;

// -------------------------------------------------------------------------
// History
// -------------------------------------------------------------------------

/**
 * Events recorded in an instance's history. Folding them over the initial
 * state reconstructs the instance after a restart.
 */
export type OrderEvent =
    | { readonly type: 'ORDER_PRICED'; readonly amount: number }
    | { readonly type: 'STEP_SCHEDULED'; readonly step: StepName }
    | { readonly type: 'STEP_ATTEMPT_FAILED'; readonly step: StepName; readonly attempt: number; readonly error: string }
    | { readonly type: 'STEP_COMPLETED'; readonly step: StepName }
    | { readonly type: 'STEP_FAILED'; readonly step: StepName; readonly attempts: number; readonly error: string }
    | { readonly type: 'CANCEL_REQUESTED' }
    | { readonly type: 'ORDER_CLOSED'; readonly status: OrderStatus };

export type OrderEventType = OrderEvent['type'];

export interface StepFailure {
    readonly step: StepName;
    readonly attempts: number;
    readonly error: string;
}

/**
 * Complete in-memory state of one instance; also the persisted checkpoint.
 */
export interface OrderMachineState {
    readonly orderId: string;
    readonly phase: OrderPhase;
    readonly flags: OrderState;
    readonly amount: number | null;
    /** Step dispatched but not yet resolved */
    readonly inFlight: StepName | null;
    /** Failed attempts of the in-flight step recorded so far */
    readonly failedAttempts: number;
    readonly failure: StepFailure | null;
}

export interface ExecutionCheckpoint {
    readonly state: OrderMachineState;
    readonly result: OrderResult | null;
}
