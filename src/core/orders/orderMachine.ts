// src/core/orders/orderMachine.ts

/**
 * Order State Machine
 *
 * Pure transition logic for one order instance:
 *
 * - `evolve(state, event)` applies a recorded event and returns the next state.
 * - `decide(state)` names the next action for the runner to perform.
 *
 * Neither function performs I/O or reads the clock, so folding a recorded
 * history with `replayOrderHistory` always rebuilds the same state. All side
 * effects live in the step executors reached through the workflow host.
 *
 * Phases:
 *
 *   Pending -> Charging -> Preparing -> Notifying -> Completed
 *                  \            \            \
 *                   +-> Failed   +-> Failed   +-> Failed
 *   (any non-terminal phase) -> Cancelled, at a pre-step boundary only
 */

import { ErrorFactory } from '../errors';
import {
    ExecutionCheckpoint,
    OrderEvent,
    OrderMachineState,
    OrderPhase,
    OrderResult,
    OrderState,
    OrderStatus,
    OrderStatusSnapshot,
    StepName,
} from './types';

/** Steps in execution order */
export const STEP_SEQUENCE: readonly StepName[] = ['charge', 'prepare', 'notify'];

const STEP_PHASE: Readonly<Record<StepName, OrderPhase>> = {
    charge: 'Charging',
    prepare: 'Preparing',
    notify: 'Notifying',
};

const STEP_FLAG: Readonly<Record<StepName, 'charged' | 'prepared' | 'notified'>> = {
    charge: 'charged',
    prepare: 'prepared',
    notify: 'notified',
};

const STATUS_PHASE: Readonly<Record<OrderStatus, OrderPhase>> = {
    COMPLETED: 'Completed',
    FAILED: 'Failed',
    CANCELLED: 'Cancelled',
};

const PHASE_STATUS: Readonly<Partial<Record<OrderPhase, OrderStatus>>> = {
    Completed: 'COMPLETED',
    Failed: 'FAILED',
    Cancelled: 'CANCELLED',
};

/**
 * Allowed phase transitions. Terminal phases have no targets.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderPhase, readonly OrderPhase[]>> = {
    Pending: ['Charging', 'Cancelled'],
    Charging: ['Preparing', 'Failed', 'Cancelled'],
    Preparing: ['Notifying', 'Failed', 'Cancelled'],
    Notifying: ['Completed', 'Failed', 'Cancelled'],
    Completed: [],
    Failed: [],
    Cancelled: [],
};

export function canTransition(from: OrderPhase, to: OrderPhase): boolean {
    return ORDER_TRANSITIONS[from].includes(to);
}

export function isTerminalPhase(phase: OrderPhase): boolean {
    return ORDER_TRANSITIONS[phase].length === 0;
}

function assertTransition(state: OrderMachineState, to: OrderPhase): void {
    if (!canTransition(state.phase, to)) {
        throw ErrorFactory.invalidTransition(
            `Order ${state.orderId} cannot move from ${state.phase} to ${to}`,
            { details: { from: state.phase, to, allowed: ORDER_TRANSITIONS[state.phase] } }
        );
    }
}

/**
 * Next step whose flag is still unset, or null once every step has succeeded.
 */
export function nextStep(flags: OrderState): StepName | null {
    return STEP_SEQUENCE.find(step => !flags[STEP_FLAG[step]]) ?? null;
}

export function initialOrderState(orderId: string): OrderMachineState {
    return {
        orderId,
        phase: 'Pending',
        flags: { charged: false, prepared: false, notified: false, cancelled: false },
        amount: null,
        inFlight: null,
        failedAttempts: 0,
        failure: null,
    };
}

function reject(state: OrderMachineState, event: OrderEvent, reason: string): never {
    throw ErrorFactory.invalidTransition(
        `Event ${event.type} rejected for order ${state.orderId}: ${reason}`,
        { details: { phase: state.phase, event } }
    );
}

function assertInFlight(state: OrderMachineState, event: OrderEvent, step: StepName): void {
    if (state.inFlight !== step) {
        reject(state, event, `step ${step} is not in flight (in flight: ${state.inFlight ?? 'none'})`);
    }
}

/**
 * Applies one event. Throws InvalidTransitionError for events that cannot
 * occur in the current state, which keeps the flag invariants closed:
 * flags never reset, and a step flag is only set after its predecessor.
 */
export function evolve(state: OrderMachineState, event: OrderEvent): OrderMachineState {
    if (isTerminalPhase(state.phase)) {
        reject(state, event, `order is already ${state.phase}`);
    }

    switch (event.type) {
        case 'ORDER_PRICED':
            if (state.amount !== null) reject(state, event, 'order is already priced');
            return { ...state, amount: event.amount };

        case 'STEP_SCHEDULED': {
            if (state.amount === null) reject(state, event, 'order has not been priced');
            if (state.inFlight !== null) reject(state, event, `step ${state.inFlight} is still in flight`);
            if (state.failure !== null) reject(state, event, `step ${state.failure.step} already failed`);
            if (state.flags.cancelled) reject(state, event, 'order was cancelled');
            const expected = nextStep(state.flags);
            if (expected !== event.step) reject(state, event, `next step is ${expected ?? 'none'}`);
            const phase = STEP_PHASE[event.step];
            assertTransition(state, phase);
            return { ...state, phase, inFlight: event.step, failedAttempts: 0 };
        }

        case 'STEP_ATTEMPT_FAILED':
            assertInFlight(state, event, event.step);
            return { ...state, failedAttempts: Math.max(state.failedAttempts, event.attempt) };

        case 'STEP_COMPLETED':
            assertInFlight(state, event, event.step);
            return {
                ...state,
                flags: { ...state.flags, [STEP_FLAG[event.step]]: true },
                inFlight: null,
                failedAttempts: 0,
            };

        case 'STEP_FAILED':
            assertInFlight(state, event, event.step);
            return {
                ...state,
                inFlight: null,
                failure: { step: event.step, attempts: event.attempts, error: event.error },
            };

        case 'CANCEL_REQUESTED':
            if (state.flags.cancelled) return state;
            return { ...state, flags: { ...state.flags, cancelled: true } };

        case 'ORDER_CLOSED': {
            if (state.inFlight !== null) reject(state, event, `step ${state.inFlight} is still in flight`);
            if (event.status === 'COMPLETED' && nextStep(state.flags) !== null) {
                reject(state, event, 'not every step has completed');
            }
            if (event.status === 'FAILED' && state.failure === null) {
                reject(state, event, 'no step has failed');
            }
            if (event.status === 'CANCELLED' && !state.flags.cancelled) {
                reject(state, event, 'no cancellation was requested');
            }
            const phase = STATUS_PHASE[event.status];
            assertTransition(state, phase);
            return { ...state, phase };
        }
    }
}

export type OrderDecision =
    | { readonly kind: 'price' }
    | { readonly kind: 'dispatch'; readonly step: StepName; readonly resumed: boolean }
    | { readonly kind: 'close'; readonly status: OrderStatus }
    | { readonly kind: 'done' };

/**
 * Chooses what the runner does next. The cancellation flag is a guard
 * evaluated here, before each step is dispatched; it never interrupts a step
 * already in flight, and it has no effect once every step has succeeded.
 */
export function decide(state: OrderMachineState): OrderDecision {
    if (isTerminalPhase(state.phase)) return { kind: 'done' };
    if (state.amount === null) return { kind: 'price' };

    // Dispatched before a restart; the host redelivers it
    if (state.inFlight !== null) return { kind: 'dispatch', step: state.inFlight, resumed: true };

    if (state.failure !== null) return { kind: 'close', status: 'FAILED' };

    const step = nextStep(state.flags);
    if (step === null) return { kind: 'close', status: 'COMPLETED' };
    if (state.flags.cancelled) return { kind: 'close', status: 'CANCELLED' };

    return { kind: 'dispatch', step, resumed: false };
}

export function replayOrderHistory(orderId: string, events: readonly OrderEvent[]): OrderMachineState {
    return events.reduce(evolve, initialOrderState(orderId));
}

export function statusOf(state: OrderMachineState): OrderStatus | null {
    return PHASE_STATUS[state.phase] ?? null;
}

/**
 * Terminal result of the instance, or null while it is still running.
 */
export function toOrderResult(state: OrderMachineState): OrderResult | null {
    const status = statusOf(state);
    if (status === null) return null;

    return Object.freeze({
        orderId: state.orderId,
        status,
        charged: state.flags.charged,
        prepared: state.flags.prepared,
        notified: state.flags.notified,
        amount: state.amount ?? 0,
    });
}

export function toStatusSnapshot(state: OrderMachineState): OrderStatusSnapshot {
    return Object.freeze({
        orderId: state.orderId,
        phase: state.phase,
        charged: state.flags.charged,
        prepared: state.flags.prepared,
        notified: state.flags.notified,
        cancelled: state.flags.cancelled,
        amount: state.amount,
    });
}

export function toCheckpoint(state: OrderMachineState): ExecutionCheckpoint {
    return { state, result: toOrderResult(state) };
}
