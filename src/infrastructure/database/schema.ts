import { sqliteTable, text, integer, uniqueIndex, index } from 'drizzle-orm/sqlite-core';
import type {
    OrderEvent,
    OrderEventType,
    OrderMachineState,
    OrderRequest,
    OrderResult,
} from '../../core/orders/types';

export const EXECUTION_STATUSES = ['RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;
export type ExecutionStatus = typeof EXECUTION_STATUSES[number];

// -------------------------------------------------------------------------
// 1. Workflow Executions (one row per order instance)
// -------------------------------------------------------------------------
export const workflowExecutions = sqliteTable('workflow_executions', {
    workflowId: text('workflow_id').primaryKey(),       // e.g. 'order-123'
    orderId: text('order_id').notNull(),                 // Caller-supplied uniqueness key
    runId: text('run_id').notNull(),                     // UUID of this run
    status: text('status', { enum: EXECUTION_STATUSES }).notNull().default('RUNNING'),
    request: text('request', { mode: 'json' }).$type<OrderRequest>().notNull(),
    checkpoint: text('checkpoint', { mode: 'json' }).$type<OrderMachineState>().notNull(),
    result: text('result', { mode: 'json' }).$type<OrderResult>(),
    eventCount: integer('event_count').notNull().default(0),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
    closedAt: integer('closed_at', { mode: 'timestamp_ms' }),
}, (t) => ({
    // Duplicate starts are rejected on this index
    orderIdIndex: uniqueIndex('uid_executions_order').on(t.orderId),
    // Recovery scans for RUNNING rows
    statusIndex: index('idx_executions_status').on(t.status),
}));

// -------------------------------------------------------------------------
// 2. Workflow Events (append-only history, replayed on recovery)
// -------------------------------------------------------------------------
export const workflowEvents = sqliteTable('workflow_events', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    workflowId: text('workflow_id')
        .notNull()
        .references(() => workflowExecutions.workflowId, { onDelete: 'cascade' }),
    sequence: integer('sequence').notNull(),             // 1-based position in the history
    type: text('type').$type<OrderEventType>().notNull(),
    payload: text('payload', { mode: 'json' }).$type<OrderEvent>().notNull(),
    recordedAt: integer('recorded_at', { mode: 'timestamp_ms' }).notNull(),
}, (t) => ({
    sequenceIndex: uniqueIndex('uid_events_workflow_sequence').on(t.workflowId, t.sequence),
}));

export type WorkflowExecutionRow = typeof workflowExecutions.$inferSelect;
