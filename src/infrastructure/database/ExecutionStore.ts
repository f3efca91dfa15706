import { and, asc, eq } from 'drizzle-orm';
import { ErrorFactory, OrchestrationError } from '../../core/errors';
import { Logger } from '../../core/logging/Logger';
import { parseOrderEvent, parseOrderRequest } from '../../core/validation';
import type {
    ExecutionCheckpoint,
    OrderEvent,
    OrderMachineState,
    OrderRequest,
    OrderResult,
} from '../../core/orders/types';
import { OrchestratorDatabase } from './index';
import { ExecutionStatus, WorkflowExecutionRow, workflowEvents, workflowExecutions } from './schema';

export interface ExecutionRecord {
    workflowId: string;
    orderId: string;
    runId: string;
    status: ExecutionStatus;
    request: OrderRequest;
    checkpoint: OrderMachineState;
    result: OrderResult | null;
    eventCount: number;
    createdAt: Date;
    updatedAt: Date;
    closedAt: Date | null;
}

export interface NewExecution {
    workflowId: string;
    orderId: string;
    runId: string;
    request: OrderRequest;
    checkpoint: OrderMachineState;
}

export interface HistoryEvent {
    sequence: number;
    event: OrderEvent;
    recordedAt: Date;
}

/**
 * Durable checkpoint storage used by the workflow host.
 */
export interface ExecutionStore {
    /** Throws DuplicateWorkflowError when the workflow or order id is taken */
    createExecution(execution: NewExecution): Promise<ExecutionRecord>;
    findByOrderId(orderId: string): Promise<ExecutionRecord | null>;
    findByWorkflowId(workflowId: string): Promise<ExecutionRecord | null>;
    loadHistory(workflowId: string): Promise<HistoryEvent[]>;
    /** Appends one event and replaces the checkpoint, atomically; returns the event's sequence */
    appendEvent(workflowId: string, event: OrderEvent, checkpoint: ExecutionCheckpoint): Promise<number>;
    listOpenExecutions(): Promise<ExecutionRecord[]>;
}

function isConstraintViolation(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    if ('code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_CONSTRAINT')) {
        return true;
    }
    return error.cause !== undefined && isConstraintViolation(error.cause);
}

function toRecord(row: WorkflowExecutionRow): ExecutionRecord {
    return {
        workflowId: row.workflowId,
        orderId: row.orderId,
        runId: row.runId,
        status: row.status,
        request: parseOrderRequest(row.request),
        checkpoint: row.checkpoint,
        result: row.result ? Object.freeze({ ...row.result }) : null,
        eventCount: row.eventCount,
        createdAt: row.createdAt,
        updatedAt: row.updatedAt,
        closedAt: row.closedAt,
    };
}

/**
 * SqliteExecutionStore
 * ExecutionStore over drizzle-orm + better-sqlite3. Each append runs in one
 * SQLite transaction: the event row, the checkpoint and the terminal result
 * are written together or not at all.
 */
export class SqliteExecutionStore implements ExecutionStore {
    constructor(private readonly db: OrchestratorDatabase) { }

    async createExecution(execution: NewExecution): Promise<ExecutionRecord> {
        const now = new Date();
        try {
            const rows = this.db.insert(workflowExecutions).values({
                workflowId: execution.workflowId,
                orderId: execution.orderId,
                runId: execution.runId,
                status: 'RUNNING',
                request: execution.request,
                checkpoint: execution.checkpoint,
                createdAt: now,
                updatedAt: now,
            }).returning().all();

            Logger.debug('ExecutionStore', `Created execution ${execution.workflowId}`, { runId: execution.runId });
            return toRecord(rows[0]);
        } catch (error) {
            if (isConstraintViolation(error)) {
                throw ErrorFactory.duplicate(`Order ${execution.orderId} already has a workflow instance`, {
                    operation: 'createExecution',
                    details: { workflowId: execution.workflowId },
                });
            }
            throw ErrorFactory.persistence(`Failed to create execution ${execution.workflowId}`, {
                operation: 'createExecution',
                details: error,
            });
        }
    }

    async findByOrderId(orderId: string): Promise<ExecutionRecord | null> {
        const row = this.db.select().from(workflowExecutions)
            .where(eq(workflowExecutions.orderId, orderId))
            .get();
        return row ? toRecord(row) : null;
    }

    async findByWorkflowId(workflowId: string): Promise<ExecutionRecord | null> {
        const row = this.db.select().from(workflowExecutions)
            .where(eq(workflowExecutions.workflowId, workflowId))
            .get();
        return row ? toRecord(row) : null;
    }

    async loadHistory(workflowId: string): Promise<HistoryEvent[]> {
        const rows = this.db.select().from(workflowEvents)
            .where(eq(workflowEvents.workflowId, workflowId))
            .orderBy(asc(workflowEvents.sequence))
            .all();

        return rows.map((row, index) => {
            if (row.sequence !== index + 1) {
                throw ErrorFactory.persistence(`History of ${workflowId} has a gap at sequence ${index + 1}`, {
                    operation: 'loadHistory',
                });
            }
            return { sequence: row.sequence, event: parseOrderEvent(row.payload), recordedAt: row.recordedAt };
        });
    }

    async appendEvent(workflowId: string, event: OrderEvent, checkpoint: ExecutionCheckpoint): Promise<number> {
        const now = new Date();
        try {
            return this.db.transaction((tx) => {
                const execution = tx.select({ eventCount: workflowExecutions.eventCount, status: workflowExecutions.status })
                    .from(workflowExecutions)
                    .where(eq(workflowExecutions.workflowId, workflowId))
                    .get();

                if (!execution) {
                    throw ErrorFactory.notFound(`Workflow ${workflowId} does not exist`, { operation: 'appendEvent' });
                }
                if (execution.status !== 'RUNNING') {
                    throw ErrorFactory.persistence(`Workflow ${workflowId} is closed (${execution.status})`, {
                        operation: 'appendEvent',
                        retryable: false,
                    });
                }

                const sequence = execution.eventCount + 1;
                tx.insert(workflowEvents).values({
                    workflowId,
                    sequence,
                    type: event.type,
                    payload: event,
                    recordedAt: now,
                }).run();

                tx.update(workflowExecutions)
                    .set({
                        checkpoint: checkpoint.state,
                        eventCount: sequence,
                        updatedAt: now,
                        ...(checkpoint.result
                            ? { status: checkpoint.result.status, result: checkpoint.result, closedAt: now }
                            : {}),
                    })
                    .where(and(eq(workflowExecutions.workflowId, workflowId), eq(workflowExecutions.eventCount, execution.eventCount)))
                    .run();

                return sequence;
            });
        } catch (error) {
            if (error instanceof OrchestrationError) throw error;
            throw ErrorFactory.persistence(`Failed to append ${event.type} to ${workflowId}`, {
                operation: 'appendEvent',
                details: error,
            });
        }
    }

    async listOpenExecutions(): Promise<ExecutionRecord[]> {
        const rows = this.db.select().from(workflowExecutions)
            .where(eq(workflowExecutions.status, 'RUNNING'))
            .orderBy(asc(workflowExecutions.createdAt))
            .all();
        return rows.map(toRecord);
    }
}
