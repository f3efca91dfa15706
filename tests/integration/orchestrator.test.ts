// tests/integration/orchestrator.test.ts

import {
    DuplicateWorkflowError,
    NonDeterminismError,
    NotFoundError,
    ValidationError,
} from '../../src/core/errors';
import { LogLevel, Logger } from '../../src/core/logging/Logger';
import { OrderResult } from '../../src/core/orders/types';
import { Gate, Harness, createHarness, historyTypes, seedExecution } from '../support/harness';

const latte = { orderId: 'A100', item: 'Latte', size: 'M' } as const;

describe('OrderOrchestrator', () => {
    let harness: Harness;

    afterEach(async () => {
        await harness.orchestrator.drain();
        harness.connection.sqlite.close();
    });

    describe('happy path', () => {
        beforeEach(() => {
            harness = createHarness();
        });

        it('should complete an order and charge 525 for a medium latte', async () => {
            const handle = await harness.orchestrator.start(latte);
            expect(handle.workflowId).toBe('order-A100');

            const result = await handle.result();
            expect(result).toEqual({
                orderId: 'A100',
                status: 'COMPLETED',
                charged: true,
                prepared: true,
                notified: true,
                amount: 525,
            });
            expect(harness.calls).toEqual(['charge', 'prepare', 'notify']);
            expect(await historyTypes(harness.store, 'order-A100')).toEqual([
                'ORDER_PRICED',
                'STEP_SCHEDULED', 'STEP_COMPLETED',
                'STEP_SCHEDULED', 'STEP_COMPLETED',
                'STEP_SCHEDULED', 'STEP_COMPLETED',
                'ORDER_CLOSED',
            ]);
            expect((await harness.store.findByOrderId('A100'))?.status).toBe('COMPLETED');
        });

        it('should return the same result on every retrieval', async () => {
            const handle = await harness.orchestrator.start(latte);
            const first = await handle.result();
            const second = await harness.orchestrator.result('A100');
            const third = await harness.orchestrator.getHandle('A100').result();
            expect(second).toBe(first);
            expect(third).toBe(first);
            expect(harness.calls).toEqual(['charge', 'prepare', 'notify']);
        });

        it('should report status before and after the run', async () => {
            const handle = await harness.orchestrator.start(latte);
            expect(await handle.status()).toEqual({
                orderId: 'A100',
                phase: 'Pending',
                charged: false,
                prepared: false,
                notified: false,
                cancelled: false,
                amount: null,
            });

            await handle.result();
            expect(await handle.status()).toEqual({
                orderId: 'A100',
                phase: 'Completed',
                charged: true,
                prepared: true,
                notified: true,
                cancelled: false,
                amount: 525,
            });
        });

        it('should expose no result until the order finishes', async () => {
            await harness.orchestrator.start(latte);
            expect(await harness.orchestrator.tryResult('A100')).toBeNull();
            await harness.orchestrator.result('A100');
            expect(await harness.orchestrator.tryResult('A100')).toMatchObject({ status: 'COMPLETED' });
        });

        it('should reject invalid requests', async () => {
            await expect(harness.orchestrator.start({ orderId: 'A101', item: 'Tea', size: 'XL' }))
                .rejects.toThrow(ValidationError);
            await expect(harness.orchestrator.status('A101')).rejects.toThrow(NotFoundError);
        });

        it('should raise NotFoundError for unknown orders', async () => {
            await expect(harness.orchestrator.status('ghost')).rejects.toThrow(NotFoundError);
            await expect(harness.orchestrator.cancel('ghost')).rejects.toThrow(NotFoundError);
            await expect(harness.orchestrator.result('ghost')).rejects.toThrow(NotFoundError);
        });
    });

    describe('duplicates', () => {
        beforeEach(() => {
            harness = createHarness();
        });

        it('should reject a duplicate while the original is running and leave it untouched', async () => {
            const handle = await harness.orchestrator.start(latte);
            await expect(harness.orchestrator.start({ ...latte, item: 'Espresso' })).rejects.toThrow(DuplicateWorkflowError);

            expect(await handle.result()).toMatchObject({ status: 'COMPLETED', amount: 525 });
            expect(harness.calls).toEqual(['charge', 'prepare', 'notify']);
        });

        it('should reject a duplicate after the original closed', async () => {
            await (await harness.orchestrator.start(latte)).result();
            await expect(harness.orchestrator.start(latte)).rejects.toThrow(DuplicateWorkflowError);
        });
    });

    describe('cancellation', () => {
        it('should cancel before any step when cancelled right after start', async () => {
            harness = createHarness();
            const handle = await harness.orchestrator.start(latte);
            await handle.cancel();

            expect(await handle.result()).toEqual({
                orderId: 'A100',
                status: 'CANCELLED',
                charged: false,
                prepared: false,
                notified: false,
                amount: 525,
            });
            expect(harness.calls).toEqual([]);
            expect(await historyTypes(harness.store, 'order-A100')).toEqual(['CANCEL_REQUESTED', 'ORDER_PRICED', 'ORDER_CLOSED']);
        });

        it('should let the in-flight step finish and skip the rest', async () => {
            const entered = new Gate();
            const release = new Gate();
            harness = createHarness({
                charge: async () => {
                    entered.open();
                    await release.opened;
                },
            });

            const handle = await harness.orchestrator.start(latte);
            await entered.opened;
            await handle.cancel();
            expect(await handle.status()).toMatchObject({ phase: 'Charging', charged: false, cancelled: true });

            release.open();
            expect(await handle.result()).toEqual({
                orderId: 'A100',
                status: 'CANCELLED',
                charged: true,
                prepared: false,
                notified: false,
                amount: 525,
            });
            expect(harness.calls).toEqual(['charge']);
        });

        it('should complete when cancel arrives during the last step', async () => {
            const entered = new Gate();
            const release = new Gate();
            harness = createHarness({
                notify: async () => {
                    entered.open();
                    await release.opened;
                },
            });

            const handle = await harness.orchestrator.start(latte);
            await entered.opened;
            await handle.cancel();
            release.open();

            expect(await handle.result()).toMatchObject({ status: 'COMPLETED', notified: true });
        });

        it('should ignore a second cancel and a cancel after termination', async () => {
            harness = createHarness();
            const handle = await harness.orchestrator.start(latte);
            await handle.cancel();
            await handle.cancel();
            await handle.result();
            await handle.cancel();

            expect(await historyTypes(harness.store, 'order-A100')).toEqual(['CANCEL_REQUESTED', 'ORDER_PRICED', 'ORDER_CLOSED']);
            expect(await handle.result()).toMatchObject({ status: 'CANCELLED' });
        });
    });

    describe('retries and failure', () => {
        it('should fail the order after 5 failed preparation attempts', async () => {
            harness = createHarness({
                prepare: async () => {
                    throw new Error('station jammed');
                },
            });

            const result = await (await harness.orchestrator.start(latte)).result();
            expect(result).toEqual({
                orderId: 'A100',
                status: 'FAILED',
                charged: true,
                prepared: false,
                notified: false,
                amount: 525,
            });
            expect(harness.calls).toEqual(['charge', 'prepare', 'prepare', 'prepare', 'prepare', 'prepare']);
            expect(harness.delays).toEqual([1000, 2000, 4000, 8000]);

            const history = await harness.store.loadHistory('order-A100');
            expect(history.filter(entry => entry.event.type === 'STEP_ATTEMPT_FAILED')).toHaveLength(4);
            expect(history[history.length - 2].event).toEqual({
                type: 'STEP_FAILED',
                step: 'prepare',
                attempts: 5,
                error: 'Step prepare failed: station jammed',
            });
        });

        it('should log a terminal step failure at ERROR once', async () => {
            harness = createHarness({
                prepare: async () => {
                    throw new Error('station jammed');
                },
            });
            const lines: string[] = [];
            const spy = jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
                lines.push(String(line));
            });
            const previousLevel = Logger.getLevel();
            Logger.setLevel(LogLevel.ERROR);

            try {
                await (await harness.orchestrator.start(latte)).result();
            } finally {
                Logger.setLevel(previousLevel);
                spy.mockRestore();
            }

            expect(lines).toHaveLength(1);
            expect(lines[0]).toContain('[ERROR] [OrderWorkflow] Order A100 failed at step prepare');
        });

        it('should proceed when a step succeeds on its third attempt', async () => {
            let attempts = 0;
            harness = createHarness({
                prepare: async () => {
                    attempts++;
                    if (attempts <= 2) throw new Error('station jammed');
                },
            });

            const result = await (await harness.orchestrator.start(latte)).result();
            expect(result).toMatchObject({ status: 'COMPLETED', prepared: true, notified: true });
            expect(harness.delays).toEqual([1000, 2000]);
        });
    });

    describe('recovery', () => {
        it('should resume an interrupted order without re-running completed steps', async () => {
            const crashed = createHarness();
            await seedExecution(crashed.store, latte, [
                { type: 'ORDER_PRICED', amount: 525 },
                { type: 'STEP_SCHEDULED', step: 'charge' },
                { type: 'STEP_COMPLETED', step: 'charge' },
            ]);

            harness = createHarness({}, { connection: crashed.connection });
            expect(await harness.orchestrator.recover()).toBe(1);

            expect(await harness.orchestrator.result('A100')).toEqual({
                orderId: 'A100',
                status: 'COMPLETED',
                charged: true,
                prepared: true,
                notified: true,
                amount: 525,
            });
            expect(harness.calls).toEqual(['prepare', 'notify']);
        });

        it('should reattach on result() without an explicit recovery pass', async () => {
            const crashed = createHarness();
            await seedExecution(crashed.store, latte, [{ type: 'ORDER_PRICED', amount: 525 }]);

            harness = createHarness({}, { connection: crashed.connection });
            expect(await harness.orchestrator.result('A100')).toMatchObject({ status: 'COMPLETED' });
            expect(harness.calls).toEqual(['charge', 'prepare', 'notify']);
        });

        it('should redeliver an in-flight step with its recorded attempt count', async () => {
            const crashed = createHarness();
            await seedExecution(crashed.store, latte, [
                { type: 'ORDER_PRICED', amount: 525 },
                { type: 'STEP_SCHEDULED', step: 'charge' },
                { type: 'STEP_COMPLETED', step: 'charge' },
                { type: 'STEP_SCHEDULED', step: 'prepare' },
                { type: 'STEP_ATTEMPT_FAILED', step: 'prepare', attempt: 1, error: 'station jammed' },
                { type: 'STEP_ATTEMPT_FAILED', step: 'prepare', attempt: 2, error: 'station jammed' },
            ]);

            harness = createHarness({
                prepare: async () => {
                    throw new Error('station jammed');
                },
            }, { connection: crashed.connection });

            const result = await harness.orchestrator.result('A100');
            expect(result).toMatchObject({ status: 'FAILED', charged: true, prepared: false });
            expect(harness.calls).toEqual(['prepare', 'prepare', 'prepare']);
            expect(harness.delays).toEqual([4000, 8000]);
        });

        it('should keep a cancel recorded before the crash', async () => {
            const crashed = createHarness();
            await seedExecution(crashed.store, latte, [
                { type: 'ORDER_PRICED', amount: 525 },
                { type: 'STEP_SCHEDULED', step: 'charge' },
                { type: 'STEP_COMPLETED', step: 'charge' },
                { type: 'CANCEL_REQUESTED' },
            ]);

            harness = createHarness({}, { connection: crashed.connection });
            await harness.orchestrator.recover();
            expect(await harness.orchestrator.result('A100')).toMatchObject({ status: 'CANCELLED', charged: true, prepared: false });
            expect(harness.calls).toEqual([]);
        });

        it('should leave a diverging history open for review', async () => {
            const crashed = createHarness();
            await seedExecution(crashed.store, latte, [{ type: 'ORDER_PRICED', amount: 999 }]);

            harness = createHarness({}, { connection: crashed.connection });
            expect(await harness.orchestrator.recover()).toBe(0);
            await expect(harness.orchestrator.result('A100')).rejects.toThrow(NonDeterminismError);
            expect((await harness.store.findByOrderId('A100'))?.status).toBe('RUNNING');
            expect(harness.calls).toEqual([]);
        });

        it('should leave a diverging history untouched when cancelled', async () => {
            const crashed = createHarness();
            await seedExecution(crashed.store, latte, [{ type: 'ORDER_PRICED', amount: 999 }]);

            harness = createHarness({}, { connection: crashed.connection });
            await expect(harness.orchestrator.cancel('A100')).resolves.toBeUndefined();
            expect(await historyTypes(harness.store, 'order-A100')).toEqual(['ORDER_PRICED']);
            expect((await harness.store.findByOrderId('A100'))?.status).toBe('RUNNING');
            expect(harness.orchestrator.runningCount).toBe(0);
        });

        it('should not resume orders already running in this process', async () => {
            const release = new Gate();
            harness = createHarness({
                charge: async () => {
                    await release.opened;
                },
            });

            const handle = await harness.orchestrator.start(latte);
            expect(await harness.orchestrator.recover()).toBe(0);
            release.open();
            const result: OrderResult = await handle.result();
            expect(result.status).toBe('COMPLETED');
            expect(harness.calls).toEqual(['charge', 'prepare', 'notify']);
        });
    });

    describe('isolation', () => {
        it('should run orders independently', async () => {
            harness = createHarness();
            const first = await harness.orchestrator.start(latte);
            const second = await harness.orchestrator.start({ orderId: 'B200', item: 'Espresso', size: 'S' });
            await first.cancel();

            const [a, b] = await Promise.all([first.result(), second.result()]);
            expect(a.status).toBe('CANCELLED');
            expect(b).toMatchObject({ status: 'COMPLETED', amount: 300 });
        });
    });
});
