// tests/unit/recovery_worker.test.ts

import { RecoveryWorker } from '../../src/core/workflow/RecoveryWorker';
import { Harness, createHarness, seedExecution } from '../support/harness';

describe('RecoveryWorker', () => {
    let harness: Harness;

    beforeEach(() => {
        harness = createHarness();
    });

    afterEach(async () => {
        await harness.orchestrator.drain();
        harness.connection.sqlite.close();
    });

    it('should resume open executions', async () => {
        await seedExecution(harness.store, { orderId: 'W1', item: 'Tea', size: 'S' }, [{ type: 'ORDER_PRICED', amount: 300 }]);
        const worker = new RecoveryWorker(harness.orchestrator);

        expect(await worker.runOnce()).toBe(1);
        expect(await harness.orchestrator.result('W1')).toMatchObject({ status: 'COMPLETED', amount: 300 });
        expect(await worker.runOnce()).toBe(0);
    });

    it('should skip a pass while another is in progress', async () => {
        await seedExecution(harness.store, { orderId: 'W2', item: 'Tea', size: 'S' }, []);
        const worker = new RecoveryWorker(harness.orchestrator);

        const first = worker.runOnce();
        const second = worker.runOnce();
        expect(await second).toBe(0);
        expect(await first).toBe(1);
    });

    it('should start and stop its timer', async () => {
        const worker = new RecoveryWorker(harness.orchestrator);
        worker.start(60000);
        expect(worker.active).toBe(true);
        worker.start(60000);
        worker.stop();
        expect(worker.active).toBe(false);

        // Let the immediate pass settle before the database closes
        await new Promise(resolve => setImmediate(resolve));
        expect(harness.orchestrator.runningCount).toBe(0);
    });
});
