import { Logger } from '../logging/Logger';
import { OrderOrchestrator } from './OrderOrchestrator';

/**
 * RecoveryWorker
 *
 * Periodically asks the orchestrator to resume executions left open by a
 * crashed or restarted process. Passes never overlap.
 */
export class RecoveryWorker {
    private interval: NodeJS.Timeout | null = null;
    private isRunning: boolean = false;

    constructor(private readonly orchestrator: OrderOrchestrator) { }

    /**
     * Start the recovery polling loop
     */
    public start(intervalMs: number = 60000): void {
        if (this.interval) return;

        Logger.info('RecoveryWorker', `Starting recovery loop every ${intervalMs}ms`);
        this.interval = setInterval(() => {
            void this.runOnce();
        }, intervalMs);
        this.interval.unref();

        // Run immediately on start
        void this.runOnce();
    }

    /**
     * Stop the recovery loop
     */
    public stop(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
    }

    public get active(): boolean {
        return this.interval !== null;
    }

    /**
     * One recovery pass. Returns the number of resumed instances, or 0 when a
     * pass is already in progress. Never rejects.
     */
    public async runOnce(): Promise<number> {
        if (this.isRunning) return 0;
        this.isRunning = true;

        try {
            const resumed = await this.orchestrator.recover();
            if (resumed === 0) {
                Logger.debug('RecoveryWorker', 'No open workflows to resume');
            }
            return resumed;
        } catch (error) {
            Logger.error('RecoveryWorker', 'Recovery loop failed', error);
            return 0;
        } finally {
            this.isRunning = false;
        }
    }
}
