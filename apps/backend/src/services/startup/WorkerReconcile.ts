import type { StartupRoutine } from '../../types/backend-types';
import type { WorkerPool } from '../WorkerPool';

export class WorkerReconcile implements StartupRoutine {
    public readonly name = 'WorkerReconcile';

    constructor(private readonly workers: Pick<WorkerPool, 'reconcile'>) { }

    public async start(): Promise<void> {
        await this.workers.reconcile();
    }

    public async stop(): Promise<void> {
        // Worker loops are stopped by the engine before routines unwind.
    }
}
