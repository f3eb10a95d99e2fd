import type { StartupRoutine } from '../../types/backend-types';
import type { PoolRegistry } from '../PoolRegistry';
import { logger } from '../../utils/logger';

export class PoolRegistryStartup implements StartupRoutine {
    public readonly name = 'PoolRegistryStartup';

    constructor(private readonly registry: Pick<PoolRegistry, 'load'>) { }

    public async start(): Promise<void> {
        try {
            await this.registry.load();
        } catch (error) {
            logger.error(`[PoolRegistry] load failed, continuing with an empty registry: ${String(error)}`);
        }
    }

    public async stop(): Promise<void> {
        // Registry writes are persisted as they happen.
    }
}
