import dotenv from 'dotenv';
import type { WorkerKind } from '@stress-harness/shared';

import { validateStartupConfigOrThrow } from './config/startupValidation';
import {
    ALLOW_AIRDROP,
    REDIS_KEY_PREFIX,
    SIM_SEED_POOL,
    SIM_WORKER_INITIAL_AMOUNT,
    SIM_WORKERS_PER_KIND,
    WORKER_RECENT_ERRORS_LIMIT,
} from './config/constants';
import { connectRedis, createStateStoreRedis, disconnectRedis, redisClient } from './config/redis';
import { LifecycleController, type StateChangedEvent } from './engines/LifecycleController';
import { StressTestEngine } from './engines/StressTestEngine';
import { createControlPlane, type ControlPlane } from './modules/control/controlPlane';
import { SystemState } from './modules/runtime/systemState';
import { RedisStateStore } from './services/RedisStateStore';
import { SimulatedChainClient } from './services/SimulatedChainClient';
import { logger } from './utils/logger';

dotenv.config();

const SEED_MINT_A = 'sim-mint-alpha';
const SEED_MINT_B = 'sim-mint-beta';

const chain = new SimulatedChainClient({ airdropEnabled: ALLOW_AIRDROP });
const store = new RedisStateStore(createStateStoreRedis(redisClient), {
    redisPrefix: REDIS_KEY_PREFIX,
    recentErrorsLimit: WORKER_RECENT_ERRORS_LIMIT,
});
const systemState = new SystemState();
const lifecycle = new LifecycleController({
    systemState,
    createEngine: () => new StressTestEngine({ chain, store, systemState }),
});
const controlPlane = createControlPlane({
    getEngine: () => lifecycle.getEngine(),
    getHealth: () => lifecycle.getHealth(),
    systemState,
});

lifecycle.on('stateChanged', (event: StateChangedEvent) => {
    if (event.next === 'Error') {
        logger.error(`[Bootstrap] lifecycle entered Error: ${event.reason}`);
    }
});

async function seedSimulation(plane: ControlPlane): Promise<void> {
    // 1 alpha = 2 beta, both at 9 decimals.
    const pool = chain.createPool(SEED_MINT_A, SEED_MINT_B, 1_000_000_000, 2_000_000_000, {
        [SEED_MINT_A]: 9,
        [SEED_MINT_B]: 9,
    });
    const registered = await plane.registerPool(pool.poolId);
    if (!registered.ok) {
        throw new Error(`Seed pool registration failed: ${registered.message}`);
    }

    const existing = await plane.listWorkers();
    if (existing.ok && existing.value.length > 0) {
        logger.info(`[Bootstrap] ${existing.value.length} persisted worker(s) found, skipping worker seeding`);
        return;
    }

    const kinds: WorkerKind[] = ['deposit', 'withdrawal', 'swap'];
    for (const kind of kinds) {
        for (let index = 0; index < SIM_WORKERS_PER_KIND; index += 1) {
            const created = await plane.createWorker({
                kind,
                poolId: pool.poolId,
                tokenSide: index % 2 === 0 ? 'A' : 'B',
                swapDirection: index % 2 === 0 ? 'a_to_b' : 'b_to_a',
                initialAmount: kind === 'withdrawal' ? 0 : SIM_WORKER_INITIAL_AMOUNT,
                autoRefill: true,
                shareOutput: kind === 'deposit',
            });
            if (!created.ok) {
                logger.warn(`[Bootstrap] ${kind} worker not created: ${created.message}`);
                continue;
            }
            const started = await plane.startWorker(created.value.id);
            if (!started.ok) {
                logger.warn(`[Bootstrap] ${created.value.id} not started: ${started.message}`);
            }
        }
    }
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info(`[Bootstrap] ${signal} received, stopping`);
    try {
        await lifecycle.stop();
        await disconnectRedis();
    } catch (error) {
        logger.error(`[Bootstrap] shutdown failed: ${String(error)}`);
        process.exitCode = 1;
    }
}

async function bootstrap() {
    validateStartupConfigOrThrow();
    await connectRedis();
    await lifecycle.start();

    if (SIM_SEED_POOL) {
        await seedSimulation(controlPlane);
    }

    const health = controlPlane.getHealth();
    logger.info(`[Bootstrap] harness ${health.state} with ${health.runningWorkers}/${health.totalWorkers} worker(s) running`);
}

process.on('SIGINT', () => {
    void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
});

bootstrap().catch(async (error) => {
    logger.error(`[Bootstrap] failed to start: ${String(error)}`);
    await shutdown('bootstrap failure');
    process.exit(1);
});
