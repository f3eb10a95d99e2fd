import { EventEmitter } from 'events';
import type { HealthSnapshot, ServiceState } from '@stress-harness/shared';
import { AsyncMutex } from '../modules/runtime/asyncMutex';
import type { SystemState } from '../modules/runtime/systemState';
import type { StressTestEngine } from './StressTestEngine';
import { logger } from '../utils/logger';

export type LifecycleEngine = Pick<StressTestEngine, 'start' | 'stop' | 'pause' | 'resume' | 'getHealth'> & {
    workers: Pick<StressTestEngine['workers'], 'forceStopAll'>;
};

export type StateChangedEvent = {
    previous: ServiceState;
    next: ServiceState;
    reason: string;
    timestamp: number;
};

export interface LifecycleControllerDeps<E extends LifecycleEngine> {
    createEngine: () => E;
    systemState: SystemState;
    now?: () => number;
}

/**
 * Process-wide state machine. The engine is created on start and thrown away
 * on stop, so every run begins from a fresh pool. All transitions are
 * serialized through one mutex.
 */
export class LifecycleController<E extends LifecycleEngine = StressTestEngine> extends EventEmitter {
    private state: ServiceState = 'Stopped';
    private engine: E | null = null;
    private readonly mutex = new AsyncMutex();
    private readonly now: () => number;

    constructor(private readonly deps: LifecycleControllerDeps<E>) {
        super();
        this.now = deps.now ?? Date.now;
    }

    public getState(): ServiceState {
        return this.state;
    }

    public getEngine(): E | null {
        return this.engine;
    }

    /** Returns false when the controller was not `Stopped` and nothing happened. */
    public async start(): Promise<boolean> {
        return this.mutex.runExclusive(async () => {
            if (this.state !== 'Stopped') {
                logger.info(`[Lifecycle] start ignored in state ${this.state}`);
                return false;
            }
            this.transition('Starting', 'start requested');
            let engine: E | null = null;
            try {
                engine = this.deps.createEngine();
                await engine.start();
            } catch (error) {
                logger.error(`[Lifecycle] start failed: ${String(error)}`);
                this.transition('Error', `start failed: ${String(error)}`);
                if (engine) {
                    await this.disposeEngine(engine);
                }
                this.deps.systemState.set(false, false);
                throw error;
            }
            this.engine = engine;
            this.deps.systemState.set(true, false);
            this.transition('Started', 'engine started');
            return true;
        });
    }

    /** Safe from any state; a second call while `Stopped` is a no-op. */
    public async stop(): Promise<boolean> {
        return this.mutex.runExclusive(async () => {
            if (this.state === 'Stopped') {
                logger.info('[Lifecycle] already stopped');
                return false;
            }
            this.transition('Stopping', 'stop requested');
            const engine = this.engine;
            this.engine = null;
            if (engine) {
                try {
                    await engine.workers.forceStopAll();
                } catch (error) {
                    logger.error(`[Lifecycle] force stop of workers failed: ${String(error)}`);
                }
                await this.disposeEngine(engine);
            }
            this.deps.systemState.set(false, false);
            this.transition('Stopped', 'engine disposed');
            return true;
        });
    }

    public async pause(): Promise<boolean> {
        return this.mutex.runExclusive(async () => {
            const engine = this.engine;
            if (this.state !== 'Started' || !engine) {
                logger.info(`[Lifecycle] pause ignored in state ${this.state}`);
                return false;
            }
            this.transition('Pausing', 'pause requested');
            try {
                const paused = await engine.pause();
                logger.info(`[Lifecycle] paused ${paused} worker(s)`);
            } catch (error) {
                this.transition('Error', `pause failed: ${String(error)}`);
                throw error;
            }
            this.deps.systemState.set(true, true);
            this.transition('Paused', 'workers paused');
            return true;
        });
    }

    public async resume(): Promise<boolean> {
        return this.mutex.runExclusive(async () => {
            const engine = this.engine;
            if (this.state !== 'Paused' || !engine) {
                logger.info(`[Lifecycle] resume ignored in state ${this.state}`);
                return false;
            }
            this.transition('Resuming', 'resume requested');
            try {
                const resumed = await engine.resume();
                logger.info(`[Lifecycle] resumed ${resumed} worker(s)`);
            } catch (error) {
                this.transition('Error', `resume failed: ${String(error)}`);
                throw error;
            }
            this.deps.systemState.set(true, false);
            this.transition('Started', 'workers resumed');
            return true;
        });
    }

    /** Non-blocking; reads whatever state the controller is in right now. */
    public getHealth(): HealthSnapshot {
        const isPaused = this.deps.systemState.isPaused();
        if (!this.engine) {
            return {
                state: this.state,
                isHealthy: this.state === 'Stopped',
                isPaused,
                engineStatus: null,
                totalWorkers: 0,
                runningWorkers: 0,
                failedWorkers: 0,
                timestamp: this.now(),
            };
        }
        const engineHealth = this.engine.getHealth();
        return {
            state: this.state,
            isHealthy: engineHealth.status === 'Healthy' && !isPaused,
            isPaused,
            engineStatus: engineHealth.status,
            totalWorkers: engineHealth.totalWorkers,
            runningWorkers: engineHealth.runningWorkers,
            failedWorkers: engineHealth.failedWorkers,
            timestamp: this.now(),
        };
    }

    private async disposeEngine(engine: E): Promise<void> {
        try {
            await engine.stop();
        } catch (error) {
            logger.error(`[Lifecycle] engine stop failed: ${String(error)}`);
        }
    }

    private transition(next: ServiceState, reason: string): void {
        const event: StateChangedEvent = {
            previous: this.state,
            next,
            reason,
            timestamp: this.now(),
        };
        this.state = next;
        logger.info(`[Lifecycle] ${event.previous} -> ${next} (${reason})`);
        this.emit('stateChanged', event);
    }
}
