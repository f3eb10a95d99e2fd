export type SystemStateSnapshot = {
    started: boolean;
    paused: boolean;
    updatedAt: number;
};

export interface SystemStateReader {
    isStarted(): boolean;
    isPaused(): boolean;
    snapshot(): SystemStateSnapshot;
}

/**
 * Process-wide run/pause flags. Only the lifecycle controller writes them;
 * workers and the control plane read through {@link SystemStateReader}.
 */
export class SystemState implements SystemStateReader {
    private state: SystemStateSnapshot;

    constructor(private readonly now: () => number = Date.now) {
        this.state = { started: false, paused: false, updatedAt: now() };
    }

    public isStarted(): boolean {
        return this.state.started;
    }

    public isPaused(): boolean {
        return this.state.paused;
    }

    public snapshot(): SystemStateSnapshot {
        return { ...this.state };
    }

    public set(started: boolean, paused: boolean): void {
        this.state = { started, paused: started && paused, updatedAt: this.now() };
    }
}
