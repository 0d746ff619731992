/**
 * Environment Port: Clock
 * Normalizes time and waiting for every stratum that polls or stamps.
 */
export interface Clock {
    /** Epoch milliseconds. */
    now(): number;
    sleep(ms: number): Promise<void>;
}

export class SystemClock implements Clock {
    public now(): number {
        return Date.now();
    }

    public sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
    }
}

interface Sleeper {
    wakeAt: number;
    resolve: () => void;
}

const settle = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Deterministic clock: time only moves when `advance` is called.
 * Sleepers whose deadline falls inside an advanced window are woken in deadline order,
 * including sleepers registered while the window is being played out.
 */
export class ManualClock implements Clock {
    private current: number;
    private sleepers: Sleeper[] = [];

    constructor(start: number = 0) {
        this.current = start;
    }

    public now(): number {
        return this.current;
    }

    public sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.sleepers.push({ wakeAt: this.current + Math.max(0, ms), resolve });
        });
    }

    public get pendingSleepers(): number {
        return this.sleepers.length;
    }

    public async advance(ms: number): Promise<void> {
        const target = this.current + ms;
        for (;;) {
            await settle();
            const due = this.sleepers
                .filter(s => s.wakeAt <= target)
                .sort((a, b) => a.wakeAt - b.wakeAt)[0];
            if (!due) break;
            this.sleepers = this.sleepers.filter(s => s !== due);
            this.current = Math.max(this.current, due.wakeAt);
            due.resolve();
        }
        this.current = target;
        await settle();
    }

    /** Lets queued promise chains run without moving time. */
    public async flush(): Promise<void> {
        await settle();
    }
}
