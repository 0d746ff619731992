import type { Args, CapabilityDefinition, ExecutionReport, JobExecutor, JobSpec, SyncExecutor } from '../L0/Ontology.js';
import { TransientError } from '../Errors.js';
import type { BatchScheduler, SchedulerStatus } from '../L3/Scheduler.js';
import type { JobPolicy } from '../L3/JobLifecycleManager.js';
import type { Evidence, IEventStore } from '../L5/Audit.js';

/**
 * In-process batch scheduler. Each submitted job plays a scripted list of states;
 * the last one repeats forever.
 */
export class FakeScheduler implements BatchScheduler {
    public submitted: JobSpec[] = [];
    public cancelled: string[] = [];
    public statusCalls = 0;

    /** States every newly submitted job will report, in order. */
    public script: string[] = ['RUNNING', 'COMPLETED'];
    public submitFailures = 0;
    public statusFailures = 0;
    public rejectSubmissions = false;
    public failCancel = false;

    private sequence = 0;
    private states: Map<string, string[]> = new Map();
    private results: Map<string, unknown> = new Map();

    async submit(spec: JobSpec): Promise<string> {
        if (this.rejectSubmissions) throw new Error('sbatch: invalid partition');
        if (this.submitFailures > 0) {
            this.submitFailures--;
            throw new TransientError('connection reset by peer');
        }
        const handle = `slurm-${++this.sequence}`;
        this.submitted.push(spec);
        this.states.set(handle, [...this.script]);
        return handle;
    }

    async status(handle: string): Promise<SchedulerStatus> {
        this.statusCalls++;
        if (this.statusFailures > 0) {
            this.statusFailures--;
            throw new TransientError('ssh: connection timed out');
        }
        const states = this.states.get(handle) ?? [];
        const state = states.length > 1 ? states.shift() : states[0];
        return { state: state ?? 'UNKNOWN' };
    }

    async cancel(handle: string): Promise<void> {
        this.cancelled.push(handle);
        if (this.failCancel) throw new Error('scancel: permission denied');
        this.states.set(handle, ['CANCELLED']);
    }

    async fetchResult(handle: string): Promise<unknown> {
        return this.results.get(handle) ?? { trajectory: `${handle}.dcd` };
    }

    public setStates(handle: string, states: string[]): void {
        this.states.set(handle, [...states]);
    }

    public setResult(handle: string, result: unknown): void {
        this.results.set(handle, result);
    }
}

export class MemoryEventStore implements IEventStore {
    public events: Evidence[] = [];

    async append(evidence: Evidence): Promise<void> {
        this.events.push(evidence);
    }
    async getHistory(): Promise<Evidence[]> {
        return [...this.events];
    }
    async getLatest(): Promise<Evidence | null> {
        return this.events[this.events.length - 1] ?? null;
    }
}

export const TEST_POLICY: JobPolicy = {
    minPollIntervalMs: 10,
    maxPollIntervalMs: 40,
    backoffFactor: 2,
    maxDurationMs: 1_000,
    retry: { maxAttempts: 5, initialDelayMs: 1, backoffFactor: 2 }
};

export function definition(name: string, overrides: Partial<CapabilityDefinition> = {}): CapabilityDefinition {
    return {
        name,
        executor: 'test-agent',
        params: [],
        requires: [],
        affects: [],
        mode: 'sync',
        correctionSensitive: false,
        ...overrides
    };
}

/** Sync executor that succeeds and opens the given gates. */
export function opens(...gates: string[]): SyncExecutor {
    return {
        kind: 'sync',
        execute: (args: Args): ExecutionReport => ({
            success: true,
            result: { args },
            gateUpdates: gates.map(gate => ({ gate, state: 'open', evidence: `${gate} ok` }))
        })
    };
}

/** Job-backed executor that, once its job completes, opens the given gates. */
export function jobOpens(...gates: string[]): JobExecutor {
    return {
        kind: 'job',
        executeAsync: (args: Args): JobSpec => ({ jobType: 'md', payload: { ...args } }),
        settle: (result: unknown): ExecutionReport => ({
            success: true,
            result,
            gateUpdates: gates.map(gate => ({ gate, state: 'open', evidence: `${gate} ok` }))
        })
    };
}
