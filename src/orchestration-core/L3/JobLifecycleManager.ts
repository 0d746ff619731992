// src/orchestration-core/L3/JobLifecycleManager.ts
import type { InvocationID, Job, JobID, JobSpec, JobState } from '../L0/Ontology.js';
import { TERMINAL_JOB_STATES } from '../L0/Ontology.js';
import type { Clock } from '../L0/Clock.js';
import { ErrorCode, OrchestrationError, TransientError, describeError } from '../Errors.js';
import type { BatchScheduler } from './Scheduler.js';
import { mapSchedulerState } from './Scheduler.js';
import { executeWithRetry, nextInterval } from './Retry.js';
import type { RetryPolicy } from './Retry.js';

export interface JobPolicy {
    minPollIntervalMs: number;
    maxPollIntervalMs: number;
    backoffFactor: number;
    /** Wall-clock budget from submission; past it the job is timed out. */
    maxDurationMs: number;
    retry: RetryPolicy;
}

export interface JobObserver {
    onJobTransition(job: Job, from: JobState | null, reason?: string): Promise<void>;
}

interface JobRecord {
    job: Job;
    interval: number;
    settled: Promise<void>;
    resolveSettled: () => void;
}

const RANK: Record<JobState, number> = {
    submitted: 0,
    queued: 1,
    running: 2,
    completed: 3,
    failed: 3,
    timed_out: 3,
    cancelled: 3
};

export function isTerminalJobState(state: JobState): boolean {
    return TERMINAL_JOB_STATES.includes(state);
}

/**
 * Job Lifecycle Manager
 * Owns external batch jobs: submitted -> queued -> running -> completed | failed | timed_out,
 * with cancelled reachable from any non-terminal state.
 *
 * The manager is the pipeline's only timeout mechanism for external work.
 */
export class JobLifecycleManager {
    private jobs: Map<JobID, JobRecord> = new Map();
    private sequence = 0;

    constructor(
        private scheduler: BatchScheduler,
        private policy: JobPolicy,
        private clock: Clock,
        private observer?: JobObserver
    ) { }

    /**
     * Submits through the scheduler, retrying transient faults.
     * No record exists unless the scheduler accepted the job.
     */
    public async submit(spec: JobSpec, invocationId: InvocationID): Promise<JobID> {
        const owned = this.activeFor(invocationId);
        if (owned) {
            throw new OrchestrationError(
                ErrorCode.SUBMISSION_ERROR,
                `Invocation #${invocationId} already owns active job ${owned.id}`,
                { invocationId, jobId: owned.id }
            );
        }

        let handle: string;
        try {
            handle = await executeWithRetry(() => this.scheduler.submit(spec), this.policy.retry, this.clock, `submit ${spec.jobType}`);
        } catch (e) {
            throw new OrchestrationError(
                ErrorCode.SUBMISSION_ERROR,
                `Submission of '${spec.jobType}' failed: ${describeError(e)}`,
                { invocationId, jobType: spec.jobType }
            );
        }

        const now = this.clock.now();
        let resolveSettled: () => void = () => undefined;
        const settled = new Promise<void>(resolve => { resolveSettled = resolve; });
        const job: Job = {
            id: `job-${++this.sequence}`,
            invocationId,
            handle,
            spec,
            state: 'submitted',
            pollCount: 0,
            submittedAt: now,
            nextPollAt: now + this.policy.minPollIntervalMs
        };
        this.jobs.set(job.id, { job, interval: this.policy.minPollIntervalMs, settled, resolveSettled });

        console.log(`[JobManager] Submitted ${job.id} (${spec.jobType}) as ${handle} for invocation #${invocationId}`);
        await this.observer?.onJobTransition({ ...job }, null);
        return job.id;
    }

    /**
     * One status check against the scheduler. Transient faults are retried;
     * exhausting the retries fails the job. Backward reports (running -> queued) are ignored.
     */
    public async poll(jobId: JobID): Promise<JobState> {
        const rec = this.record(jobId);
        if (isTerminalJobState(rec.job.state)) return rec.job.state;

        rec.job.pollCount++;
        let observed: { state: JobState; reason?: string };
        try {
            observed = await executeWithRetry(async () => {
                const status = await this.scheduler.status(rec.job.handle);
                const state = mapSchedulerState(status.state);
                if (state === null) throw new TransientError(`Unrecognised scheduler state '${status.state}'`);
                return status.reason === undefined ? { state } : { state, reason: status.reason };
            }, this.policy.retry, this.clock, `status ${jobId}`);
        } catch (e) {
            // Cancellation or expiry may have landed while we were retrying.
            if (isTerminalJobState(rec.job.state)) return rec.job.state;
            await this.transition(rec, 'failed', `Status check failed after ${this.policy.retry.maxAttempts} attempts: ${describeError(e)}`);
            return rec.job.state;
        }

        if (isTerminalJobState(rec.job.state)) return rec.job.state;

        const changed = RANK[observed.state] > RANK[rec.job.state];
        if (changed) {
            const reason = observed.state === 'failed'
                ? observed.reason ?? 'Scheduler reported failure'
                : observed.reason;
            await this.transition(rec, observed.state, reason);
        }

        rec.interval = nextInterval(
            { minIntervalMs: this.policy.minPollIntervalMs, maxIntervalMs: this.policy.maxPollIntervalMs, factor: this.policy.backoffFactor },
            rec.interval,
            changed
        );
        rec.job.nextPollAt = this.clock.now() + rec.interval;
        return rec.job.state;
    }

    /**
     * Polls with backoff until the job is terminal, cancelled, or out of time.
     */
    public async awaitTerminal(jobId: JobID): Promise<Job> {
        const rec = this.record(jobId);

        while (!isTerminalJobState(rec.job.state)) {
            const remaining = rec.job.submittedAt + this.policy.maxDurationMs - this.clock.now();
            if (remaining <= 0) {
                await this.expire(rec);
                break;
            }

            const wait = Math.min(rec.interval, remaining);
            rec.job.nextPollAt = this.clock.now() + wait;
            await Promise.race([this.clock.sleep(wait), rec.settled]);

            if (isTerminalJobState(rec.job.state)) break;
            if (this.clock.now() - rec.job.submittedAt >= this.policy.maxDurationMs) {
                await this.expire(rec);
                break;
            }
            await this.poll(jobId);
        }

        return { ...rec.job };
    }

    /**
     * Best-effort: a scheduler that refuses the cancel is logged, the record is cancelled regardless.
     */
    public async cancel(jobId: JobID, reason: string = 'Cancellation requested'): Promise<void> {
        const rec = this.record(jobId);
        if (isTerminalJobState(rec.job.state)) return;

        await this.transition(rec, 'cancelled', reason);
        try {
            await executeWithRetry(() => this.scheduler.cancel(rec.job.handle), this.policy.retry, this.clock, `cancel ${jobId}`);
        } catch (e) {
            console.warn(`[JobManager] Scheduler cancel of ${jobId} (${rec.job.handle}) failed: ${describeError(e)}`);
        }
    }

    public async fetchResult(jobId: JobID): Promise<unknown> {
        const rec = this.record(jobId);
        if (rec.job.state !== 'completed') {
            throw new OrchestrationError(ErrorCode.JOB_NOT_COMPLETE, `Job ${jobId} is ${rec.job.state}`, { jobId, state: rec.job.state });
        }
        if ('result' in rec.job) return rec.job.result;

        try {
            const result = await executeWithRetry(() => this.scheduler.fetchResult(rec.job.handle), this.policy.retry, this.clock, `fetch ${jobId}`);
            rec.job.result = result;
            return result;
        } catch (e) {
            throw new OrchestrationError(ErrorCode.JOB_FAILED, `Result fetch for ${jobId} failed: ${describeError(e)}`, { jobId });
        }
    }

    public get(jobId: JobID): Job | undefined {
        const rec = this.jobs.get(jobId);
        return rec ? { ...rec.job } : undefined;
    }

    public list(): Job[] {
        return Array.from(this.jobs.values(), r => ({ ...r.job }));
    }

    public active(): Job[] {
        return this.list().filter(j => !isTerminalJobState(j.state));
    }

    private activeFor(invocationId: InvocationID): Job | undefined {
        return this.active().find(j => j.invocationId === invocationId);
    }

    private record(jobId: JobID): JobRecord {
        const rec = this.jobs.get(jobId);
        if (!rec) throw new OrchestrationError(ErrorCode.UNKNOWN_JOB, `Job ${jobId} not found`);
        return rec;
    }

    private async expire(rec: JobRecord): Promise<void> {
        await this.transition(rec, 'timed_out', `No terminal state within ${this.policy.maxDurationMs}ms`);
        try {
            await this.scheduler.cancel(rec.job.handle);
        } catch (e) {
            console.warn(`[JobManager] Could not cancel timed-out ${rec.job.id}: ${describeError(e)}`);
        }
    }

    private async transition(rec: JobRecord, to: JobState, reason?: string): Promise<void> {
        const from = rec.job.state;
        rec.job.state = to;
        if (reason !== undefined && isTerminalJobState(to) && to !== 'completed') {
            rec.job.failureReason = reason;
        }
        if (isTerminalJobState(to)) rec.resolveSettled();

        console.log(`[JobManager] ${rec.job.id}: ${from} -> ${to}${reason ? ` (${reason})` : ''}`);
        await this.observer?.onJobTransition({ ...rec.job }, from, reason);
    }
}
