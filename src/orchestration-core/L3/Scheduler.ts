// src/orchestration-core/L3/Scheduler.ts
import type { JobSpec, JobState } from '../L0/Ontology.js';

export interface SchedulerStatus {
    /** Raw state as the batch system reports it, e.g. "PENDING". */
    state: string;
    reason?: string;
}

/**
 * External Port: Batch Scheduler
 * The cluster-side half of a job. Adapters throw TransientError for transport faults.
 */
export interface BatchScheduler {
    submit(spec: JobSpec): Promise<string>;
    status(handle: string): Promise<SchedulerStatus>;
    cancel(handle: string): Promise<void>;
    fetchResult(handle: string): Promise<unknown>;
}

const STATE_MAP: ReadonlyMap<string, JobState> = new Map<string, JobState>([
    ['PENDING', 'queued'],
    ['CONFIGURING', 'queued'],
    ['REQUEUED', 'queued'],
    ['SUSPENDED', 'queued'],
    ['RUNNING', 'running'],
    ['COMPLETING', 'running'],
    ['COMPLETED', 'completed'],
    ['FAILED', 'failed'],
    ['NODE_FAIL', 'failed'],
    ['OUT_OF_MEMORY', 'failed'],
    ['BOOT_FAIL', 'failed'],
    ['DEADLINE', 'failed'],
    ['TIMEOUT', 'failed'],
    ['PREEMPTED', 'failed'],
    ['CANCELLED', 'cancelled']
]);

/**
 * Maps a batch-system state onto the job state machine; null when unrecognised.
 * Accepts the "CANCELLED by 1234" form some schedulers report.
 */
export function mapSchedulerState(external: string): JobState | null {
    const head = external.trim().split(/\s+/)[0]?.toUpperCase() ?? '';
    return STATE_MAP.get(head) ?? null;
}
