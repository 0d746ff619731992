import { describe, test, expect, beforeEach } from '@jest/globals';
import { JobLifecycleManager } from '../JobLifecycleManager.js';
import type { JobObserver } from '../JobLifecycleManager.js';
import { ManualClock } from '../../L0/Clock.js';
import { ErrorCode } from '../../Errors.js';
import type { JobSpec } from '../../L0/Ontology.js';
import { FakeScheduler, TEST_POLICY } from '../../__tests__/Fakes.js';

const spec: JobSpec = { jobType: 'md', payload: { system_file: '1abc_system.xml', steps: 1000 } };

describe('Job Lifecycle Manager', () => {
    let scheduler: FakeScheduler;
    let clock: ManualClock;
    let transitions: string[];
    let jobs: JobLifecycleManager;

    beforeEach(() => {
        scheduler = new FakeScheduler();
        clock = new ManualClock();
        transitions = [];
        const observer: JobObserver = {
            async onJobTransition(job, from) {
                transitions.push(`${job.id}: ${from} -> ${job.state}`);
            }
        };
        jobs = new JobLifecycleManager(scheduler, TEST_POLICY, clock, observer);
    });

    test('submit creates a submitted record', async () => {
        const id = await jobs.submit(spec, 1);

        expect(id).toBe('job-1');
        expect(jobs.get(id)).toMatchObject({ invocationId: 1, handle: 'slurm-1', state: 'submitted', pollCount: 0, nextPollAt: 10 });
        expect(transitions).toEqual(['job-1: null -> submitted']);
    });

    test('a failed submission creates no record', async () => {
        scheduler.rejectSubmissions = true;

        await expect(jobs.submit(spec, 1)).rejects.toMatchObject({ code: ErrorCode.SUBMISSION_ERROR });
        expect(jobs.list()).toEqual([]);
    });

    test('transient submission faults are retried', async () => {
        scheduler.submitFailures = 2;
        const submitted = jobs.submit(spec, 1);

        await clock.advance(10);
        await expect(submitted).resolves.toBe('job-1');
        expect(scheduler.submitted).toHaveLength(1);
    });

    test('an invocation owns at most one active job', async () => {
        await jobs.submit(spec, 1);
        await expect(jobs.submit(spec, 1)).rejects.toMatchObject({ code: ErrorCode.SUBMISSION_ERROR });
    });

    test('state only moves forward', async () => {
        scheduler.script = ['RUNNING', 'PENDING', 'COMPLETED'];
        const id = await jobs.submit(spec, 1);

        expect(await jobs.poll(id)).toBe('running');
        expect(await jobs.poll(id)).toBe('running');
        expect(jobs.get(id)?.nextPollAt).toBe(20);
        expect(await jobs.poll(id)).toBe('completed');
        expect(transitions).toEqual([
            'job-1: null -> submitted',
            'job-1: submitted -> running',
            'job-1: running -> completed'
        ]);
    });

    test('unrecognised scheduler states are retried as transient reads', async () => {
        scheduler.script = ['BOGUS', 'RUNNING'];
        const id = await jobs.submit(spec, 1);
        const polled = jobs.poll(id);

        await clock.advance(10);
        await expect(polled).resolves.toBe('running');
    });

    test('three transient status faults followed by success still complete', async () => {
        scheduler.statusFailures = 3;
        const id = await jobs.submit(spec, 1);
        const done = jobs.awaitTerminal(id);

        await clock.advance(1_000);
        const job = await done;

        expect(job.state).toBe('completed');
        expect(job.pollCount).toBe(2);
        expect(scheduler.statusCalls).toBe(5);
    });

    test('exhausted status retries fail the job', async () => {
        scheduler.statusFailures = 5;
        const id = await jobs.submit(spec, 1);
        const polled = jobs.poll(id);

        await clock.advance(100);
        await expect(polled).resolves.toBe('failed');
        expect(jobs.get(id)?.failureReason).toBe('Status check failed after 5 attempts: ssh: connection timed out');
    });

    test('a scheduler failure report carries its reason', async () => {
        scheduler.script = ['FAILED'];
        const id = await jobs.submit(spec, 1);

        expect(await jobs.poll(id)).toBe('failed');
        expect(jobs.get(id)?.failureReason).toBe('Scheduler reported failure');
    });

    test('a job that never leaves running times out', async () => {
        scheduler.script = ['RUNNING'];
        jobs = new JobLifecycleManager(scheduler, { ...TEST_POLICY, maxDurationMs: 100 }, clock);
        const id = await jobs.submit(spec, 1);
        const done = jobs.awaitTerminal(id);

        await clock.advance(1_000);
        const job = await done;

        expect(job.state).toBe('timed_out');
        expect(job.failureReason).toBe('No terminal state within 100ms');
        expect(job.pollCount).toBe(4);
        expect(scheduler.cancelled).toEqual(['slurm-1']);
    });

    test('cancel wakes the waiter and reaches the scheduler', async () => {
        scheduler.script = ['RUNNING'];
        const id = await jobs.submit(spec, 1);
        const done = jobs.awaitTerminal(id);
        await clock.advance(10);
        expect(jobs.get(id)?.state).toBe('running');

        await jobs.cancel(id);
        const job = await done;

        expect(job.state).toBe('cancelled');
        expect(job.failureReason).toBe('Cancellation requested');
        expect(scheduler.cancelled).toEqual(['slurm-1']);
    });

    test('cancel is best-effort when the scheduler refuses', async () => {
        scheduler.failCancel = true;
        const id = await jobs.submit(spec, 1);

        await jobs.cancel(id, 'user abort');
        await jobs.cancel(id);

        expect(jobs.get(id)?.state).toBe('cancelled');
        expect(jobs.get(id)?.failureReason).toBe('user abort');
        expect(scheduler.cancelled).toEqual(['slurm-1']);
    });

    test('fetchResult only succeeds once completed', async () => {
        scheduler.script = ['COMPLETED'];
        const id = await jobs.submit(spec, 1);

        await expect(jobs.fetchResult(id)).rejects.toMatchObject({ code: ErrorCode.JOB_NOT_COMPLETE });
        await jobs.poll(id);
        await expect(jobs.fetchResult(id)).resolves.toEqual({ trajectory: 'slurm-1.dcd' });
    });

    test('unknown job ids are refused', async () => {
        await expect(jobs.poll('job-9')).rejects.toMatchObject({ code: ErrorCode.UNKNOWN_JOB });
        expect(jobs.get('job-9')).toBeUndefined();
    });

    test('list and active', async () => {
        scheduler.script = ['COMPLETED'];
        const first = await jobs.submit(spec, 1);
        await jobs.submit(spec, 2);
        await jobs.poll(first);

        expect(jobs.list().map(j => j.id)).toEqual(['job-1', 'job-2']);
        expect(jobs.active().map(j => j.id)).toEqual(['job-2']);
    });
});
