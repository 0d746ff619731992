import { describe, test, expect, jest } from '@jest/globals';
import { OrchestrationLoop } from '../OrchestrationLoop.js';
import { ManualClock } from '../../L0/Clock.js';
import { GateLedger } from '../../L1/GateLedger.js';
import { CapabilityRegistry } from '../../L2/CapabilityRegistry.js';
import { JobLifecycleManager } from '../../L3/JobLifecycleManager.js';
import { Dispatcher } from '../../L4/Dispatcher.js';
import { AuditLog } from '../../L5/Audit.js';
import { InMemoryCorrectiveMemory } from '../../L6/CorrectiveMemory.js';
import { PlanOracle, ScriptedOracle } from '../../L6/Oracle.js';
import type { DecisionOracle } from '../../L6/Oracle.js';
import { ErrorCode } from '../../Errors.js';
import { FakeScheduler, TEST_POLICY, definition, jobOpens, opens } from '../../__tests__/Fakes.js';

function setup(maxInvocations = 10) {
    const clock = new ManualClock();
    const scheduler = new FakeScheduler();
    const registry = new CapabilityRegistry();
    registry.register(definition('A', { affects: ['g1'] }), opens('g1'));
    registry.register(definition('B', { requires: ['g1'], affects: ['g2'] }), opens('g2'));
    registry.register(definition('C', { mode: 'job', affects: ['sim_done'] }), jobOpens('sim_done'));
    registry.register(definition('S', { params: [{ name: 'mode', type: 'string' }], affects: ['s_done'], correctionSensitive: true }), opens('s_done'));

    const ledger = new GateLedger(clock, registry.gateNames());
    const audit = new AuditLog(undefined, clock);
    const jobs = new JobLifecycleManager(scheduler, TEST_POLICY, clock);
    const dispatcher = new Dispatcher(registry, ledger, audit, clock, jobs);
    const memory = new InMemoryCorrectiveMemory();
    const loop = new OrchestrationLoop(dispatcher, registry, ledger, audit, clock, { maxInvocations }, memory);
    return { clock, scheduler, ledger, audit, jobs, dispatcher, memory, loop };
}

describe('Orchestration Loop', () => {
    test('a plan that respects the gates completes', async () => {
        const { loop, audit } = setup();

        const result = await loop.run(new PlanOracle([{ capabilityName: 'A' }, { capabilityName: 'B' }]));

        expect(result.signal).toBe('pipeline_complete');
        expect(result.reason).toBeUndefined();
        expect(result.trail).toEqual([]);
        expect(result.invocations.map(i => `${i.capabilityName}:${i.status}`)).toEqual(['A:succeeded', 'B:succeeded']);
        expect(result.gates['g2']?.state).toBe('open');

        const runRecords = (await audit.getHistory()).filter(e => e.kind === 'pipeline').map(e => e.to);
        expect(runRecords).toEqual(['running', 'pipeline_complete']);
    });

    test('rejections are fed back to the oracle rather than ending the run', async () => {
        const { loop } = setup();
        const oracle = new ScriptedOracle([
            { kind: 'invoke', capabilityName: 'B' },
            { kind: 'invoke', capabilityName: 'A' },
            { kind: 'invoke', capabilityName: 'B' }
        ]);

        const result = await loop.run(oracle);

        expect(result.signal).toBe('pipeline_complete');
        expect(oracle.seen[1]?.lastOutcome).toMatchObject({ status: 'rejected', reason: ErrorCode.GATE_NOT_OPEN, unmetGates: ['g1'] });
        expect(oracle.seen[3]?.observations.map(o => o.status)).toEqual(['rejected', 'succeeded', 'succeeded']);
    });

    test('a misbehaving oracle is stopped by the invocation budget', async () => {
        const { loop } = setup(3);
        const stubborn: DecisionOracle = { proposeNext: () => ({ kind: 'invoke', capabilityName: 'B' }) };

        const result = await loop.run(stubborn);

        expect(result.signal).toBe('pipeline_failed');
        expect(result.reason).toBe('MaxInvocationsExceeded: Invocation budget of 3 exhausted');
        expect(result.invocations).toHaveLength(4);
        expect(result.invocations[3]).toMatchObject({ status: 'rejected', reason: ErrorCode.MAX_INVOCATIONS_EXCEEDED });
        expect(result.trail).toEqual([
            'Pipeline failed: MaxInvocationsExceeded: Invocation budget of 3 exhausted',
            'Invocation #4 B rejected MaxInvocationsExceeded: Invocation budget of 3 exhausted'
        ]);
    });

    test('abort ends the run with the oracle\'s reason', async () => {
        const { loop } = setup();
        const result = await loop.run(new ScriptedOracle([{ kind: 'abort', reason: 'no route to g1' }]));

        expect(result).toMatchObject({ signal: 'pipeline_failed', reason: 'no route to g1' });
        expect(result.trail).toEqual(['Pipeline failed: no route to g1']);
    });

    test('recalled corrections are shown to the oracle before a correction-sensitive proposal', async () => {
        const { loop, memory, dispatcher, audit } = setup();
        await memory.store({
            content: 'careful',
            context: { capabilityName: 'S', gates: { g1: 'unset', g2: 'unset', sim_done: 'unset', s_done: 'unset' } },
            timestamp: '1970-01-01T00:00:00.000Z'
        });

        const first = { kind: 'invoke' as const, capabilityName: 'S', args: { mode: 'fast' } };
        const oracle = new ScriptedOracle([
            first,
            snap => snap.corrections.length > 0
                ? { kind: 'invoke', capabilityName: 'S', args: { mode: 'careful' } }
                : { kind: 'abort', reason: 'no corrections' }
        ]);

        const result = await loop.run(oracle);

        expect(result.signal).toBe('pipeline_complete');
        expect(oracle.seen[1]?.pendingProposal).toEqual(first);
        expect(oracle.seen[1]?.corrections.map(c => c.content)).toEqual(['careful']);
        expect(dispatcher.history().map(i => i.args)).toEqual([{ mode: 'careful' }]);
        expect((await audit.getHistory()).filter(e => e.kind === 'correction').map(e => e.to)).toEqual(['recalled']);
    });

    test('a proposal that is not correction-sensitive is never re-asked', async () => {
        const { loop, memory } = setup();
        await memory.store({ content: 'A needs care', context: { capabilityName: 'A', gates: { g1: 'unset' } }, timestamp: '1970-01-01T00:00:00.000Z' });
        const oracle = new ScriptedOracle([{ kind: 'invoke', capabilityName: 'A' }]);

        await loop.run(oracle);

        expect(oracle.seen.map(s => s.corrections.length)).toEqual([0, 0]);
    });

    test('human-corrected invocations are stored with the gates seen at proposal time', async () => {
        const { loop, memory, audit } = setup();
        const oracle = new ScriptedOracle([{ kind: 'invoke', capabilityName: 'A', correction: 'use chain A only' }]);

        await loop.run(oracle);

        expect(memory.all()).toEqual([{
            content: 'use chain A only',
            context: { capabilityName: 'A', gates: { g1: 'unset', g2: 'unset', sim_done: 'unset', s_done: 'unset' } },
            timestamp: '1970-01-01T00:00:00.000Z'
        }]);
        const stored = (await audit.getHistory()).filter(e => e.kind === 'correction');
        expect(stored.map(e => [e.invocationId, e.to, e.reason])).toEqual([[1, 'stored', 'use chain A only']]);
    });

    test('done waits for background work', async () => {
        const { loop, clock, ledger } = setup();
        const oracle = new ScriptedOracle([
            { kind: 'invoke', capabilityName: 'C', background: true },
            { kind: 'invoke', capabilityName: 'A' },
            { kind: 'done' }
        ]);

        const running = loop.run(oracle);
        await clock.advance(1_000);
        const result = await running;

        expect(result.signal).toBe('pipeline_complete');
        expect(result.invocations.map(i => `${i.capabilityName}:${i.status}`)).toEqual(['C:succeeded', 'A:succeeded']);
        expect(ledger.stateOf('sim_done')).toBe('open');
    });

    test('an unrecoverable job failure ends the run', async () => {
        const { loop, clock, scheduler } = setup();
        scheduler.script = ['FAILED'];
        const oracle = new ScriptedOracle([
            { kind: 'invoke', capabilityName: 'C' },
            { kind: 'invoke', capabilityName: 'A' }
        ]);

        const running = loop.run(oracle);
        await clock.advance(1_000);
        const result = await running;

        expect(result.signal).toBe('pipeline_failed');
        expect(result.reason).toBe('JobFailed: C (invocation #1): Scheduler reported failure');
        expect(result.invocations.map(i => i.capabilityName)).toEqual(['C']);
    });

    test('cancel fails in-flight work and leaves earlier successes alone', async () => {
        const { loop, clock, scheduler, jobs, ledger } = setup();
        scheduler.script = ['RUNNING'];
        const oracle = new ScriptedOracle([
            { kind: 'invoke', capabilityName: 'A' },
            { kind: 'invoke', capabilityName: 'C' }
        ]);

        const running = loop.run(oracle);
        await clock.advance(10);
        expect(jobs.get('job-1')?.state).toBe('running');

        expect(await loop.cancel('operator stop')).toEqual([2]);
        const result = await running;

        expect(result.signal).toBe('pipeline_cancelled');
        expect(result.reason).toBe('operator stop');
        expect(result.invocations.map(i => `${i.capabilityName}:${i.status}:${i.reason ?? ''}`)).toEqual(['A:succeeded:', 'C:failed:Cancelled']);
        expect(jobs.get('job-1')?.state).toBe('cancelled');
        expect(ledger.stateOf('g1')).toBe('open');
        expect(result.trail[0]).toBe('Pipeline cancelled: operator stop');
    });

    test('an oracle that throws fails the run and cancels its background work', async () => {
        const { loop, audit, jobs, dispatcher } = setup();
        let asks = 0;
        const flaky: DecisionOracle = {
            proposeNext: () => {
                asks++;
                if (asks === 1) return { kind: 'invoke', capabilityName: 'C', background: true };
                throw new Error('planner transport down');
            }
        };

        const result = await loop.run(flaky);

        expect(result.signal).toBe('pipeline_failed');
        expect(result.reason).toBe('Oracle fault: planner transport down');
        expect(result.invocations.map(i => `${i.capabilityName}:${i.status}:${i.reason ?? ''}`)).toEqual(['C:failed:Cancelled']);
        expect(jobs.active()).toEqual([]);
        expect(dispatcher.inFlightNames()).toEqual([]);
        expect(result.trail[0]).toBe('Pipeline failed: Oracle fault: planner transport down');

        const runRecords = (await audit.getHistory()).filter(e => e.kind === 'pipeline').map(e => e.to);
        expect(runRecords).toEqual(['running', 'pipeline_failed']);
    });

    test('a corrective memory that throws fails the run', async () => {
        const { loop, memory } = setup();
        jest.spyOn(memory, 'recall').mockRejectedValue(new Error('index offline'));

        const result = await loop.run(new ScriptedOracle([{ kind: 'invoke', capabilityName: 'S', args: { mode: 'fast' } }]));

        expect(result.signal).toBe('pipeline_failed');
        expect(result.reason).toBe('Corrective memory fault: index offline');
        expect(result.invocations).toEqual([]);
    });

    test('an unknown decision kind ends the run instead of being asked again', async () => {
        const { loop } = setup(2);
        let asks = 0;
        const wandering: DecisionOracle = {
            proposeNext: () => {
                asks++;
                return JSON.parse('{"kind": "wait"}');
            }
        };

        const result = await loop.run(wandering);

        expect(asks).toBe(1);
        expect(result.signal).toBe('pipeline_failed');
        expect(result.reason).toBe('Invalid decision: {"kind":"wait"}');
        expect(result.invocations).toEqual([]);
    });
});
