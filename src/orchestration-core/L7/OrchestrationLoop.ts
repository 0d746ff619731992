// src/orchestration-core/L7/OrchestrationLoop.ts
import type { Correction, InvocationID, Outcome, PipelineResult, PipelineSignal } from '../L0/Ontology.js';
import type { Clock } from '../L0/Clock.js';
import { ErrorCode, describeError } from '../Errors.js';
import { GateLedger } from '../L1/GateLedger.js';
import { CapabilityRegistry } from '../L2/CapabilityRegistry.js';
import { Dispatcher } from '../L4/Dispatcher.js';
import { AuditLog } from '../L5/Audit.js';
import { explainHalt } from '../L5/Projections.js';
import type { CorrectiveMemory } from '../L6/CorrectiveMemory.js';
import { describeDecision, isDecision } from '../L6/Oracle.js';
import type { Decision, DecisionOracle, InvokeDecision, PipelineSnapshot } from '../L6/Oracle.js';

export interface LoopOptions {
    /** Proposals allowed per run; the next one ends the run with MaxInvocationsExceeded. */
    maxInvocations: number;
}

interface Verdict {
    signal: PipelineSignal;
    reason?: string;
}

interface RunState {
    observations: Outcome[];
    background: Promise<void>[];
    issued: number;
    ending?: string;
}

/**
 * Orchestration Loop
 * Asks the oracle, dispatches, feeds the outcome back, until the oracle is done,
 * the budget is spent, a job fails for good, or the run is cancelled.
 *
 * Rejections and ordinary failures never end the run; they are observations.
 */
export class OrchestrationLoop {
    private cancelRequested = false;
    private cancelReason = 'Pipeline cancelled';

    constructor(
        private dispatcher: Dispatcher,
        private registry: CapabilityRegistry,
        private ledger: GateLedger,
        private audit: AuditLog,
        private clock: Clock,
        private options: LoopOptions,
        private memory?: CorrectiveMemory
    ) { }

    public async run(oracle: DecisionOracle): Promise<PipelineResult> {
        const state: RunState = { observations: [], background: [], issued: 0 };
        await this.audit.append({ invocationId: null, kind: 'pipeline', subject: 'run', from: null, to: 'running' });
        console.log(`[OrchestrationLoop] Run started (budget: ${this.options.maxInvocations} invocations)`);

        let verdict: Verdict;
        try {
            verdict = await this.drive(oracle, state);
        } catch (e) {
            console.error('[OrchestrationLoop] Run faulted:', e);
            verdict = { signal: 'pipeline_failed', reason: `Loop fault: ${describeError(e)}` };
        }

        if (verdict.signal !== 'pipeline_complete') {
            // Outstanding background work does not outlive a failed or cancelled run.
            await this.dispatcher.cancelAll(verdict.reason ?? this.cancelReason);
        }
        await Promise.all(state.background);

        await this.audit.append({
            invocationId: null,
            kind: 'pipeline',
            subject: 'run',
            from: 'running',
            to: verdict.signal,
            ...(verdict.reason !== undefined ? { reason: verdict.reason } : {})
        });

        const trail = verdict.signal === 'pipeline_complete' ? [] : explainHalt(await this.audit.getHistory());
        const log = verdict.signal === 'pipeline_complete' ? console.log : console.warn;
        log(`[OrchestrationLoop] Run ended: ${verdict.signal}${verdict.reason ? ` (${verdict.reason})` : ''}`);

        return {
            signal: verdict.signal,
            ...(verdict.reason !== undefined ? { reason: verdict.reason } : {}),
            invocations: this.dispatcher.history(),
            gates: { ...this.ledger.snapshot() },
            trail
        };
    }

    /**
     * Fails every live invocation with Cancelled and cancels their jobs.
     * The running loop ends `pipeline_cancelled` at its next step.
     */
    public async cancel(reason: string = 'Pipeline cancelled'): Promise<InvocationID[]> {
        this.cancelRequested = true;
        this.cancelReason = reason;
        console.warn(`[OrchestrationLoop] Cancellation requested: ${reason}`);
        return this.dispatcher.cancelAll(reason);
    }

    private async drive(oracle: DecisionOracle, state: RunState): Promise<Verdict> {
        for (;;) {
            const halted = this.halted(state);
            if (halted) return halted;

            let decision = await this.ask(oracle, this.snapshot(state, []));
            if (this.cancelRequested) return { signal: 'pipeline_cancelled', reason: this.cancelReason };

            if (decision.kind === 'invoke') {
                decision = await this.withCorrections(oracle, state, decision);
            }

            switch (decision.kind) {
                case 'abort':
                    return { signal: 'pipeline_failed', reason: decision.reason };
                case 'done': {
                    await Promise.all(state.background);
                    return this.halted(state) ?? { signal: 'pipeline_complete' };
                }
                case 'invoke': {
                    if (state.issued >= this.options.maxInvocations) {
                        const detail = `Invocation budget of ${this.options.maxInvocations} exhausted`;
                        const outcome = await this.dispatcher.refuse(decision.capabilityName, decision.args ?? {}, ErrorCode.MAX_INVOCATIONS_EXCEEDED, detail);
                        this.observe(state, outcome);
                        return { signal: 'pipeline_failed', reason: `${ErrorCode.MAX_INVOCATIONS_EXCEEDED}: ${detail}` };
                    }
                    state.issued++;
                    const pending = this.dispatch(state, decision);
                    if (decision.background) state.background.push(pending);
                    else await pending;
                    break;
                }
                default: {
                    const unreachable: never = decision;
                    return { signal: 'pipeline_failed', reason: `Invalid decision: ${describeDecision(unreachable)}` };
                }
            }
        }
    }

    /** A throwing oracle or a malformed answer is an abort. */
    private async ask(oracle: DecisionOracle, snapshot: PipelineSnapshot): Promise<Decision> {
        let answer: unknown;
        try {
            answer = await oracle.proposeNext(snapshot);
        } catch (e) {
            console.error('[OrchestrationLoop] Oracle faulted:', e);
            return { kind: 'abort', reason: `Oracle fault: ${describeError(e)}` };
        }
        if (!isDecision(answer)) {
            console.error(`[OrchestrationLoop] Oracle returned an invalid decision: ${describeDecision(answer)}`);
            return { kind: 'abort', reason: `Invalid decision: ${describeDecision(answer)}` };
        }
        return answer;
    }

    private halted(state: RunState): Verdict | undefined {
        if (this.cancelRequested) return { signal: 'pipeline_cancelled', reason: this.cancelReason };
        if (state.ending !== undefined) return { signal: 'pipeline_failed', reason: state.ending };
        return undefined;
    }

    /**
     * For a correction-sensitive capability, recall and, if anything comes back,
     * ask once more with the corrections in view. The second answer stands.
     */
    private async withCorrections(oracle: DecisionOracle, state: RunState, proposal: InvokeDecision): Promise<Decision> {
        const capability = this.registry.find(proposal.capabilityName);
        if (!this.memory || !capability?.correctionSensitive) return proposal;

        let corrections: Correction[];
        try {
            corrections = await this.memory.recall({
                capabilityName: proposal.capabilityName,
                args: proposal.args ?? {},
                gates: this.ledger.states()
            });
        } catch (e) {
            console.error('[OrchestrationLoop] Corrective memory faulted:', e);
            return { kind: 'abort', reason: `Corrective memory fault: ${describeError(e)}` };
        }
        if (corrections.length === 0) return proposal;

        console.log(`[OrchestrationLoop] Recalled ${corrections.length} correction(s) for '${proposal.capabilityName}'`);
        await this.audit.append({
            invocationId: null,
            kind: 'correction',
            subject: proposal.capabilityName,
            from: null,
            to: 'recalled',
            metadata: { count: corrections.length }
        });
        return this.ask(oracle, this.snapshot(state, corrections, proposal));
    }

    private async dispatch(state: RunState, decision: InvokeDecision): Promise<void> {
        const gatesAtProposal = this.ledger.states();
        try {
            const outcome = await this.dispatcher.propose(decision.capabilityName, decision.args ?? {});
            this.observe(state, outcome);

            if (decision.correction !== undefined && this.memory) {
                const correction: Correction = {
                    content: decision.correction,
                    context: { capabilityName: decision.capabilityName, gates: gatesAtProposal },
                    timestamp: new Date(this.clock.now()).toISOString()
                };
                await this.memory.store(correction);
                await this.audit.append({
                    invocationId: outcome.invocationId,
                    kind: 'correction',
                    subject: decision.capabilityName,
                    from: null,
                    to: 'stored',
                    reason: decision.correction
                });
            }
        } catch (e) {
            console.error(`[OrchestrationLoop] Dispatch of '${decision.capabilityName}' faulted:`, e);
            state.ending ??= `Dispatch of '${decision.capabilityName}' faulted: ${describeError(e)}`;
        }
    }

    private observe(state: RunState, outcome: Outcome): void {
        state.observations.push(outcome);
        if (outcome.status === 'failed' && outcome.reason === ErrorCode.JOB_FAILED) {
            state.ending ??= `${ErrorCode.JOB_FAILED}: ${outcome.capabilityName} (invocation #${outcome.invocationId}): ${outcome.detail ?? 'job failed'}`;
        }
    }

    private snapshot(state: RunState, corrections: Correction[], pendingProposal?: InvokeDecision): PipelineSnapshot {
        const lastOutcome = state.observations[state.observations.length - 1];
        return {
            gates: this.ledger.snapshot(),
            history: this.dispatcher.history(),
            observations: [...state.observations],
            ...(lastOutcome ? { lastOutcome } : {}),
            corrections,
            ...(pendingProposal ? { pendingProposal } : {}),
            invocationsUsed: state.issued,
            invocationBudget: this.options.maxInvocations
        };
    }
}
