// src/orchestration-core/L4/Dispatcher.ts
import type {
    Args,
    Capability,
    CapabilityName,
    ExecutionReport,
    GateUpdate,
    Invocation,
    InvocationID,
    InvocationStatus,
    JobExecutor,
    Outcome,
    SyncExecutor
} from '../L0/Ontology.js';
import type { Clock } from '../L0/Clock.js';
import { ErrorCode, OrchestrationError, describeError } from '../Errors.js';
import type { FailureCode, RejectionCode } from '../Errors.js';
import { GateLedger } from '../L1/GateLedger.js';
import type { GateTransition } from '../L1/GateLedger.js';
import { ArgumentsGuard, GateGuard, InFlightGuard } from '../L1/Guards.js';
import type { GuardFailure } from '../L1/Guards.js';
import { CapabilityRegistry } from '../L2/CapabilityRegistry.js';
import { JobLifecycleManager } from '../L3/JobLifecycleManager.js';
import { AuditLog } from '../L5/Audit.js';

const TERMINAL: readonly InvocationStatus[] = ['succeeded', 'failed', 'rejected'];

function reportProblem(report: unknown): string | null {
    if (typeof report !== 'object' || report === null) return 'executor returned no report';
    if (!('success' in report) || typeof report.success !== 'boolean') return 'report.success must be boolean';
    if (!('gateUpdates' in report) || report.gateUpdates === undefined) return null;
    if (!Array.isArray(report.gateUpdates)) return 'report.gateUpdates must be an array';

    const updates: unknown[] = report.gateUpdates;
    for (const [i, update] of updates.entries()) {
        const problem = updateProblem(update);
        if (problem) return `report.gateUpdates[${i}]${problem}`;
    }
    return null;
}

function updateProblem(update: unknown): string | null {
    if (typeof update !== 'object' || update === null) return ' must be an object';
    if (!('gate' in update) || typeof update.gate !== 'string' || update.gate.length === 0) return '.gate must be a non-empty string';
    if (!('state' in update) || (update.state !== 'open' && update.state !== 'blocked')) return ".state must be 'open' or 'blocked'";
    if (!('evidence' in update) || typeof update.evidence !== 'string') return '.evidence must be a string';
    return null;
}

/**
 * Dispatcher
 * The sole enforcement point between a proposed capability call and its executor.
 *
 * Every proposal gets an invocation id on arrival. Lookup, argument, gate and in-flight
 * checks all run before the first await, so at most one invocation per capability is ever
 * pending or running, and a rejected proposal never gets past `rejected`.
 */
export class Dispatcher {
    private invocations: Map<InvocationID, Invocation> = new Map();
    private outcomes: Map<InvocationID, Outcome> = new Map();
    private inFlight: Map<CapabilityName, InvocationID> = new Map();
    private nextId = 1;
    private cancelled = false;

    // Pressure Tracker: capability -> consecutive gate rejections
    private rejectionTracker: Map<CapabilityName, number> = new Map();
    private readonly PRESSURE_THRESHOLD = 3;

    constructor(
        private registry: CapabilityRegistry,
        private ledger: GateLedger,
        private audit: AuditLog,
        private clock: Clock,
        private jobs?: JobLifecycleManager
    ) { }

    public get isCancelled(): boolean {
        return this.cancelled;
    }

    public async propose(capabilityName: CapabilityName, args: Args = {}): Promise<Outcome> {
        const id = this.nextId++;

        if (this.cancelled) {
            return this.reject(id, capabilityName, args, { ok: false, code: ErrorCode.CANCELLED, violation: 'Pipeline run has been cancelled' });
        }

        // 1. Lookup
        const capability = this.registry.find(capabilityName);
        if (!capability) {
            return this.reject(id, capabilityName, args, {
                ok: false,
                code: ErrorCode.UNKNOWN_CAPABILITY,
                violation: `Capability '${capabilityName}' is not registered`
            });
        }

        // 2. Arguments
        const argCheck = ArgumentsGuard({ params: capability.params, args });
        if (!argCheck.ok) return this.reject(id, capabilityName, args, argCheck);

        // 3. Gates
        const gateCheck = GateGuard({ required: capability.requires, ledger: this.ledger });
        if (!gateCheck.ok) return this.reject(id, capabilityName, args, gateCheck);

        // 4. One live invocation per capability
        const flightCheck = InFlightGuard({ capabilityName, inFlight: this.inFlight });
        if (!flightCheck.ok) return this.reject(id, capabilityName, args, flightCheck);

        this.rejectionTracker.delete(capabilityName);
        const invocation: Invocation = {
            id,
            capabilityName,
            args: { ...args },
            status: 'pending',
            startedAt: this.clock.now(),
            gateUpdatesApplied: []
        };
        this.invocations.set(id, invocation);
        this.inFlight.set(capabilityName, id);

        try {
            await this.record(invocation, null, 'pending');
            if (this.isTerminal(invocation)) return this.outcomeOf(invocation);

            invocation.status = 'running';
            await this.record(invocation, 'pending', 'running');
            if (this.isTerminal(invocation)) return this.outcomeOf(invocation);

            const handler = capability.handler;
            return handler.kind === 'sync'
                ? await this.runSync(capability, handler, invocation)
                : await this.runJob(capability, handler, invocation);
        } finally {
            if (this.inFlight.get(capabilityName) === id) this.inFlight.delete(capabilityName);
        }
    }

    /**
     * Fails every pending/running invocation with Cancelled and cancels their jobs.
     * Terminal invocations and the gates they opened are left as they are.
     */
    public async cancelAll(reason: string = 'Pipeline cancelled'): Promise<InvocationID[]> {
        this.cancelled = true;
        const live = Array.from(this.invocations.values()).filter(inv => !this.isTerminal(inv));

        // Mark first, so no executor finishing mid-cancel can still settle.
        const transitions = live.map(inv => {
            const from = inv.status;
            this.markTerminal(inv, { status: 'failed', invocationId: inv.id, capabilityName: inv.capabilityName, reason: ErrorCode.CANCELLED, detail: reason, gateUpdatesApplied: [] });
            return { inv, from };
        });

        for (const { inv, from } of transitions) {
            await this.record(inv, from, 'failed', ErrorCode.CANCELLED, reason);
            if (inv.jobId && this.jobs) {
                await this.jobs.cancel(inv.jobId, reason);
            }
        }

        if (live.length > 0) {
            console.log(`[Dispatcher] Cancelled ${live.length} in-flight invocation(s): ${live.map(i => `#${i.id}`).join(', ')}`);
        }
        return live.map(i => i.id);
    }

    /**
     * Records a proposal the caller refuses before it reaches the guards,
     * e.g. one past the run's invocation budget. It still gets an id and an audit record.
     */
    public refuse(capabilityName: CapabilityName, args: Args, code: RejectionCode, detail: string): Promise<Outcome> {
        return this.reject(this.nextId++, capabilityName, args, { ok: false, code, violation: detail });
    }

    public get(id: InvocationID): Invocation | undefined {
        const inv = this.invocations.get(id);
        return inv ? Dispatcher.copy(inv) : undefined;
    }

    public outcome(id: InvocationID): Outcome | undefined {
        return this.outcomes.get(id);
    }

    /** All invocations in id order, i.e. in order of arrival. */
    public history(): Invocation[] {
        return Array.from(this.invocations.values())
            .sort((a, b) => a.id - b.id)
            .map(Dispatcher.copy);
    }

    public inFlightNames(): CapabilityName[] {
        return Array.from(this.inFlight.keys());
    }

    private async runSync(capability: Capability, handler: SyncExecutor, invocation: Invocation): Promise<Outcome> {
        let report: ExecutionReport;
        try {
            report = await handler.execute({ ...invocation.args });
        } catch (e) {
            console.error(`[Dispatcher] Executor fault in '${capability.name}' (#${invocation.id}):`, e);
            return this.fail(invocation, ErrorCode.EXECUTOR_FAULT, describeError(e));
        }
        return this.settle(capability, invocation, report);
    }

    private async runJob(capability: Capability, handler: JobExecutor, invocation: Invocation): Promise<Outcome> {
        if (!this.jobs) {
            return this.fail(invocation, ErrorCode.EXECUTOR_FAULT, `'${capability.name}' is job-backed but no job manager is configured`);
        }

        let jobId: string;
        try {
            const spec = await handler.executeAsync({ ...invocation.args });
            if (this.isTerminal(invocation)) return this.outcomeOf(invocation);
            jobId = await this.jobs.submit(spec, invocation.id);
        } catch (e) {
            const code = e instanceof OrchestrationError && e.code === ErrorCode.SUBMISSION_ERROR
                ? ErrorCode.SUBMISSION_ERROR
                : ErrorCode.EXECUTOR_FAULT;
            if (code === ErrorCode.EXECUTOR_FAULT) {
                console.error(`[Dispatcher] Executor fault preparing job for '${capability.name}' (#${invocation.id}):`, e);
            }
            return this.fail(invocation, code, describeError(e));
        }

        invocation.jobId = jobId;
        if (this.isTerminal(invocation)) {
            // Cancelled while the submission was in flight.
            await this.jobs.cancel(jobId, invocation.detail ?? 'Invocation cancelled');
            return this.outcomeOf(invocation);
        }

        const job = await this.jobs.awaitTerminal(jobId);
        switch (job.state) {
            case 'completed': {
                let report: ExecutionReport;
                try {
                    const result = await this.jobs.fetchResult(jobId);
                    try {
                        report = await handler.settle(result, { ...invocation.args });
                    } catch (e) {
                        console.error(`[Dispatcher] Executor fault settling ${jobId} for '${capability.name}':`, e);
                        return this.fail(invocation, ErrorCode.EXECUTOR_FAULT, describeError(e));
                    }
                } catch (e) {
                    return this.fail(invocation, ErrorCode.JOB_FAILED, describeError(e));
                }
                return this.settle(capability, invocation, report);
            }
            case 'timed_out':
                return this.fail(invocation, ErrorCode.JOB_TIMEOUT, job.failureReason ?? `Job ${jobId} timed out`);
            case 'cancelled':
                return this.fail(invocation, ErrorCode.CANCELLED, job.failureReason ?? `Job ${jobId} cancelled`);
            default:
                return this.fail(invocation, ErrorCode.JOB_FAILED, job.failureReason ?? `Job ${jobId} failed`);
        }
    }

    /**
     * Applies a report's gate updates, all or nothing, then closes the invocation
     * on the executor's own success flag.
     */
    private async settle(capability: Capability, invocation: Invocation, report: ExecutionReport): Promise<Outcome> {
        if (this.isTerminal(invocation)) return this.outcomeOf(invocation);

        const problem = reportProblem(report);
        if (problem) return this.fail(invocation, ErrorCode.EXECUTOR_FAULT, `Malformed report: ${problem}`);

        const updates: GateUpdate[] = report.gateUpdates ?? [];
        const undeclared = updates.filter(u => !capability.affects.includes(u.gate));
        if (undeclared.length > 0) {
            return this.fail(invocation, ErrorCode.EXECUTOR_FAULT, `Undeclared gate update(s): ${undeclared.map(u => u.gate).join(', ')}`);
        }

        const applied: GateUpdate[] = [];
        const transitions: GateTransition[] = [];
        for (const u of updates) {
            const t = u.state === 'open'
                ? this.ledger.open(u.gate, u.evidence, invocation.id)
                : this.ledger.block(u.gate, u.evidence, invocation.id);
            transitions.push(t);
            if (!t.stale) applied.push({ gate: u.gate, state: u.state, evidence: u.evidence });
        }

        const outcome: Outcome = report.success
            ? { status: 'succeeded', invocationId: invocation.id, capabilityName: invocation.capabilityName, result: report.result, gateUpdatesApplied: applied }
            : { status: 'failed', invocationId: invocation.id, capabilityName: invocation.capabilityName, detail: 'Executor reported failure', result: report.result, gateUpdatesApplied: applied };
        this.markTerminal(invocation, outcome);

        for (const t of transitions) {
            await this.audit.append({
                invocationId: invocation.id,
                kind: 'gate',
                subject: t.gate,
                from: t.from,
                to: t.to,
                reason: t.evidence,
                ...(t.stale ? { metadata: { stale: true } } : {})
            });
        }
        await this.record(invocation, 'running', outcome.status, undefined, outcome.status === 'failed' ? outcome.detail : undefined);

        console.log(`[Dispatcher] #${invocation.id} ${capability.name} -> ${outcome.status}` +
            (applied.length > 0 ? ` (gates: ${applied.map(u => `${u.gate}=${u.state}`).join(', ')})` : ''));
        return outcome;
    }

    private async fail(invocation: Invocation, reason: FailureCode, detail: string): Promise<Outcome> {
        if (this.isTerminal(invocation)) return this.outcomeOf(invocation);

        const from = invocation.status;
        const outcome: Outcome = {
            status: 'failed',
            invocationId: invocation.id,
            capabilityName: invocation.capabilityName,
            reason,
            detail,
            gateUpdatesApplied: []
        };
        this.markTerminal(invocation, outcome);
        await this.record(invocation, from, 'failed', reason, detail);

        console.warn(`[Dispatcher] #${invocation.id} ${invocation.capabilityName} failed: ${reason}: ${detail}`);
        return outcome;
    }

    private async reject(id: InvocationID, capabilityName: CapabilityName, args: Args, check: GuardFailure): Promise<Outcome> {
        const code: RejectionCode = check.code;

        const invocation: Invocation = {
            id,
            capabilityName,
            args: { ...args },
            status: 'rejected',
            reason: code,
            detail: check.violation,
            startedAt: this.clock.now(),
            endedAt: this.clock.now(),
            gateUpdatesApplied: []
        };
        const outcome: Outcome = check.unmet
            ? { status: 'rejected', invocationId: id, capabilityName, reason: code, detail: check.violation, unmetGates: check.unmet }
            : { status: 'rejected', invocationId: id, capabilityName, reason: code, detail: check.violation };
        this.invocations.set(id, invocation);
        this.outcomes.set(id, outcome);

        if (code === ErrorCode.GATE_NOT_OPEN) {
            const pressure = (this.rejectionTracker.get(capabilityName) ?? 0) + 1;
            this.rejectionTracker.set(capabilityName, pressure);
            if (pressure >= this.PRESSURE_THRESHOLD) {
                console.warn(`[Dispatcher] Pressure Alert: '${capabilityName}' rejected ${pressure} times in a row on gates ${check.unmet?.join(', ')}`);
            }
        }

        await this.record(invocation, null, 'rejected', code, check.violation);
        return outcome;
    }

    private markTerminal(invocation: Invocation, outcome: Outcome): void {
        invocation.status = outcome.status;
        invocation.endedAt = this.clock.now();
        if (outcome.status !== 'succeeded') {
            if (outcome.reason !== undefined) invocation.reason = outcome.reason;
            if (outcome.detail !== undefined) invocation.detail = outcome.detail;
        }
        if (outcome.status !== 'rejected') {
            invocation.result = outcome.result;
            invocation.gateUpdatesApplied = outcome.gateUpdatesApplied;
        }
        this.outcomes.set(invocation.id, outcome);
    }

    private outcomeOf(invocation: Invocation): Outcome {
        const outcome = this.outcomes.get(invocation.id);
        if (!outcome) throw new Error(`Dispatcher: invocation #${invocation.id} has no outcome`);
        return outcome;
    }

    private isTerminal(invocation: Invocation): boolean {
        return TERMINAL.includes(invocation.status);
    }

    private async record(invocation: Invocation, from: InvocationStatus | null, to: InvocationStatus, reason?: ErrorCode, detail?: string): Promise<void> {
        await this.audit.append({
            invocationId: invocation.id,
            kind: 'invocation',
            subject: invocation.capabilityName,
            from,
            to,
            ...(detail !== undefined ? { reason: detail } : {}),
            ...(reason !== undefined || invocation.jobId !== undefined
                ? { metadata: { ...(reason !== undefined ? { code: reason } : {}), ...(invocation.jobId !== undefined ? { jobId: invocation.jobId } : {}) } }
                : {})
        });
    }

    private static copy(inv: Invocation): Invocation {
        return { ...inv, args: { ...inv.args }, gateUpdatesApplied: [...inv.gateUpdatesApplied] };
    }
}
