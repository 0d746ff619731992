// src/orchestration-core/Orchestrator.ts
import type { Args, CapabilityName, Correction, InvocationID, Job, JobState, Outcome, PipelineResult } from './L0/Ontology.js';
import { SystemClock } from './L0/Clock.js';
import type { Clock } from './L0/Clock.js';
import { GateLedger } from './L1/GateLedger.js';
import { CapabilityRegistry } from './L2/CapabilityRegistry.js';
import { JobLifecycleManager } from './L3/JobLifecycleManager.js';
import type { JobObserver } from './L3/JobLifecycleManager.js';
import type { BatchScheduler } from './L3/Scheduler.js';
import { Dispatcher } from './L4/Dispatcher.js';
import { AuditLog } from './L5/Audit.js';
import type { IEventStore } from './L5/Audit.js';
import { explainHalt } from './L5/Projections.js';
import { InMemoryCorrectiveMemory } from './L6/CorrectiveMemory.js';
import type { CorrectiveMemory } from './L6/CorrectiveMemory.js';
import type { DecisionOracle } from './L6/Oracle.js';
import { OrchestrationLoop } from './L7/OrchestrationLoop.js';
import { loadConfig } from '../infrastructure/config/Config.js';
import type { OrchestratorConfig } from '../infrastructure/config/Config.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';

export interface OrchestratorOptions {
    config?: OrchestratorConfig;
    clock?: Clock;
    /** Without one, job-backed capabilities fail with ExecutorFault. */
    scheduler?: BatchScheduler;
    memory?: CorrectiveMemory;
    /** Takes precedence over `config.persistence.dbPath`. */
    store?: IEventStore;
}

export interface OrchestratorReport {
    gates: string[];
    invocations: { total: number; succeeded: number; failed: number; rejected: number; inFlight: CapabilityName[] };
    activeJobs: number;
    auditRecords: number;
    chainIntact: boolean;
    trail: string[];
}

/**
 * Orchestrator
 * Wires every stratum from configuration and exposes the run-level operations.
 */
export class Orchestrator {
    public readonly ledger: GateLedger;
    public readonly audit: AuditLog;
    public readonly jobs?: JobLifecycleManager;
    public readonly dispatcher: Dispatcher;
    public readonly memory: CorrectiveMemory;
    private loop: OrchestrationLoop;
    private ownedStore?: SQLiteEventStore;

    private constructor(
        public readonly registry: CapabilityRegistry,
        public readonly config: OrchestratorConfig,
        private clock: Clock,
        options: OrchestratorOptions
    ) {
        let store = options.store;
        if (!store && config.persistence.dbPath !== null) {
            this.ownedStore = new SQLiteEventStore(config.persistence.dbPath);
            store = this.ownedStore;
        }
        this.audit = new AuditLog(store, clock);
        this.ledger = new GateLedger(clock, registry.gateNames());
        this.memory = options.memory ?? new InMemoryCorrectiveMemory();

        if (options.scheduler) {
            const audit = this.audit;
            const observer: JobObserver = {
                async onJobTransition(job: Job, from: JobState | null, reason?: string): Promise<void> {
                    await audit.append({
                        invocationId: job.invocationId,
                        kind: 'job',
                        subject: job.id,
                        from,
                        to: job.state,
                        ...(reason !== undefined ? { reason } : {}),
                        metadata: { handle: job.handle, jobType: job.spec.jobType, pollCount: job.pollCount }
                    });
                }
            };
            this.jobs = new JobLifecycleManager(options.scheduler, config.jobs, clock, observer);
        }

        this.dispatcher = new Dispatcher(registry, this.ledger, this.audit, clock, this.jobs);
        this.loop = new OrchestrationLoop(
            this.dispatcher,
            registry,
            this.ledger,
            this.audit,
            clock,
            { maxInvocations: config.maxInvocations },
            this.memory
        );
    }

    /**
     * Builds the orchestrator and records every declared gate as `unset` in the audit log,
     * so a replay starts from the same gate set.
     */
    public static async create(registry: CapabilityRegistry, options: OrchestratorOptions = {}): Promise<Orchestrator> {
        const config = options.config ?? loadConfig();
        const orchestrator = new Orchestrator(registry, config, options.clock ?? new SystemClock(), options);

        for (const gate of registry.gateNames()) {
            await orchestrator.audit.append({ invocationId: null, kind: 'gate', subject: gate, from: null, to: 'unset' });
        }
        console.log(`[Orchestrator] Ready: ${registry.getAll().length} capabilities, ${registry.gateNames().length} gates`);
        return orchestrator;
    }

    public propose(capabilityName: CapabilityName, args: Args = {}): Promise<Outcome> {
        return this.dispatcher.propose(capabilityName, args);
    }

    public run(oracle: DecisionOracle): Promise<PipelineResult> {
        return this.loop.run(oracle);
    }

    public cancel(reason?: string): Promise<InvocationID[]> {
        return this.loop.cancel(reason);
    }

    /**
     * Stores a correction supplied from outside a run, against the current gate states.
     */
    public async storeCorrection(content: string, capabilityName: CapabilityName): Promise<Correction> {
        this.registry.lookup(capabilityName);
        const correction: Correction = {
            content,
            context: { capabilityName, gates: this.ledger.states() },
            timestamp: new Date(this.clock.now()).toISOString()
        };
        await this.memory.store(correction);
        await this.audit.append({ invocationId: null, kind: 'correction', subject: capabilityName, from: null, to: 'stored', reason: content });
        return correction;
    }

    public async report(): Promise<OrchestratorReport> {
        const history = this.dispatcher.history();
        const evidence = await this.audit.getHistory();
        const count = (status: string) => history.filter(i => i.status === status).length;

        return {
            gates: this.ledger.summary(),
            invocations: {
                total: history.length,
                succeeded: count('succeeded'),
                failed: count('failed'),
                rejected: count('rejected'),
                inFlight: this.dispatcher.inFlightNames()
            },
            activeJobs: this.jobs?.active().length ?? 0,
            auditRecords: evidence.length,
            chainIntact: await this.audit.verifyChain(),
            trail: explainHalt(evidence)
        };
    }

    public close(): void {
        this.ownedStore?.close();
    }
}
