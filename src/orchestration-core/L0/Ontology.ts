/**
 * ORCHESTRATION ONTOLOGY
 * The single source of truth for the primitives every stratum shares.
 */
import type { ErrorCode, FailureCode, RejectionCode } from '../Errors.js';

export type InvocationID = number;
export type JobID = string;
export type GateName = string;
export type CapabilityName = string;
export type Args = Record<string, unknown>;

// --- 1. Gate ---
export type GateState = 'unset' | 'open' | 'blocked';

export interface Gate {
    name: GateName;
    state: GateState;
    evidence: string;
    updatedAt: number;
    invocationId: InvocationID | null;
}

export interface GateUpdate {
    gate: GateName;
    state: 'open' | 'blocked';
    evidence: string;
}

// --- 2. Capability ---
export type ParamType = 'string' | 'number' | 'boolean' | 'string[]' | 'object';

export interface ParamSpec {
    name: string;
    type: ParamType;
    optional?: boolean;
}

export type ExecutionMode = 'sync' | 'job';

/**
 * Declarative half of a capability. Serialisable, loaded from a static catalogue.
 */
export interface CapabilityDefinition {
    name: CapabilityName;
    executor: string;
    description?: string;
    params: ParamSpec[];
    requires: GateName[];
    affects: GateName[];
    mode: ExecutionMode;
    correctionSensitive: boolean;
}

/**
 * What an executor reports back once its work is done.
 * `success: false` is a declared domain failure, not a fault.
 */
export interface ExecutionReport {
    success: boolean;
    result?: unknown;
    gateUpdates?: GateUpdate[];
}

export interface JobSpec {
    jobType: string;
    payload: Record<string, unknown>;
}

export interface SyncExecutor {
    kind: 'sync';
    execute(args: Args): ExecutionReport | Promise<ExecutionReport>;
}

export interface JobExecutor {
    kind: 'job';
    executeAsync(args: Args): JobSpec | Promise<JobSpec>;
    settle(result: unknown, args: Args): ExecutionReport | Promise<ExecutionReport>;
}

export type Executor = SyncExecutor | JobExecutor;

export interface Capability extends CapabilityDefinition {
    handler: Executor;
}

// --- 3. Invocation ---
export type InvocationStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'rejected';

export interface Invocation {
    id: InvocationID;
    capabilityName: CapabilityName;
    args: Args;
    status: InvocationStatus;
    result?: unknown;
    reason?: ErrorCode;
    detail?: string;
    startedAt: number;
    endedAt?: number;
    jobId?: JobID;
    gateUpdatesApplied: GateUpdate[];
}

// --- 4. Job ---
export type JobState = 'submitted' | 'queued' | 'running' | 'completed' | 'failed' | 'timed_out' | 'cancelled';

export const TERMINAL_JOB_STATES: readonly JobState[] = ['completed', 'failed', 'timed_out', 'cancelled'];

export interface Job {
    id: JobID;
    invocationId: InvocationID;
    handle: string;
    spec: JobSpec;
    state: JobState;
    pollCount: number;
    submittedAt: number;
    nextPollAt: number;
    result?: unknown;
    failureReason?: string;
}

// --- 5. Correction ---
export interface CorrectionContext {
    capabilityName: CapabilityName;
    gates: Record<GateName, GateState>;
}

export interface Correction {
    content: string;
    context: CorrectionContext;
    timestamp: string;
}

// --- 6. Outcome ---
export type Outcome =
    | {
        status: 'succeeded';
        invocationId: InvocationID;
        capabilityName: CapabilityName;
        result: unknown;
        gateUpdatesApplied: GateUpdate[];
    }
    | {
        status: 'failed';
        invocationId: InvocationID;
        capabilityName: CapabilityName;
        reason?: FailureCode;
        detail?: string;
        result?: unknown;
        gateUpdatesApplied: GateUpdate[];
    }
    | {
        status: 'rejected';
        invocationId: InvocationID;
        capabilityName: CapabilityName;
        reason: RejectionCode;
        detail: string;
        unmetGates?: GateName[];
    };

// --- 7. Pipeline ---
export type PipelineSignal = 'pipeline_complete' | 'pipeline_failed' | 'pipeline_cancelled';

export interface PipelineResult {
    signal: PipelineSignal;
    reason?: string;
    invocations: Invocation[];
    gates: Record<GateName, Gate>;
    trail: string[];
}
