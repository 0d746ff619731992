// src/orchestration-core/L6/Oracle.ts
import type { Args, CapabilityName, Correction, Gate, GateName, Invocation, Outcome } from '../L0/Ontology.js';

export interface InvokeDecision {
    kind: 'invoke';
    capabilityName: CapabilityName;
    args?: Args;
    /** Issue without waiting for the outcome. */
    background?: boolean;
    /** Marks the invocation as human-corrected; the text is stored in corrective memory. */
    correction?: string;
}

export type Decision =
    | InvokeDecision
    | { kind: 'done' }
    | { kind: 'abort'; reason: string };

const optional = (value: unknown, type: 'string' | 'boolean'): boolean => value === undefined || typeof value === type;

/**
 * Oracles are external planners; their answers are checked before the loop acts on them.
 */
export function isDecision(value: unknown): value is Decision {
    if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
    switch (value.kind) {
        case 'done':
            return true;
        case 'abort':
            return 'reason' in value && typeof value.reason === 'string';
        case 'invoke': {
            if (!('capabilityName' in value) || typeof value.capabilityName !== 'string') return false;
            const args = 'args' in value ? value.args : undefined;
            if (args !== undefined && (typeof args !== 'object' || args === null || Array.isArray(args))) return false;
            return optional('background' in value ? value.background : undefined, 'boolean')
                && optional('correction' in value ? value.correction : undefined, 'string');
        }
        default:
            return false;
    }
}

export function describeDecision(value: unknown): string {
    return JSON.stringify(value) ?? String(value);
}

export interface PipelineSnapshot {
    gates: Readonly<Record<GateName, Gate>>;
    history: Invocation[];
    /** Outcomes in the order they were observed. */
    observations: Outcome[];
    lastOutcome?: Outcome;
    /** Recalled corrections, only on the second ask for a correction-sensitive proposal. */
    corrections: Correction[];
    pendingProposal?: InvokeDecision;
    invocationsUsed: number;
    invocationBudget: number;
}

/**
 * Decision Oracle Port
 * Opaque planner; the core never inspects how it decides.
 */
export interface DecisionOracle {
    proposeNext(snapshot: PipelineSnapshot): Decision | Promise<Decision>;
}

export type ScriptStep = Decision | ((snapshot: PipelineSnapshot) => Decision);

/**
 * Replays a fixed list of decisions, then reports done.
 * Every snapshot it was shown is kept for inspection.
 */
export class ScriptedOracle implements DecisionOracle {
    public readonly seen: PipelineSnapshot[] = [];
    private cursor = 0;

    constructor(private steps: ScriptStep[]) { }

    public proposeNext(snapshot: PipelineSnapshot): Decision {
        this.seen.push(snapshot);
        const step = this.steps[this.cursor++];
        if (step === undefined) return { kind: 'done' };
        return typeof step === 'function' ? step(snapshot) : step;
    }
}

export interface PlanStep {
    capabilityName: CapabilityName;
    args?: Args;
}

/**
 * Walks a plan in order: proposes the first step that has not succeeded yet,
 * is done once every step has, and gives up after `maxAttempts` unsuccessful tries of one step.
 */
export class PlanOracle implements DecisionOracle {
    constructor(private plan: PlanStep[], private maxAttempts: number = 3) { }

    public proposeNext(snapshot: PipelineSnapshot): Decision {
        const succeeded = new Set(snapshot.history.filter(i => i.status === 'succeeded').map(i => i.capabilityName));
        const next = this.plan.find(step => !succeeded.has(step.capabilityName));
        if (!next) return { kind: 'done' };

        const attempts = snapshot.history.filter(i => i.capabilityName === next.capabilityName).length;
        if (attempts >= this.maxAttempts) {
            return { kind: 'abort', reason: `'${next.capabilityName}' did not succeed after ${attempts} attempts` };
        }
        if (snapshot.pendingProposal) return snapshot.pendingProposal;
        return { kind: 'invoke', capabilityName: next.capabilityName, args: next.args ?? {} };
    }
}
