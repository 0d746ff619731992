// src/orchestration-core/L5/Projections.ts
import type { GateName, InvocationID } from '../L0/Ontology.js';
import type { Evidence } from './Audit.js';

/**
 * Projections are read models derived purely from the audit log.
 * They must be deterministic and idempotent over the same history.
 */
export interface Projection<T> {
    name: string;
    reset(): void;
    apply(evidence: Evidence): void;
    getState(): T;
}

export class ProjectionEngine {
    private projections: Map<string, Projection<unknown>> = new Map();

    public register(projection: Projection<unknown>): void {
        if (this.projections.has(projection.name)) {
            console.warn(`[ProjectionEngine] Overwriting projection: ${projection.name}`);
        }
        this.projections.set(projection.name, projection);
    }

    public get(name: string): Projection<unknown> | undefined {
        return this.projections.get(name);
    }

    /**
     * Feeds one record to every projection. A failing projection is logged and skipped;
     * the others still see the record.
     */
    public apply(evidence: Evidence): void {
        for (const projection of this.projections.values()) {
            try {
                projection.apply(evidence);
            } catch (e) {
                console.error(`[ProjectionEngine] Projection '${projection.name}' failed on evidence #${evidence.sequence}:`, e);
            }
        }
    }

    public replay(history: readonly Evidence[]): void {
        this.reset();
        for (const e of history) this.apply(e);
    }

    public reset(): void {
        for (const projection of this.projections.values()) {
            projection.reset();
        }
    }
}

// --- Gate timeline ---
export interface GateTimelineEntry {
    state: string;
    evidence: string;
    invocationId: InvocationID | null;
    timestamp: string;
}

export class GateTimelineProjection implements Projection<Record<GateName, GateTimelineEntry[]>> {
    public readonly name = 'gate-timeline';
    private timeline: Record<GateName, GateTimelineEntry[]> = {};

    public reset(): void {
        this.timeline = {};
    }

    public apply(e: Evidence): void {
        if (e.kind !== 'gate' || e.metadata?.['stale'] === true) return;
        const entries = this.timeline[e.subject] ?? [];
        entries.push({ state: e.to, evidence: e.reason ?? '', invocationId: e.invocationId, timestamp: e.timestamp });
        this.timeline[e.subject] = entries;
    }

    public getState(): Record<GateName, GateTimelineEntry[]> {
        return this.timeline;
    }

    public current(gate: GateName): GateTimelineEntry | undefined {
        const entries = this.timeline[gate];
        return entries ? entries[entries.length - 1] : undefined;
    }
}

// --- Invocation timeline ---
export interface InvocationTimeline {
    invocationId: InvocationID;
    capabilityName: string;
    status: string;
    code?: string;
    detail?: string;
    transitions: { from: string | null; to: string; timestamp: string }[];
}

export class InvocationTimelineProjection implements Projection<InvocationTimeline[]> {
    public readonly name = 'invocation-timeline';
    private byId: Map<InvocationID, InvocationTimeline> = new Map();

    public reset(): void {
        this.byId.clear();
    }

    public apply(e: Evidence): void {
        if (e.kind !== 'invocation' || e.invocationId === null) return;

        const entry = this.byId.get(e.invocationId) ?? {
            invocationId: e.invocationId,
            capabilityName: e.subject,
            status: e.to,
            transitions: []
        };
        entry.status = e.to;
        entry.transitions.push({ from: e.from, to: e.to, timestamp: e.timestamp });

        const code = e.metadata?.['code'];
        if (typeof code === 'string') entry.code = code;
        if (e.reason !== undefined) entry.detail = e.reason;

        this.byId.set(e.invocationId, entry);
    }

    public getState(): InvocationTimeline[] {
        return Array.from(this.byId.values()).sort((a, b) => a.invocationId - b.invocationId);
    }
}

/**
 * Reconstructs "what blocked this pipeline" from the log alone:
 * the run-level verdict, the last unsuccessful invocation, and every gate left blocked.
 */
export function explainHalt(history: readonly Evidence[]): string[] {
    const gates = new GateTimelineProjection();
    const invocations = new InvocationTimelineProjection();
    const engine = new ProjectionEngine();
    engine.register(gates);
    engine.register(invocations);
    engine.replay(history);

    const lines: string[] = [];

    const verdict = [...history].reverse().find(e => e.kind === 'pipeline' && e.to !== 'running');
    if (verdict && verdict.to !== 'pipeline_complete') {
        lines.push(`Pipeline ${verdict.to.replace('pipeline_', '')}: ${verdict.reason ?? 'no reason recorded'}`);
    }

    const lastBad = invocations.getState().filter(i => i.status === 'failed' || i.status === 'rejected').pop();
    if (lastBad) {
        const code = lastBad.code ? ` ${lastBad.code}` : '';
        lines.push(`Invocation #${lastBad.invocationId} ${lastBad.capabilityName} ${lastBad.status}${code}: ${lastBad.detail ?? 'no detail'}`);
    }

    for (const [gate] of Object.entries(gates.getState())) {
        const current = gates.current(gate);
        if (current && current.state === 'blocked') {
            const by = current.invocationId === null ? '' : ` by invocation #${current.invocationId}`;
            lines.push(`Gate ${gate} blocked${by}: ${current.evidence}`);
        }
    }

    return lines;
}
