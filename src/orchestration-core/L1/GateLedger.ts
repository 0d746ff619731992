// src/orchestration-core/L1/GateLedger.ts
import { produce } from 'immer';
import type { Gate, GateName, GateState, InvocationID } from '../L0/Ontology.js';
import { SystemClock } from '../L0/Clock.js';
import type { Clock } from '../L0/Clock.js';

export interface GateTransition {
    sequence: number;
    gate: GateName;
    from: GateState;
    to: GateState;
    evidence: string;
    invocationId: InvocationID | null;
    timestamp: number;
    /** Older than the gate's current write; recorded but not applied. */
    stale: boolean;
}

/**
 * Gate Ledger
 * The single authoritative record of pipeline preconditions.
 *
 * Gates only move unset -> open|blocked and between open and blocked; nothing
 * moves a gate back to unset. Every write lands in the history, including stale ones.
 * Writes are synchronous, so writes to one gate are linearized by construction.
 */
export class GateLedger {
    private gates: Readonly<Record<GateName, Gate>> = {};
    private history: GateTransition[] = [];

    constructor(private clock: Clock = new SystemClock(), declared: GateName[] = []) {
        for (const name of declared) this.declare(name);
    }

    /**
     * Creates a gate in `unset` at pipeline start. Declaring an existing gate is a no-op.
     */
    public declare(name: GateName): void {
        if (this.gates[name]) return;
        this.gates = produce(this.gates, draft => {
            draft[name] = { name, state: 'unset', evidence: '', updatedAt: 0, invocationId: null };
        });
    }

    public open(name: GateName, evidence: string, invocationId: InvocationID | null, at?: number): GateTransition {
        return this.write(name, 'open', evidence, invocationId, at ?? this.clock.now());
    }

    public block(name: GateName, evidence: string, invocationId: InvocationID | null, at?: number): GateTransition {
        return this.write(name, 'blocked', evidence, invocationId, at ?? this.clock.now());
    }

    public stateOf(name: GateName): GateState {
        return this.gates[name]?.state ?? 'unset';
    }

    public get(name: GateName): Gate | undefined {
        return this.gates[name];
    }

    public allOpen(names: readonly GateName[]): boolean {
        return names.every(n => this.stateOf(n) === 'open');
    }

    public unmet(names: readonly GateName[]): GateName[] {
        return names.filter(n => this.stateOf(n) !== 'open');
    }

    /** Frozen view; safe to hand to collaborators. */
    public snapshot(): Readonly<Record<GateName, Gate>> {
        return this.gates;
    }

    public states(): Record<GateName, GateState> {
        const out: Record<GateName, GateState> = {};
        for (const [name, gate] of Object.entries(this.gates)) out[name] = gate.state;
        return out;
    }

    public getHistory(): GateTransition[] {
        return [...this.history];
    }

    /**
     * One line per gate, in declaration order.
     */
    public summary(): string[] {
        return Object.values(this.gates).map(g => {
            const by = g.invocationId === null ? '' : ` (invocation #${g.invocationId})`;
            const why = g.evidence ? `: ${g.evidence}` : '';
            return `${g.name} [${g.state}]${why}${by}`;
        });
    }

    private write(name: GateName, to: 'open' | 'blocked', evidence: string, invocationId: InvocationID | null, at: number): GateTransition {
        const current = this.gates[name];
        const from = current?.state ?? 'unset';
        const stale = current !== undefined && current.state !== 'unset' && at < current.updatedAt;

        const transition: GateTransition = Object.freeze({
            sequence: this.history.length + 1,
            gate: name,
            from,
            to,
            evidence,
            invocationId,
            timestamp: at,
            stale
        });
        this.history.push(transition);

        if (stale) {
            console.warn(`[GateLedger] Stale write to '${name}' ignored (write at ${at}, gate updated at ${current?.updatedAt})`);
            return transition;
        }

        this.gates = produce(this.gates, draft => {
            draft[name] = { name, state: to, evidence, updatedAt: at, invocationId };
        });
        return transition;
    }
}
