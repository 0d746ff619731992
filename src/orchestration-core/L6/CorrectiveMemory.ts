// src/orchestration-core/L6/CorrectiveMemory.ts
import type { Args, CapabilityName, Correction, GateName, GateState } from '../L0/Ontology.js';

export interface RecallContext {
    capabilityName: CapabilityName;
    args: Args;
    gates: Record<GateName, GateState>;
}

/**
 * Corrective-Memory Port
 * Recall returns the most relevant corrections first.
 */
export interface CorrectiveMemory {
    recall(context: RecallContext): Promise<Correction[]>;
    store(correction: Correction): Promise<void>;
}

export interface InMemoryCorrectiveMemoryOptions {
    /** Minimum cosine similarity for a correction to be recalled. */
    threshold?: number;
    topK?: number;
}

type BagOfWords = Map<string, number>;

function words(text: string): string[] {
    return text.toLowerCase().split(/[^a-z0-9_]+/).filter(Boolean);
}

function bag(tokens: readonly string[]): BagOfWords {
    const out: BagOfWords = new Map();
    for (const t of tokens) out.set(t, (out.get(t) ?? 0) + 1);
    return out;
}

function contextTokens(capabilityName: CapabilityName, gates: Record<GateName, GateState>): string[] {
    return [
        capabilityName.toLowerCase(),
        ...Object.entries(gates).map(([gate, state]) => `${gate.toLowerCase()}=${state}`)
    ];
}

function argTokens(args: Args): string[] {
    const out: string[] = [];
    for (const value of Object.values(args)) {
        if (typeof value === 'string') out.push(...words(value));
        else if (Array.isArray(value)) for (const v of value) if (typeof v === 'string') out.push(...words(v));
    }
    return out;
}

export function cosine(a: BagOfWords, b: BagOfWords): number {
    let dot = 0, mA = 0, mB = 0;
    for (const [t, v] of a) {
        mA += v * v;
        dot += v * (b.get(t) ?? 0);
    }
    for (const v of b.values()) mB += v * v;
    const d = Math.sqrt(mA) * Math.sqrt(mB);
    return d > 0 ? dot / d : 0;
}

interface Entry {
    correction: Correction;
    vector: BagOfWords;
}

/**
 * Reference memory: bag-of-words cosine over capability name, gate states and the words
 * of the correction (stored side) or the string arguments (query side).
 * Not a similarity engine; good enough for tests and demos.
 */
export class InMemoryCorrectiveMemory implements CorrectiveMemory {
    private entries: Entry[] = [];
    private readonly threshold: number;
    private readonly topK: number;

    constructor(options: InMemoryCorrectiveMemoryOptions = {}) {
        this.threshold = options.threshold ?? 0.5;
        this.topK = options.topK ?? 5;
    }

    public async recall(context: RecallContext): Promise<Correction[]> {
        const query = bag([...contextTokens(context.capabilityName, context.gates), ...argTokens(context.args)]);

        return this.entries
            .map((entry, index) => ({ entry, index, similarity: cosine(query, entry.vector) }))
            .filter(r => r.similarity >= this.threshold)
            // Most similar first; among equals, the most recent
            .sort((a, b) => b.similarity - a.similarity || b.index - a.index)
            .slice(0, this.topK)
            .map(r => r.entry.correction);
    }

    public async store(correction: Correction): Promise<void> {
        const vector = bag([
            ...contextTokens(correction.context.capabilityName, correction.context.gates),
            ...words(correction.content)
        ]);
        this.entries.push({ correction: { ...correction, context: { ...correction.context, gates: { ...correction.context.gates } } }, vector });
        console.log(`[CorrectiveMemory] Stored correction for '${correction.context.capabilityName}' (${this.entries.length} total)`);
    }

    public get size(): number {
        return this.entries.length;
    }

    public all(): Correction[] {
        return this.entries.map(e => e.correction);
    }
}
