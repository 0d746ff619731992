// src/orchestration-core/L5/Audit.ts
import { hash, canonicalize, GENESIS_HASH } from '../L0/Crypto.js';
import type { InvocationID } from '../L0/Ontology.js';
import { SystemClock } from '../L0/Clock.js';
import type { Clock } from '../L0/Clock.js';
import { SerialQueue } from '../L0/SerialQueue.js';

/**
 * Event Store Port
 * Append-only persistence for evidence records.
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

export type EvidenceKind = 'invocation' | 'gate' | 'job' | 'pipeline' | 'correction';

/**
 * One state transition, as reported by the stratum that made it.
 */
export interface TransitionRecord {
    invocationId: InvocationID | null;
    kind: EvidenceKind;
    /** Capability, gate or job the transition belongs to. */
    subject: string;
    from: string | null;
    to: string;
    reason?: string;
    metadata?: Record<string, unknown>;
}

// --- Evidence (the audit substrate) ---
export interface Evidence extends TransitionRecord {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    timestamp: string;
}

export class AuditLog {
    private localChain: Evidence[] = [];
    private queue = new SerialQueue();

    constructor(private store?: IEventStore, private clock: Clock = new SystemClock()) { }

    /**
     * Appends are linearized: concurrent callers each extend the chain from the previous tip.
     */
    public append(record: TransitionRecord): Promise<Evidence> {
        return this.queue.run(() => this.appendNow(record));
    }

    public async getHistory(): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    public async forInvocation(invocationId: InvocationID): Promise<Evidence[]> {
        return (await this.getHistory()).filter(e => e.invocationId === invocationId);
    }

    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = GENESIS_HASH;

        for (const entry of history) {
            if (entry.previousEvidenceId !== prev) return false;
            if (AuditLog.calculateHash(prev, entry) !== entry.evidenceId) return false;
            prev = entry.evidenceId;
        }
        return true;
    }

    public async getTip(): Promise<Evidence | null> {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        if (this.store) return await this.store.getLatest();
        return null;
    }

    private async appendNow(record: TransitionRecord): Promise<Evidence> {
        const latest = await this.getTip();
        const previousHash = latest ? latest.evidenceId : GENESIS_HASH;

        const body = {
            invocationId: record.invocationId,
            kind: record.kind,
            subject: record.subject,
            from: record.from,
            to: record.to,
            sequence: (latest?.sequence ?? 0) + 1,
            timestamp: new Date(this.clock.now()).toISOString(),
            ...(record.reason !== undefined ? { reason: record.reason } : {}),
            ...(record.metadata !== undefined ? { metadata: record.metadata } : {})
        };

        const evidence: Evidence = Object.freeze({
            ...body,
            previousEvidenceId: previousHash,
            evidenceId: AuditLog.calculateHash(previousHash, body)
        });

        if (this.store) {
            await this.store.append(evidence);
        }
        this.localChain.push(evidence);
        return evidence;
    }

    private static calculateHash(prevHash: string, e: Omit<Evidence, 'evidenceId' | 'previousEvidenceId'>): string {
        // [PreviousHash, Sequence, InvocationID, Kind, Subject, From, To, Timestamp, ReasonHash, MetadataHash]
        const canonical = [
            prevHash,
            e.sequence,
            e.invocationId,
            e.kind,
            e.subject,
            e.from,
            e.to,
            e.timestamp,
            hash(e.reason ?? ''),
            hash(e.metadata ? canonicalize(e.metadata) : '{}')
        ];
        return hash(canonicalize(canonical));
    }
}
