import Database from 'better-sqlite3';
import { z } from 'zod';
import type { IEventStore, Evidence } from '../../orchestration-core/L5/Audit.js';

const RowSchema = z.object({
    sequence: z.number().int(),
    evidenceId: z.string(),
    previousEvidenceId: z.string(),
    invocationId: z.number().int().nullable(),
    kind: z.enum(['invocation', 'gate', 'job', 'pipeline', 'correction']),
    subject: z.string(),
    from_state: z.string().nullable(),
    to_state: z.string(),
    reason: z.string().nullable(),
    metadata: z.string().nullable(),
    timestamp: z.string()
});

type Row = z.infer<typeof RowSchema>;

const MetadataSchema = z.record(z.unknown());

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'orchestrator.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                invocationId INTEGER,
                kind TEXT NOT NULL,
                subject TEXT NOT NULL,
                from_state TEXT,
                to_state TEXT NOT NULL,
                reason TEXT,
                metadata TEXT,
                timestamp TEXT NOT NULL
            )
        `);
        this.db.exec('CREATE INDEX IF NOT EXISTS audit_log_invocation ON audit_log (invocationId)');
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                sequence, evidenceId, previousEvidenceId, invocationId, kind, subject, from_state, to_state, reason, metadata, timestamp
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.sequence,
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.invocationId,
            evidence.kind,
            evidence.subject,
            evidence.from,
            evidence.to,
            evidence.reason ?? null,
            evidence.metadata ? JSON.stringify(evidence.metadata) : null,
            evidence.timestamp
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const stmt = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEvidence(RowSchema.parse(row)));
    }

    async getLatest(): Promise<Evidence | null> {
        const stmt = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (row === undefined) return null;
        return this.mapRowToEvidence(RowSchema.parse(row));
    }

    private mapRowToEvidence(row: Row): Evidence {
        return Object.freeze({
            sequence: row.sequence,
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            invocationId: row.invocationId,
            kind: row.kind,
            subject: row.subject,
            from: row.from_state,
            to: row.to_state,
            timestamp: row.timestamp,
            ...(row.reason !== null ? { reason: row.reason } : {}),
            ...(row.metadata !== null ? { metadata: MetadataSchema.parse(JSON.parse(row.metadata)) } : {})
        });
    }

    public close() {
        this.db.close();
    }
}
