// src/orchestration-core/L5/Replay.ts
import type { Clock } from '../L0/Clock.js';
import { ErrorCode, OrchestrationError } from '../Errors.js';
import { GateLedger } from '../L1/GateLedger.js';
import { AuditLog } from './Audit.js';
import { ProjectionEngine } from './Projections.js';

export class ReplayEngine {
    /**
     * Rebuilds the gate ledger of a previous run from its log.
     * The chain is verified first; a broken chain is never replayed.
     */
    public async rebuildLedger(log: AuditLog, clock?: Clock, projections?: ProjectionEngine): Promise<GateLedger> {
        if (!(await log.verifyChain())) {
            throw new OrchestrationError(ErrorCode.INTEGRITY_BREACH, 'Audit chain verification failed; refusing to replay');
        }

        const history = await log.getHistory();
        console.log(`[ReplayEngine] Starting replay of ${history.length} records...`);

        const ledger = new GateLedger(clock);
        for (const entry of history) {
            projections?.apply(entry);
            if (entry.kind !== 'gate' || entry.metadata?.['stale'] === true) continue;

            const at = Date.parse(entry.timestamp);
            const evidence = entry.reason ?? '';
            if (entry.to === 'open') ledger.open(entry.subject, evidence, entry.invocationId, at);
            else if (entry.to === 'blocked') ledger.block(entry.subject, evidence, entry.invocationId, at);
            else ledger.declare(entry.subject);
        }

        console.log(`[ReplayEngine] Replay complete.`);
        return ledger;
    }
}
