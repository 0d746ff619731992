import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'node:http';
import { z } from 'zod';
import { Orchestrator } from '../orchestration-core/Orchestrator.js';
import { ErrorCode, OrchestrationError, describeError } from '../orchestration-core/Errors.js';

const CorrectionBody = z.object({
    content: z.string().min(1),
    capabilityName: z.string().min(1)
});

const CancelBody = z.object({
    reason: z.string().min(1).optional()
});

function statusFor(e: unknown): number {
    if (!(e instanceof OrchestrationError)) return 500;
    switch (e.code) {
        case ErrorCode.UNKNOWN_CAPABILITY:
        case ErrorCode.UNKNOWN_JOB:
            return 404;
        case ErrorCode.INVALID_ARGUMENTS:
            return 400;
        default:
            return 500;
    }
}

/**
 * Read-only inspection surface over one orchestrator, plus corrections and cancellation.
 * Gates are never written from here.
 */
export class OrchestratorServer {
    private app: express.Express;
    private server?: Server;

    constructor(private orchestrator: Orchestrator) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public get handler(): express.Express {
        return this.app;
    }

    public listen(port: number = this.orchestrator.config.server.port): Promise<Server> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, () => {
                console.log(`[OrchestratorServer] Listening on port ${port}`);
                resolve(server);
            });
            server.once('error', reject);
            this.server = server;
        });
    }

    public close(): Promise<void> {
        const server = this.server;
        if (!server) return Promise.resolve();
        this.server = undefined;
        return new Promise((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    private setupRoutes() {
        this.app.use((req, res, next) => {
            console.log(`[OrchestratorServer] ${req.method} ${req.url}`);
            next();
        });

        this.app.get('/health', (req, res) => {
            res.json({ status: 'ok', inFlight: this.orchestrator.dispatcher.inFlightNames() });
        });

        // Gate Query
        this.app.get('/gates', (req, res) => {
            res.json(this.orchestrator.ledger.snapshot());
        });

        this.app.get('/gates/:name', (req, res) => {
            const name = req.params.name;
            const gate = this.orchestrator.ledger.get(name);
            res.json(gate ?? { name, state: this.orchestrator.ledger.stateOf(name), evidence: '', updatedAt: 0, invocationId: null });
        });

        this.app.get('/invocations', (req, res) => {
            res.json(this.orchestrator.dispatcher.history());
        });

        this.app.get('/jobs', (req, res) => {
            res.json(this.orchestrator.jobs?.list() ?? []);
        });

        // Audit Query
        this.app.get('/audit', async (req, res) => {
            try {
                const raw = req.query.invocation;
                if (typeof raw === 'string') {
                    const id = Number(raw);
                    if (!Number.isInteger(id)) {
                        res.status(400).json({ error: `invocation must be an integer, got '${raw}'` });
                        return;
                    }
                    res.json(await this.orchestrator.audit.forInvocation(id));
                    return;
                }
                res.json(await this.orchestrator.audit.getHistory());
            } catch (e) {
                this.fail(res, e);
            }
        });

        this.app.get('/audit/verify', async (req, res) => {
            try {
                const intact = await this.orchestrator.audit.verifyChain();
                const records = (await this.orchestrator.audit.getHistory()).length;
                res.json({ intact, records });
            } catch (e) {
                this.fail(res, e);
            }
        });

        this.app.get('/report', async (req, res) => {
            try {
                res.json(await this.orchestrator.report());
            } catch (e) {
                this.fail(res, e);
            }
        });

        this.app.post('/corrections', async (req, res) => {
            const body = CorrectionBody.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ error: 'Expected { content, capabilityName }' });
                return;
            }
            try {
                const correction = await this.orchestrator.storeCorrection(body.data.content, body.data.capabilityName);
                res.status(201).json(correction);
            } catch (e) {
                this.fail(res, e);
            }
        });

        this.app.post('/cancel', async (req, res) => {
            const body = CancelBody.safeParse(req.body ?? {});
            if (!body.success) {
                res.status(400).json({ error: 'Expected { reason? }' });
                return;
            }
            try {
                const cancelled = await this.orchestrator.cancel(body.data.reason);
                res.json({ cancelled });
            } catch (e) {
                this.fail(res, e);
            }
        });
    }

    private fail(res: express.Response, e: unknown) {
        const status = statusFor(e);
        if (status === 500) console.error('[OrchestratorServer] Request failed:', e);
        res.status(status).json({ error: describeError(e), ...(e instanceof OrchestrationError ? { code: e.code } : {}) });
    }
}
