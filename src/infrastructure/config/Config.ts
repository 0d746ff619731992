/**
 * Configuration
 * Defaults, overridden by an optional orchestrator.config.json, overridden by the environment.
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { freeze } from 'immer';
import { z } from 'zod';
import { ErrorCode, OrchestrationError, describeError } from '../../orchestration-core/Errors.js';
import { formatIssues } from '../../orchestration-core/L2/CapabilityCatalogue.js';

const positiveInt = z.number().int().positive();

export const ConfigSchema = z.object({
    maxInvocations: positiveInt.default(50),
    jobs: z.object({
        minPollIntervalMs: positiveInt.default(5_000),
        maxPollIntervalMs: positiveInt.default(300_000),
        backoffFactor: z.number().min(1).default(2),
        maxDurationMs: positiveInt.default(86_400_000),
        retry: z.object({
            maxAttempts: positiveInt.default(5),
            initialDelayMs: z.number().int().nonnegative().default(1_000),
            backoffFactor: z.number().min(1).default(2)
        }).strict().default({})
    }).strict().default({}),
    persistence: z.object({
        /** null keeps the audit log in memory. */
        dbPath: z.string().min(1).nullable().default(null)
    }).strict().default({}),
    server: z.object({
        port: z.number().int().min(0).max(65_535).default(3000)
    }).strict().default({})
}).strict().superRefine((config, ctx) => {
    if (config.jobs.minPollIntervalMs > config.jobs.maxPollIntervalMs) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['jobs', 'minPollIntervalMs'],
            message: `must not exceed jobs.maxPollIntervalMs (${config.jobs.maxPollIntervalMs})`
        });
    }
});

export type OrchestratorConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_FILE = 'orchestrator.config.json';

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function merge(base: Record<string, unknown>, over: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(over)) {
        const current = out[key];
        out[key] = isRecord(current) && isRecord(value) ? merge(current, value) : value;
    }
    return out;
}

function readFile(path: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (e) {
        throw new OrchestrationError(ErrorCode.INVALID_CONFIG, `Cannot read ${path}: ${describeError(e)}`, { path });
    }
    if (!isRecord(parsed)) {
        throw new OrchestrationError(ErrorCode.INVALID_CONFIG, `${path} must contain a JSON object`, { path });
    }
    return parsed;
}

function envOverrides(env: Env): Record<string, unknown> {
    const num = (raw: string) => Number(raw.trim());
    const out: Record<string, unknown> = {};
    const jobs: Record<string, unknown> = {};

    if (env.ORCHESTRATOR_MAX_INVOCATIONS) out.maxInvocations = num(env.ORCHESTRATOR_MAX_INVOCATIONS);
    if (env.ORCHESTRATOR_MIN_POLL_MS) jobs.minPollIntervalMs = num(env.ORCHESTRATOR_MIN_POLL_MS);
    if (env.ORCHESTRATOR_MAX_POLL_MS) jobs.maxPollIntervalMs = num(env.ORCHESTRATOR_MAX_POLL_MS);
    if (env.ORCHESTRATOR_JOB_TIMEOUT_MS) jobs.maxDurationMs = num(env.ORCHESTRATOR_JOB_TIMEOUT_MS);
    if (env.ORCHESTRATOR_RETRY_ATTEMPTS) jobs.retry = { maxAttempts: num(env.ORCHESTRATOR_RETRY_ATTEMPTS) };
    if (Object.keys(jobs).length > 0) out.jobs = jobs;
    if (env.ORCHESTRATOR_DB_PATH) out.persistence = { dbPath: env.ORCHESTRATOR_DB_PATH };
    if (env.ORCHESTRATOR_PORT) out.server = { port: num(env.ORCHESTRATOR_PORT) };

    return out;
}

/**
 * An explicit `configPath` (or ORCHESTRATOR_CONFIG) must exist; the default file is optional.
 */
export function loadConfig(configPath?: string, env: Env = process.env): OrchestratorConfig {
    const explicit = configPath ?? env.ORCHESTRATOR_CONFIG;
    let file: Record<string, unknown> = {};

    if (explicit) {
        if (!existsSync(explicit)) {
            throw new OrchestrationError(ErrorCode.INVALID_CONFIG, `Config file not found: ${explicit}`, { path: explicit });
        }
        file = readFile(explicit);
    } else {
        const fallback = resolve(process.cwd(), DEFAULT_CONFIG_FILE);
        if (existsSync(fallback)) file = readFile(fallback);
    }

    const result = ConfigSchema.safeParse(merge(file, envOverrides(env)));
    if (!result.success) {
        throw new OrchestrationError(ErrorCode.INVALID_CONFIG, `Invalid configuration: ${formatIssues(result.error)}`);
    }
    return freeze(result.data, true);
}
