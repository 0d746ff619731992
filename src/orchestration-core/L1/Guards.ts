// src/orchestration-core/L1/Guards.ts
import type { Args, CapabilityName, GateName, ParamSpec, ParamType } from '../L0/Ontology.js';
import { ErrorCode } from '../Errors.js';
import type { RejectionCode } from '../Errors.js';
import type { GateLedger } from './GateLedger.js';

// --- Guard Pattern ---
export type GuardFailure = { ok: false; code: RejectionCode; violation: string; unmet?: GateName[] };
export type GuardResult = { ok: true } | GuardFailure;

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: RejectionCode, violation: string, unmet?: GateName[]): GuardResult =>
    unmet ? { ok: false, code, violation, unmet } : { ok: false, code, violation };

function matchesType(value: unknown, type: ParamType): boolean {
    switch (type) {
        case 'string':
            return typeof value === 'string';
        case 'number':
            return typeof value === 'number' && Number.isFinite(value);
        case 'boolean':
            return typeof value === 'boolean';
        case 'string[]':
            return Array.isArray(value) && value.every(v => typeof v === 'string');
        case 'object':
            return typeof value === 'object' && value !== null && !Array.isArray(value);
    }
}

/**
 * Every problem with `args` against the declared parameters, empty when they match.
 * Explicit `undefined` counts as absent.
 */
export function argumentProblems(params: readonly ParamSpec[], args: Args): string[] {
    const problems: string[] = [];
    const declared = new Set(params.map(p => p.name));

    for (const p of params) {
        const value = args[p.name];
        if (value === undefined) {
            if (!p.optional) problems.push(`missing '${p.name}'`);
            continue;
        }
        if (!matchesType(value, p.type)) {
            problems.push(`'${p.name}' must be ${p.type}`);
        }
    }
    for (const key of Object.keys(args)) {
        if (!declared.has(key)) problems.push(`unexpected '${key}'`);
    }
    return problems;
}

// --- Concrete Guards ---

// 1. Arguments (shape)
export const ArgumentsGuard: Guard<{ params: readonly ParamSpec[]; args: Args }> = ({ params, args }) => {
    const problems = argumentProblems(params, args);
    if (problems.length > 0) return FAIL(ErrorCode.INVALID_ARGUMENTS, problems.join('; '));
    return OK;
};

// 2. Gates (preconditions)
export const GateGuard: Guard<{ required: readonly GateName[]; ledger: GateLedger }> = ({ required, ledger }) => {
    const unmet = ledger.unmet(required);
    if (unmet.length > 0) {
        const states = unmet.map(g => `${g}=${ledger.stateOf(g)}`).join(', ');
        return FAIL(ErrorCode.GATE_NOT_OPEN, `Required gates not open: ${states}`, unmet);
    }
    return OK;
};

// 3. In-flight (one live invocation per capability)
export const InFlightGuard: Guard<{ capabilityName: CapabilityName; inFlight: ReadonlyMap<CapabilityName, number> }> = ({ capabilityName, inFlight }) => {
    const holder = inFlight.get(capabilityName);
    if (holder !== undefined) {
        return FAIL(ErrorCode.ALREADY_IN_FLIGHT, `'${capabilityName}' already in flight as invocation #${holder}`);
    }
    return OK;
};
