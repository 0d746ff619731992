// src/orchestration-core/L2/CapabilityCatalogue.ts
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CapabilityDefinition } from '../L0/Ontology.js';
import { ErrorCode, OrchestrationError, describeError } from '../Errors.js';

const ParamSpecSchema = z.object({
    name: z.string().min(1),
    type: z.enum(['string', 'number', 'boolean', 'string[]', 'object']),
    optional: z.boolean().optional()
}).strict();

export const CapabilityDefinitionSchema = z.object({
    name: z.string().min(1),
    executor: z.string().min(1),
    description: z.string().optional(),
    params: z.array(ParamSpecSchema).default([]),
    requires: z.array(z.string().min(1)).default([]),
    affects: z.array(z.string().min(1)).default([]),
    mode: z.enum(['sync', 'job']).default('sync'),
    correctionSensitive: z.boolean().default(false)
}).strict();

export const CatalogueSchema = z.object({
    pipeline: z.string().min(1),
    capabilities: z.array(CapabilityDefinitionSchema)
}).strict();

export interface Catalogue {
    pipeline: string;
    capabilities: CapabilityDefinition[];
}

export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(i => `${i.path.length > 0 ? i.path.join('.') : '<root>'}: ${i.message}`)
        .join('; ');
}

/**
 * Catalogue Validator
 * Structural checks (zod) plus the cross-field rules zod cannot express.
 */
export class CatalogueValidator {
    public static validateDefinition(definition: CapabilityDefinition): void {
        const parsed = CapabilityDefinitionSchema.safeParse(definition);
        if (!parsed.success) {
            throw new OrchestrationError(ErrorCode.INVALID_CATALOGUE, `Capability '${definition.name}': ${formatIssues(parsed.error)}`);
        }

        const seen = new Set<string>();
        for (const p of definition.params) {
            if (seen.has(p.name)) {
                throw new OrchestrationError(ErrorCode.INVALID_CATALOGUE, `Capability '${definition.name}': parameter '${p.name}' declared twice`);
            }
            seen.add(p.name);
        }

        if (new Set(definition.requires).size !== definition.requires.length) {
            throw new OrchestrationError(ErrorCode.INVALID_CATALOGUE, `Capability '${definition.name}': duplicate required gate`);
        }
        if (new Set(definition.affects).size !== definition.affects.length) {
            throw new OrchestrationError(ErrorCode.INVALID_CATALOGUE, `Capability '${definition.name}': duplicate affected gate`);
        }
    }

    public static validateCatalogue(catalogue: Catalogue): void {
        const names = new Set<string>();
        for (const def of catalogue.capabilities) {
            if (names.has(def.name)) {
                throw new OrchestrationError(ErrorCode.INVALID_CATALOGUE, `Catalogue '${catalogue.pipeline}' lists '${def.name}' twice`);
            }
            names.add(def.name);
            this.validateDefinition(def);
        }
    }
}

export function parseCatalogue(raw: unknown): Catalogue {
    const parsed = CatalogueSchema.safeParse(raw);
    if (!parsed.success) {
        throw new OrchestrationError(ErrorCode.INVALID_CATALOGUE, formatIssues(parsed.error));
    }
    const catalogue: Catalogue = parsed.data;
    CatalogueValidator.validateCatalogue(catalogue);
    return catalogue;
}

export function loadCatalogue(path: string): Catalogue {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (e) {
        throw new OrchestrationError(ErrorCode.INVALID_CATALOGUE, `Cannot read catalogue ${path}: ${describeError(e)}`);
    }
    return parseCatalogue(raw);
}
