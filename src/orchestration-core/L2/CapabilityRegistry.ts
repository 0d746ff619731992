// src/orchestration-core/L2/CapabilityRegistry.ts
import type { Capability, CapabilityDefinition, CapabilityName, Executor, GateName } from '../L0/Ontology.js';
import { ErrorCode, OrchestrationError } from '../Errors.js';
import { CatalogueValidator } from './CapabilityCatalogue.js';

/**
 * Capability Registry
 * Maps a capability name to its declaration and bound executor.
 * Entries are frozen on registration and never change afterwards.
 */
export class CapabilityRegistry {
    private capabilities: Map<CapabilityName, Capability> = new Map();

    public register(definition: CapabilityDefinition, handler: Executor): Capability {
        CatalogueValidator.validateDefinition(definition);

        if (this.capabilities.has(definition.name)) {
            throw new OrchestrationError(ErrorCode.DUPLICATE_CAPABILITY, `Capability '${definition.name}' already registered`);
        }
        if (handler.kind !== definition.mode) {
            throw new OrchestrationError(
                ErrorCode.INVALID_CATALOGUE,
                `Capability '${definition.name}' declares mode '${definition.mode}' but its executor is '${handler.kind}'`
            );
        }

        const capability: Capability = Object.freeze({
            ...definition,
            params: definition.params.map(p => ({ ...p })),
            requires: [...definition.requires],
            affects: [...definition.affects],
            handler
        });
        this.capabilities.set(definition.name, capability);
        return capability;
    }

    /**
     * Registers a whole static catalogue against a map of executors keyed by capability name.
     */
    public registerCatalogue(definitions: readonly CapabilityDefinition[], executors: Readonly<Record<CapabilityName, Executor>>): void {
        for (const def of definitions) {
            const handler = executors[def.name];
            if (!handler) {
                throw new OrchestrationError(ErrorCode.EXECUTOR_NOT_BOUND, `No executor bound for capability '${def.name}' (owner: ${def.executor})`);
            }
            this.register(def, handler);
        }
    }

    public lookup(name: CapabilityName): Capability {
        const capability = this.capabilities.get(name);
        if (!capability) {
            throw new OrchestrationError(ErrorCode.UNKNOWN_CAPABILITY, `Capability '${name}' is not registered`);
        }
        return capability;
    }

    public find(name: CapabilityName): Capability | undefined {
        return this.capabilities.get(name);
    }

    public has(name: CapabilityName): boolean {
        return this.capabilities.has(name);
    }

    public requiredGates(name: CapabilityName): GateName[] {
        return [...this.lookup(name).requires];
    }

    public affectedGates(name: CapabilityName): GateName[] {
        return [...this.lookup(name).affects];
    }

    /**
     * Every gate any capability requires or affects, in first-seen order.
     */
    public gateNames(): GateName[] {
        const names = new Set<GateName>();
        for (const c of this.capabilities.values()) {
            for (const g of c.requires) names.add(g);
            for (const g of c.affects) names.add(g);
        }
        return [...names];
    }

    public getAll(): Capability[] {
        return Array.from(this.capabilities.values());
    }
}
