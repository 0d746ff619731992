import { describe, test, expect, beforeEach } from '@jest/globals';
import { CapabilityRegistry } from '../CapabilityRegistry.js';
import { ErrorCode, OrchestrationError } from '../../Errors.js';
import { definition, jobOpens, opens } from '../../__tests__/Fakes.js';

function codeOf(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (e) {
        if (e instanceof OrchestrationError) return e.code;
        throw e;
    }
    return undefined;
}

describe('Capability Registry', () => {
    let registry: CapabilityRegistry;

    beforeEach(() => {
        registry = new CapabilityRegistry();
    });

    test('lookup returns the registered capability and its gates', () => {
        registry.register(definition('B', { requires: ['g1'], affects: ['g2'] }), opens('g2'));

        expect(registry.lookup('B').name).toBe('B');
        expect(registry.requiredGates('B')).toEqual(['g1']);
        expect(registry.affectedGates('B')).toEqual(['g2']);
        expect(registry.has('B')).toBe(true);
    });

    test('duplicate names are refused', () => {
        registry.register(definition('A'), opens());
        expect(codeOf(() => registry.register(definition('A'), opens()))).toBe(ErrorCode.DUPLICATE_CAPABILITY);
    });

    test('unknown names fail lookup', () => {
        expect(codeOf(() => registry.lookup('nope'))).toBe(ErrorCode.UNKNOWN_CAPABILITY);
        expect(registry.find('nope')).toBeUndefined();
    });

    test('mode must agree with the executor kind', () => {
        expect(codeOf(() => registry.register(definition('S', { mode: 'job' }), opens()))).toBe(ErrorCode.INVALID_CATALOGUE);
        expect(codeOf(() => registry.register(definition('J'), jobOpens()))).toBe(ErrorCode.INVALID_CATALOGUE);
    });

    test('malformed definitions are refused', () => {
        const twice = definition('X', { params: [{ name: 'a', type: 'string' }, { name: 'a', type: 'number' }] });
        expect(codeOf(() => registry.register(twice, opens()))).toBe(ErrorCode.INVALID_CATALOGUE);
        expect(codeOf(() => registry.register(definition(''), opens()))).toBe(ErrorCode.INVALID_CATALOGUE);
    });

    test('registered entries are frozen copies', () => {
        const def = definition('A', { affects: ['g1'] });
        const cap = registry.register(def, opens('g1'));
        def.affects.push('g9');

        expect(Object.isFrozen(cap)).toBe(true);
        expect(registry.affectedGates('A')).toEqual(['g1']);
    });

    test('registerCatalogue binds executors by name', () => {
        registry.registerCatalogue([definition('A', { affects: ['g1'] }), definition('B', { requires: ['g1'], affects: ['g2'] })], {
            A: opens('g1'),
            B: opens('g2')
        });

        expect(registry.getAll().map(c => c.name)).toEqual(['A', 'B']);
        expect(registry.gateNames()).toEqual(['g1', 'g2']);
    });

    test('registerCatalogue refuses a definition with no executor', () => {
        expect(codeOf(() => registry.registerCatalogue([definition('A')], {}))).toBe(ErrorCode.EXECUTOR_NOT_BOUND);
    });
});
