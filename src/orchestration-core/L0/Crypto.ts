// src/orchestration-core/L0/Crypto.ts
import { createHash } from 'node:crypto';

export const GENESIS_HASH = '0'.repeat(64);

// Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

function sortValue(value: unknown): unknown {
    if (value === null || typeof value !== 'object') return value;
    if (Array.isArray(value)) return value.map(sortValue);

    const sorted: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) {
        sorted[key] = sortValue(inner);
    }
    return sorted;
}

/**
 * Canonical JSON: object keys sorted recursively, so equal values hash equally.
 */
export function canonicalize(value: unknown): string {
    return JSON.stringify(sortValue(value)) ?? 'null';
}
