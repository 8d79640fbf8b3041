/**
 * Keyfold - Utilities
 *
 * Key path helpers and small collection helpers shared across modules.
 */

import _ from 'lodash';
import { KEY_SEPARATOR, ROOT_GROUP } from './constants.js';
import type { GroupName, Key } from './types.js';

// ============================================================================
// Key Utilities
// ============================================================================

/**
 * Get the group of a key (everything before the last separator)
 *
 * @example
 * groupOf("snap00010/phi")     // "snap00010"
 * groupOf("a/b/c")             // "a/b"
 * groupOf("description")       // ""
 */
export function groupOf(key: Key): GroupName {
    const index = key.lastIndexOf(KEY_SEPARATOR);
    return index < 0 ? ROOT_GROUP : key.slice(0, index);
}

/**
 * Get the local name of a key (the last segment)
 *
 * @example
 * localName("snap00010/phi")   // "phi"
 * localName("description")     // "description"
 */
export function localName(key: Key): string {
    const index = key.lastIndexOf(KEY_SEPARATOR);
    return index < 0 ? key : key.slice(index + 1);
}

export function joinKey(...segments: string[]): Key {
    return segments.filter((segment) => segment.length > 0).join(KEY_SEPARATOR);
}

/**
 * Compare keys by UTF-16 code units. Unlike localeCompare, the order does
 * not depend on the host locale.
 */
export function compareKeys(a: Key, b: Key): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

export function sortKeys(keys: Iterable<Key>): Key[] {
    return [...keys].sort(compareKeys);
}

// ============================================================================
// Matching
// ============================================================================

/** Exclusion or selection entry: exact key, group name, or regex */
export type KeyFilter = string | RegExp;

/**
 * Check if a key matches any filter. Strings match the key itself or any key
 * inside the group they name.
 *
 * @example
 * matchesAny("snap00010/phi", ["snap00010"])   // true
 * matchesAny("snap00010/phi", [/phi$/])        // true
 * matchesAny("snap00010/phi", ["snap0001"])    // false
 */
export function matchesAny(key: Key, filters: readonly KeyFilter[]): boolean {
    return filters.some((filter) => {
        if (typeof filter === 'string') {
            return key === filter || key.startsWith(filter + KEY_SEPARATOR);
        }
        return filter.test(key);
    });
}

// ============================================================================
// Array Utilities
// ============================================================================

/**
 * Deduplicate an array while preserving order
 */
export function uniquePreserveOrder<T>(arr: readonly T[]): T[] {
    return [...new Set(arr)];
}

/**
 * Group array items by a key function, keeping first-seen key order
 */
export function groupBy<T, K>(arr: readonly T[], keyFn: (item: T) => K): Map<K, T[]> {
    const map = new Map<K, T[]>();
    for (const item of arr) {
        const key = keyFn(item);
        const bucket = map.get(key);
        if (bucket) {
            bucket.push(item);
        } else {
            map.set(key, [item]);
        }
    }
    return map;
}

/**
 * Flatten nested plain objects into separator-joined keys. Arrays and other
 * non-plain values are leaves. Every key becomes an own property.
 *
 * @example
 * flattenRecord({ snap: { phi: [1, 2] }, nspecies: 2 })
 * // { "snap/phi": [1, 2], "nspecies": 2 }
 */
export function flattenRecord(
    record: Record<string, unknown>,
    prefix: string = ''
): Record<Key, unknown> {
    const flat: Record<Key, unknown> = {};
    for (const [name, value] of Object.entries(record)) {
        const key = joinKey(prefix, name);
        if (_.isPlainObject(value) && isRecord(value)) {
            for (const [nested, leaf] of Object.entries(flattenRecord(value, key))) {
                defineEntry(flat, nested, leaf);
            }
        } else {
            defineEntry(flat, key, value);
        }
    }
    return flat;
}

/** Set an own enumerable property, including names such as `__proto__` */
export function defineEntry<T>(record: Record<string, T>, key: string, value: T): void {
    Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
