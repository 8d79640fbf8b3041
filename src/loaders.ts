/**
 * Keyfold - Loaders
 *
 * Backings for KeyStore: an in-memory map, a JSON file and a directory tree.
 */

import { readFile, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { glob } from 'glob';
import { MEMORY_LOADER_PATH } from './constants.js';
import type { Loader, LoaderHandle } from './store.js';
import { KeyNotFoundError, type Key } from './types.js';
import { flattenRecord, isRecord } from './utils.js';

// ============================================================================
// Map Handle
// ============================================================================

/** Values are boxed so that an `undefined` value is told apart from a missing key */
type Entries<V> = ReadonlyMap<Key, { value: V }>;

function boxEntries<V>(entries: Iterable<[Key, V]>): Entries<V> {
    const boxed = new Map<Key, { value: V }>();
    for (const [key, value] of entries) {
        boxed.set(key, { value });
    }
    return boxed;
}

/** Handle over values that are already in memory */
function mapHandle<V>(entries: Entries<V>, path: string): LoaderHandle<V> {
    const read = async (key: Key): Promise<V> => {
        const entry = entries.get(key);
        if (!entry) {
            throw new KeyNotFoundError(key, path);
        }
        return entry.value;
    };

    return {
        keys: async () => [...entries.keys()],
        read,
        readMany: (keys) => Promise.all(keys.map(read)),
        close: async () => {},
    };
}

// ============================================================================
// Memory
// ============================================================================

function isMap<V>(entries: Record<Key, V> | ReadonlyMap<Key, V>): entries is ReadonlyMap<Key, V> {
    return entries instanceof Map;
}

export interface MemoryLoaderOptions {
    /** Name used in messages (default: "memory") */
    path?: string;
}

/**
 * Loader over a record or Map, for tests and for data produced in-process.
 *
 * @example
 * const store = await KeyStore.open(new MemoryLoader({ 'his/i': [1, 2], 'his/n': [3] }));
 */
export class MemoryLoader<V = unknown> implements Loader<V> {
    readonly path: string;
    private readonly entries: Entries<V>;

    constructor(entries: Record<Key, V> | ReadonlyMap<Key, V>, options: MemoryLoaderOptions = {}) {
        this.path = options.path ?? MEMORY_LOADER_PATH;
        this.entries = boxEntries(isMap(entries) ? entries : Object.entries(entries));
    }

    async open(): Promise<LoaderHandle<V>> {
        return mapHandle(this.entries, this.path);
    }
}

// ============================================================================
// JSON File
// ============================================================================

/**
 * Loader over one JSON file. Nested plain objects become `/`-joined keys;
 * arrays and scalars are values.
 *
 * The file is parsed on the first open and again only once its modification
 * time or size changes, so read batches share one parse.
 *
 * @example
 * // run.json: { "snap00010": { "phi": [0.1, 0.2] }, "nspecies": 2 }
 * // keys: ["nspecies", "snap00010/phi"]
 */
export class JsonLoader implements Loader<unknown> {
    readonly path: string;
    private parsed: { mtimeMs: number; size: number; entries: Entries<unknown> } | undefined;

    constructor(path: string) {
        this.path = resolve(path);
    }

    async open(): Promise<LoaderHandle<unknown>> {
        const { mtimeMs, size } = await stat(this.path);
        if (!this.parsed || this.parsed.mtimeMs !== mtimeMs || this.parsed.size !== size) {
            this.parsed = { mtimeMs, size, entries: await this.parse() };
        }
        return mapHandle(this.parsed.entries, this.path);
    }

    private async parse(): Promise<Entries<unknown>> {
        const raw = await readFile(this.path, 'utf-8');
        const parsed: unknown = JSON.parse(raw);

        if (!isRecord(parsed)) {
            throw new TypeError(`Expected a JSON object at the top level of ${this.path}`);
        }

        return boxEntries(Object.entries(flattenRecord(parsed)));
    }
}

// ============================================================================
// Directory
// ============================================================================

export interface DirectoryLoaderOptions {
    /** Glob selecting files, relative to the directory (default: every file) */
    pattern?: string;
    /** Include dotfiles (default: false) */
    dot?: boolean;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}

/**
 * Loader over a directory tree. Keys are POSIX paths relative to the
 * directory; values are raw file contents.
 */
export class DirectoryLoader implements Loader<Buffer> {
    readonly path: string;
    private readonly pattern: string;
    private readonly dot: boolean;

    constructor(path: string, options: DirectoryLoaderOptions = {}) {
        this.path = resolve(path);
        this.pattern = options.pattern ?? '**/*';
        this.dot = options.dot ?? false;
    }

    async open(): Promise<LoaderHandle<Buffer>> {
        const info = await stat(this.path);
        if (!info.isDirectory()) {
            throw new Error(`Path '${this.path}' is not a directory`);
        }

        return {
            keys: () => glob(this.pattern, { cwd: this.path, nodir: true, posix: true, dot: this.dot }),
            read: async (key) => {
                try {
                    return await readFile(join(this.path, key));
                } catch (error) {
                    if (isMissingFile(error)) {
                        throw new KeyNotFoundError(key, this.path);
                    }
                    throw error;
                }
            },
            close: async () => {},
        };
    }
}
