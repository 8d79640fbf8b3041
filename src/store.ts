/**
 * Keyfold - KeyStore
 *
 * Cached, lazily populated access to the keys of a Loader.
 *
 * - keys are listed once on open (and on refresh), sorted and filtered
 * - values are read on first access and cached until clearCache()
 * - concurrent first reads of a key share one in-flight promise
 * - every read opens a loader handle and closes it, even on failure
 */

import { DESCRIPTION_KEY, KEY_SEPARATOR, ROOT_GROUP } from './constants.js';
import { resolveLogger, type Logger, type LoggingOptions } from './logger.js';
import { compilePattern, type RegexSource } from './pattern.js';
import {
    KeyNotFoundError,
    LoaderError,
    type GroupName,
    type Key,
    type KeySource,
} from './types.js';
import {
    defineEntry,
    errorMessage,
    groupOf,
    matchesAny,
    sortKeys,
    uniquePreserveOrder,
    type KeyFilter,
} from './utils.js';

// ============================================================================
// Loader Contract
// ============================================================================

/** An opened backing resource. Handles are short-lived. */
export interface LoaderHandle<V> {
    keys(): Promise<readonly Key[]>;
    /** Rejects with KeyNotFoundError for unknown keys */
    read(key: Key): Promise<V>;
    /** Batch read, used by getMany when present. Results follow input order. */
    readMany?(keys: readonly Key[]): Promise<V[]>;
    close(): Promise<void>;
}

export interface Loader<V> {
    /** Where the data lives, for messages and logs */
    readonly path: string;
    open(): Promise<LoaderHandle<V>>;
}

export interface KeyStoreOptions extends LoggingOptions {
    /** Exact keys, group names, or regexes tested against each key */
    exclude?: readonly KeyFilter[];
}

// ============================================================================
// KeyStore
// ============================================================================

export class KeyStore<V = unknown> implements KeySource {
    private readonly loader: Loader<V>;
    private readonly logger: Logger;
    private readonly exclude: KeyFilter[];
    private keyList: readonly Key[] = [];
    private keySet: ReadonlySet<Key> = new Set();
    private desc: string | undefined;
    private readonly cache = new Map<Key, { value: V }>();
    private readonly pending = new Map<Key, Promise<V>>();
    /** Bumped by clearCache so that reads in flight do not refill the cache */
    private generation = 0;

    private constructor(loader: Loader<V>, options: KeyStoreOptions) {
        this.loader = loader;
        this.logger = resolveLogger(options);
        this.exclude = (options.exclude ?? []).map((filter) =>
            typeof filter === 'string' ? filter : compilePattern(filter)
        );
    }

    /**
     * Open a store over a loader and list its keys.
     *
     * @throws LoaderError when the keys cannot be listed
     */
    static async open<V>(loader: Loader<V>, options: KeyStoreOptions = {}): Promise<KeyStore<V>> {
        const store = new KeyStore(loader, options);
        await store.refresh();
        return store;
    }

    get path(): string {
        return this.loader.path;
    }

    get cacheSize(): number {
        return this.cache.size;
    }

    /** The `description` key's value, when the source has one */
    get description(): string | undefined {
        return this.desc;
    }

    // ------------------------------------------------------------------------
    // Enumeration
    // ------------------------------------------------------------------------

    keys(): readonly Key[] {
        return this.keyList;
    }

    groups(): readonly GroupName[] {
        const groups = new Set(this.keyList.map(groupOf));
        groups.delete(ROOT_GROUP);
        return sortKeys(groups);
    }

    has(key: Key): boolean {
        return this.keySet.has(key);
    }

    /** Keys containing every fragment */
    find(...fragments: string[]): Key[] {
        return this.keyList.filter((key) => fragments.every((fragment) => key.includes(fragment)));
    }

    /** Keys matching a regex */
    refind(pattern: RegexSource): Key[] {
        const compiled = compilePattern(pattern);
        return this.keyList.filter((key) => compiled.test(key));
    }

    /** Check that every key is present, warning about each one that is not */
    allPresent(...keys: Key[]): boolean {
        let result = true;
        for (const key of keys) {
            if (!this.has(key)) {
                this.logger.warn(`Key '${key}' not in ${this.path}`, { path: this.path, key });
                result = false;
            }
        }
        return result;
    }

    /**
     * Re-list keys from the loader and drop every cached value.
     *
     * @throws LoaderError when the keys cannot be listed
     */
    async refresh(): Promise<void> {
        const { listed, kept, description } = await this.withHandle(undefined, async (handle) => {
            this.logger.debug(`Getting keys from ${this.path} ...`);
            const listed = await handle.keys();
            const kept = this.exclude.length > 0
                ? listed.filter((key) => !matchesAny(key, this.exclude))
                : listed;

            if (!kept.includes(DESCRIPTION_KEY)) {
                return { listed, kept, description: undefined };
            }
            this.logger.debug(`Getting description of ${this.path} ...`);
            return { listed, kept, description: String(await handle.read(DESCRIPTION_KEY)) };
        });

        this.keyList = Object.freeze(sortKeys(new Set(kept)));
        this.keySet = new Set(this.keyList);
        this.desc = description;
        this.clearCache();
        this.logger.debug(`Found ${this.keyList.length} key(s) in ${this.path}`, {
            excluded: listed.length - kept.length,
        });
    }

    // ------------------------------------------------------------------------
    // Retrieval
    // ------------------------------------------------------------------------

    /**
     * @throws KeyNotFoundError when the key is not listed
     * @throws LoaderError when the backing read fails
     */
    async get(key: Key): Promise<V> {
        const [value] = await this.getMany([key]);
        return value;
    }

    /**
     * Get values in input order. Every key is checked before anything is
     * read, and only keys that are neither cached nor in flight are read.
     */
    async getMany(keys: readonly Key[]): Promise<V[]> {
        for (const key of keys) {
            if (!this.has(key)) {
                throw new KeyNotFoundError(key, this.path);
            }
        }

        const missing = uniquePreserveOrder(
            keys.filter((key) => !this.cache.has(key) && !this.pending.has(key))
        );
        if (missing.length > 0) {
            this.startRead(missing);
        }

        return Promise.all(keys.map((key) => this.lookup(key)));
    }

    /**
     * Values of every key under a group, nested keys included, by path
     * relative to the group.
     *
     * @example
     * // keys: ["snap/phi", "snap/ion/density", "snapshot/phi"]
     * await store.getByGroup('snap')   // { "phi": ..., "ion/density": ... }
     */
    async getByGroup(group: GroupName): Promise<Record<string, V>> {
        const prefix = group + KEY_SEPARATOR;
        const keys = this.keyList.filter((key) => key.startsWith(prefix));
        const values = await this.getMany(keys);

        const result: Record<string, V> = {};
        keys.forEach((key, i) => {
            defineEntry(result, key.slice(prefix.length), values[i]);
        });
        return result;
    }

    clearCache(): void {
        this.cache.clear();
        this.generation++;
    }

    private lookup(key: Key): Promise<V> {
        const cached = this.cache.get(key);
        if (cached) {
            return Promise.resolve(cached.value);
        }
        return this.pending.get(key) ?? this.startRead([key])[0];
    }

    /** Start one batch read and register each key as in flight */
    private startRead(keys: Key[]): Promise<V>[] {
        const batch = this.readBatch(keys, this.generation);

        return keys.map((key, i) => {
            const promise = batch.then((values) => values[i]);
            this.pending.set(key, promise);
            return promise;
        });
    }

    private async readBatch(keys: Key[], generation: number): Promise<V[]> {
        try {
            const values = await this.withHandle(keys, async (handle) => {
                if (handle.readMany) {
                    this.logger.debug(`Getting ${keys.length} key(s) from ${this.path} ...`);
                    return handle.readMany(keys);
                }
                const result: V[] = [];
                for (const key of keys) {
                    this.logger.debug(`Getting key '${key}' from ${this.path} ...`);
                    result.push(await handle.read(key));
                }
                return result;
            });

            if (generation === this.generation) {
                keys.forEach((key, i) => this.cache.set(key, { value: values[i] }));
            }
            return values;
        } finally {
            for (const key of keys) {
                this.pending.delete(key);
            }
        }
    }

    // ------------------------------------------------------------------------
    // Scoped Acquisition
    // ------------------------------------------------------------------------

    /**
     * Open a handle, run `fn`, and close the handle on every exit path.
     * Failures other than KeyNotFoundError are logged and re-thrown as
     * LoaderError. A failed close is thrown only when `fn` succeeded.
     */
    private async withHandle<T>(
        keys: readonly Key[] | undefined,
        fn: (handle: LoaderHandle<V>) => Promise<T>
    ): Promise<T> {
        this.logger.debug(`Open path ${this.path}.`);
        const handle = await this.loader.open().catch((error: unknown) => {
            throw this.failure(error, keys);
        });

        const result = await fn(handle).catch(async (error: unknown) => {
            const failure = this.failure(error, keys);
            await this.close(handle, keys);
            throw failure;
        });

        const closeFailure = await this.close(handle, keys);
        if (closeFailure) {
            throw closeFailure;
        }
        return result;
    }

    /** Close a handle, returning the logged LoaderError when closing fails */
    private async close(handle: LoaderHandle<V>, keys: readonly Key[] | undefined): Promise<LoaderError | undefined> {
        this.logger.debug(`Close path ${this.path}.`);
        try {
            await handle.close();
            return undefined;
        } catch (error) {
            return this.loaderError(`Failed to close path ${this.path}: ${errorMessage(error)}`, error, keys);
        }
    }

    private failure(error: unknown, keys: readonly Key[] | undefined): Error {
        if (error instanceof KeyNotFoundError || error instanceof LoaderError) {
            return error;
        }

        const message = keys === undefined
            ? `Failed to read path ${this.path}: ${errorMessage(error)}`
            : `Failed to get '${keys.join("', '")}' from ${this.path}: ${errorMessage(error)}`;
        return this.loaderError(message, error, keys);
    }

    private loaderError(message: string, cause: unknown, keys: readonly Key[] | undefined): LoaderError {
        const key = keys?.length === 1 ? keys[0] : undefined;
        this.logger.error(message, { path: this.path, ...(keys !== undefined && { keys: [...keys] }), error: cause });
        return new LoaderError(message, this.path, key, { cause });
    }
}
