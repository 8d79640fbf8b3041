import { vi, type Mock } from 'vitest';
import type { LogFn, Logger } from '../src/logger.js';
import type { Loader, LoaderHandle } from '../src/store.js';
import { KeyNotFoundError, type Key } from '../src/types.js';

export const FIXTURES = new URL('./fixtures/', import.meta.url);

export type SpyLogger = { readonly [K in keyof Logger]: Mock<LogFn> };

export function spyLogger(): SpyLogger {
    return {
        debug: vi.fn<LogFn>(),
        info: vi.fn<LogFn>(),
        warn: vi.fn<LogFn>(),
        error: vi.fn<LogFn>(),
    };
}

/**
 * Loader that records every open, close and read, and can fail or hold reads.
 */
export class CountingLoader<V> implements Loader<V> {
    readonly path = 'counting';
    opens = 0;
    closes = 0;
    reads: Key[] = [];
    batches: Key[][] = [];
    readonly failOn = new Set<Key>();
    /** Listed by keys() but not readable */
    readonly ghosts: Key[] = [];
    /** Make every close() reject after counting it */
    closeFails = false;
    private readonly entries: Map<Key, V>;
    private gate: Promise<void> | undefined;

    constructor(
        entries: Record<Key, V>,
        private readonly batch: boolean = false
    ) {
        this.entries = new Map(Object.entries(entries));
    }

    set(key: Key, value: V): void {
        this.entries.set(key, value);
    }

    /** Hold reads until the returned function is called */
    hold(): () => void {
        let release: () => void = () => {};
        this.gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        return () => {
            this.gate = undefined;
            release();
        };
    }

    async open(): Promise<LoaderHandle<V>> {
        this.opens++;
        const handle: LoaderHandle<V> = {
            keys: async () => [...this.entries.keys(), ...this.ghosts],
            read: (key) => this.read(key),
            close: async () => {
                this.closes++;
                if (this.closeFails) {
                    throw new Error('close failed');
                }
            },
        };
        if (this.batch) {
            handle.readMany = async (keys) => {
                this.batches.push([...keys]);
                const values: V[] = [];
                for (const key of keys) {
                    values.push(await this.value(key));
                }
                return values;
            };
        }
        return handle;
    }

    private async read(key: Key): Promise<V> {
        this.reads.push(key);
        return this.value(key);
    }

    private async value(key: Key): Promise<V> {
        if (this.gate) await this.gate;
        if (this.failOn.has(key)) {
            throw new Error(`disk error on ${key}`);
        }
        const entry = this.entries.get(key);
        if (entry === undefined) {
            throw new KeyNotFoundError(key, this.path);
        }
        return entry;
    }
}
