import { mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DirectoryLoader, JsonLoader, MemoryLoader } from '../src/loaders.js';
import { KeyStore } from '../src/store.js';
import { KeyNotFoundError, LoaderError } from '../src/types.js';
import { FIXTURES, spyLogger } from './helpers.js';

function fixture(name: string): string {
    return fileURLToPath(new URL(name, FIXTURES));
}

describe('MemoryLoader', () => {
    it('serves a record', async () => {
        const store = await KeyStore.open(new MemoryLoader({ 'his/i': [1, 2], 'his/n': [3] }));

        expect(store.path).toBe('memory');
        expect(await store.getMany(['his/n', 'his/i'])).toEqual([[3], [1, 2]]);
    });

    it('serves a Map under a custom path', async () => {
        const entries = new Map([['g/c', 'config']]);
        const store = await KeyStore.open(new MemoryLoader(entries, { path: 'fixture' }));

        expect(store.path).toBe('fixture');
        expect(await store.get('g/c')).toBe('config');
    });

    it('rejects keys it does not hold', async () => {
        const handle = await new MemoryLoader({ 'g/c': 1 }).open();

        await expect(handle.read('g/d')).rejects.toThrow(KeyNotFoundError);
    });
});

describe('JsonLoader', () => {
    it('flattens nested objects into keys', async () => {
        const store = await KeyStore.open(new JsonLoader(fixture('run.json')));

        expect(store.keys()).toEqual([
            'description',
            'gtc/qiflux',
            'gtc/tstep',
            'snap00010/ion-profile',
            'snap00010/mpsi+1',
            'snap00020/ion-profile',
            'snap00020/mpsi+1',
        ]);
        expect(store.groups()).toEqual(['gtc', 'snap00010', 'snap00020']);
    });

    it('exposes the description key', async () => {
        const store = await KeyStore.open(new JsonLoader(fixture('run.json')));

        expect(store.description).toBe('two snapshots of a test run');
    });

    it('keeps arrays as values', async () => {
        const store = await KeyStore.open(new JsonLoader(fixture('run.json')));

        expect(await store.get('snap00010/ion-profile')).toEqual([
            [1, 2],
            [3, 4],
        ]);
        expect(await store.getByGroup('gtc')).toEqual({ qiflux: 1.4, tstep: 0.01 });
    });

    it('rejects a file whose top level is not an object', async () => {
        const path = fixture('array.json');
        const opening = KeyStore.open(new JsonLoader(path), { logger: spyLogger() });

        await expect(opening).rejects.toThrow(LoaderError);
        await expect(opening).rejects.toThrow(
            `Failed to read path ${path}: Expected a JSON object at the top level of ${path}`
        );
    });

    it('rejects a missing file', async () => {
        const opening = KeyStore.open(new JsonLoader(fixture('missing.json')), { logger: spyLogger() });

        await expect(opening).rejects.toThrow(LoaderError);
    });
});

describe('JsonLoader parsing', () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await mkdtemp(join(tmpdir(), 'keyfold-json-'));
    });

    afterEach(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    async function writeStamped(path: string, content: string, stamp: Date): Promise<void> {
        await writeFile(path, content);
        await utimes(path, stamp, stamp);
    }

    it('parses again only when the file changes', async () => {
        const path = join(testDir, 'run.json');
        const stamp = new Date('2024-01-01T00:00:00Z');
        await writeStamped(path, '{"gtc": {"tstep": 1}}', stamp);
        const store = await KeyStore.open(new JsonLoader(path));

        await writeStamped(path, '{"gtc": {"tstep": 2}}', stamp);
        expect(await store.get('gtc/tstep')).toBe(1);

        await writeStamped(path, '{"gtc": {"tstep": 2}, "extra": 3}', new Date('2024-01-02T00:00:00Z'));
        await store.refresh();

        expect(store.keys()).toEqual(['extra', 'gtc/tstep']);
        expect(await store.get('gtc/tstep')).toBe(2);
    });
});

describe('DirectoryLoader', () => {
    it('lists files as posix keys without dotfiles', async () => {
        const store = await KeyStore.open(new DirectoryLoader(fixture('run-dir')));

        expect(store.keys()).toEqual(['gtc/tstep.txt', 'snap00010/apara.txt', 'snap00010/phi.txt']);
    });

    it('includes dotfiles on request', async () => {
        const store = await KeyStore.open(new DirectoryLoader(fixture('run-dir'), { dot: true }));

        expect(store.keys()).toEqual(['.hidden', 'gtc/tstep.txt', 'snap00010/apara.txt', 'snap00010/phi.txt']);
    });

    it('selects files with a glob', async () => {
        const store = await KeyStore.open(new DirectoryLoader(fixture('run-dir'), { pattern: 'snap*/*.txt' }));

        expect(store.keys()).toEqual(['snap00010/apara.txt', 'snap00010/phi.txt']);
    });

    it('reads file contents', async () => {
        const store = await KeyStore.open(new DirectoryLoader(fixture('run-dir')));

        const value = await store.get('gtc/tstep.txt');

        expect(value.toString('utf-8')).toBe('0.01\n');
    });

    it('maps a vanished file to KeyNotFoundError', async () => {
        const handle = await new DirectoryLoader(fixture('run-dir')).open();

        await expect(handle.read('snap00010/gone.txt')).rejects.toThrow(KeyNotFoundError);
    });

    it('rejects a path that is not a directory', async () => {
        const path = fixture('run.json');
        const opening = KeyStore.open(new DirectoryLoader(path), { logger: spyLogger() });

        await expect(opening).rejects.toThrow(`Failed to read path ${path}: Path '${path}' is not a directory`);
    });
});
