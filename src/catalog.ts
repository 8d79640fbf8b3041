/**
 * Keyfold - Catalogs
 *
 * A catalog names every kind of work unit a dataset supports, so one pass
 * over a store can resolve them all.
 *
 * @example
 * ```json
 * {
 *     "profile": {
 *         "patterns": ["^(?<snap>snap\\d{5})/(?<particle>ion|electron)-profile$", "^(?<snap>snap\\d{5})/mpsi\\+1$"],
 *         "auxiliary": ["gtc/tstep"],
 *         "labeler": { "pattern": "(?<particle>ion|electron)-profile", "template": "{particle}_profile" }
 *     }
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { definePattern } from './define.js';
import { resolveLogger, type LoggingOptions } from './logger.js';
import { Resolver } from './resolve.js';
import { PatternSpecError, type KeySource, type PatternSpec, type WorkUnit } from './types.js';
import { parseCatalogJson, type CatalogInput } from './validation.js';

export type Catalog = Readonly<Record<string, PatternSpec>>;

/**
 * Define every entry of a catalog. Each spec is named after its entry, and
 * issues from every entry are reported together.
 */
export function defineCatalog(input: CatalogInput): Catalog {
    const catalog: Record<string, PatternSpec> = {};
    const issues: string[] = [];

    for (const [name, entry] of Object.entries(input)) {
        try {
            catalog[name] = definePattern({ ...entry, name });
        } catch (error) {
            if (!(error instanceof PatternSpecError)) throw error;
            issues.push(...error.issues.map((issue) => `${name}.${issue}`));
        }
    }

    if (issues.length > 0) {
        throw new PatternSpecError('Invalid catalog', issues);
    }

    return Object.freeze(catalog);
}

export function parseCatalog(raw: string): Catalog {
    return defineCatalog(parseCatalogJson(raw));
}

/**
 * Read a JSON catalog file.
 *
 * @throws PatternSpecError when the file holds an invalid catalog
 */
export async function loadCatalog(path: string): Promise<Catalog> {
    return parseCatalog(await readFile(path, 'utf-8'));
}

/**
 * Resolve every spec of a catalog against one source. Specs are checked
 * before any of them is resolved.
 */
export function resolveAll(
    source: KeySource,
    catalog: Catalog,
    options: LoggingOptions = {}
): Record<string, WorkUnit[]> {
    const logger = resolveLogger(options);
    const resolvers = Object.entries(catalog).map(
        ([name, spec]) => [name, new Resolver(spec, { ...options, logger })] as const
    );

    const results: Record<string, WorkUnit[]> = {};
    for (const [name, resolver] of resolvers) {
        results[name] = resolver.resolve(source);
    }

    logger.info(
        `Resolved ${Object.values(results).reduce((sum, units) => sum + units.length, 0)} work unit(s) for ${resolvers.length} spec(s)`
    );
    return results;
}
