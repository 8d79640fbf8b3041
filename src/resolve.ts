/**
 * Keyfold - Resolver
 *
 * Scans the keys of a source, clusters matches of a PatternSpec by group and
 * emits one WorkUnit per complete combination.
 *
 * Grouping works on named captures:
 * - names shared by the primary pattern and a companion identify the group
 * - names only in the primary pattern tell variants apart
 * - a pattern sharing no name with the primary is grouped by key prefix
 *
 * With one pattern every primary match is a unit. With companions, primary
 * matches sharing a group and variant values are bound into one unit.
 *
 * Each pattern is run over every key once, so a pass costs
 * O(keys × patterns) regex evaluations and never touches data.
 */

import { COMPLETENESS_ALL, GROUP_PLACEHOLDER, KEY_SEPARATOR } from './constants.js';
import { assertPatternSpec, groupingNames, variantNames } from './define.js';
import { deriveLabel } from './label.js';
import { resolveLogger, type Logger, type LoggingOptions } from './logger.js';
import { captureNames, compilePattern, fillTemplate, namedCaptures } from './pattern.js';
import type {
    Captures,
    GroupName,
    Key,
    KeySource,
    LabelRule,
    PatternSpec,
    WorkUnit,
} from './types.js';
import { compareKeys, groupBy, groupOf, sortKeys, uniquePreserveOrder } from './utils.js';

// ============================================================================
// Types
// ============================================================================

export interface ResolveOptions extends LoggingOptions {}

interface PrimaryMatch {
    key: Key;
    group: GroupName;
    /** Values of the grouping captures, used for auxiliary templates */
    groupValues: Captures;
    /** Identity of the variant captures within the group */
    variant: string;
}

interface Companion {
    pattern: RegExp;
    /** Grouping names this companion declares, in primary-pattern order */
    shared: string[];
}

/** Companion matches bucketed by group identity */
type CompanionIndex = Map<string, Key[]>;

// ============================================================================
// Group Identity
// ============================================================================

function identity(key: Key, names: readonly string[], captures: Captures): string {
    if (names.length === 0) {
        return JSON.stringify([groupOf(key)]);
    }
    return JSON.stringify(names.map((name) => captures[name] ?? ''));
}

function pickCaptures(captures: Captures, names: readonly string[]): Captures {
    const picked: Record<string, string> = {};
    for (const name of names) {
        picked[name] = captures[name] ?? '';
    }
    return picked;
}

// ============================================================================
// Resolver
// ============================================================================

export class Resolver {
    readonly spec: PatternSpec;
    private readonly logger: Logger;
    private readonly primary: RegExp;
    private readonly companions: Companion[];
    private readonly grouping: string[];
    private readonly variants: string[];
    private readonly completeness: 'all' | RegExp[];
    private readonly labeler: LabelRule;

    /**
     * @throws PatternSpecError before any matching when the spec is malformed
     */
    constructor(spec: PatternSpec, options: ResolveOptions = {}) {
        assertPatternSpec(spec);

        const patterns = spec.patterns.map(compilePattern);
        const [primary, ...rest] = patterns;
        if (primary === undefined) {
            throw new Error(`Pattern spec '${spec.name}' has no primary pattern`);
        }

        this.spec = spec;
        this.logger = resolveLogger(options);
        this.primary = primary;
        this.grouping = groupingNames(patterns);
        this.variants = variantNames(patterns);
        this.companions = rest.map((pattern) => {
            const declared = new Set(captureNames(pattern));
            return { pattern, shared: this.grouping.filter((name) => declared.has(name)) };
        });
        this.completeness = spec.completeness === COMPLETENESS_ALL
            ? COMPLETENESS_ALL
            : spec.completeness.map(compilePattern);
        this.labeler = { ...spec.labeler, pattern: compilePattern(spec.labeler.pattern) };
    }

    /** Grouping and variant capture names, for diagnostics */
    get dimensions(): { grouping: string[]; variants: string[] } {
        return {
            grouping: [...this.grouping],
            variants: [...this.variants],
        };
    }

    resolve(source: KeySource): WorkUnit[] {
        const keys = source.keys();
        const primaries = this.matchPrimary(keys);

        if (primaries.length === 0) {
            this.logger.debug(`[${this.spec.name}] no key matches ${this.primary}`);
            return [];
        }

        const indexes = this.companions.map((companion) => this.indexCompanion(companion, keys));
        const present = new Set(keys);
        const units: WorkUnit[] = [];

        for (const [group, matches] of groupBy(primaries, (match) => match.group)) {
            const candidates = this.companions.length === 0
                ? matches.map((match) => [match])
                : [...groupBy(matches, (match) => match.variant).values()];

            let emitted = 0;
            for (const candidate of candidates) {
                const unit = this.bind(candidate, indexes, present);
                if (unit) {
                    units.push(unit);
                    emitted++;
                }
            }
            this.logger.debug(
                `[${this.spec.name}] group '${group}': ${emitted} of ${candidates.length} variant(s) complete`
            );
        }

        this.logger.debug(
            `[${this.spec.name}] resolved ${units.length} work unit(s) from ${keys.length} key(s)`
        );
        return units;
    }

    // ------------------------------------------------------------------------
    // Matching
    // ------------------------------------------------------------------------

    private matchPrimary(keys: readonly Key[]): PrimaryMatch[] {
        const matches: PrimaryMatch[] = [];
        for (const key of keys) {
            const match = this.primary.exec(key);
            if (!match) continue;

            const captures = namedCaptures(match);
            const groupValues = pickCaptures(captures, this.grouping);
            const group = this.grouping.length > 0
                ? this.grouping.map((name) => groupValues[name]).join(KEY_SEPARATOR)
                : groupOf(key);
            const variant = JSON.stringify(this.variants.map((name) => captures[name] ?? null));
            matches.push({ key, group, groupValues, variant });
        }
        return matches;
    }

    private indexCompanion(companion: Companion, keys: readonly Key[]): CompanionIndex {
        const index: CompanionIndex = new Map();
        for (const key of keys) {
            const match = companion.pattern.exec(key);
            if (!match) continue;

            const id = identity(key, companion.shared, namedCaptures(match));
            const bucket = index.get(id);
            if (bucket) {
                bucket.push(key);
            } else {
                index.set(id, [key]);
            }
        }
        for (const bucket of index.values()) {
            bucket.sort(compareKeys);
        }
        return index;
    }

    // ------------------------------------------------------------------------
    // Binding
    // ------------------------------------------------------------------------

    /**
     * Bind the primary matches of one group and variant. Every match shares
     * the group's capture values, so companions are looked up once.
     */
    private bind(
        matches: readonly PrimaryMatch[],
        indexes: readonly CompanionIndex[],
        present: ReadonlySet<Key>
    ): WorkUnit | null {
        const [lead] = matches;
        if (lead === undefined) return null;

        const companionKeys = this.companions.map((companion, i) => {
            const id = identity(lead.key, companion.shared, lead.groupValues);
            return indexes[i]?.get(id) ?? [];
        });

        const matchedKeys = sortKeys(matches.map((match) => match.key));
        const primaryKeys = uniquePreserveOrder([...matchedKeys, ...companionKeys.flat()]);
        const auxiliaryKeys = this.auxiliaryKeys(lead);

        const missing = this.unmet(companionKeys, primaryKeys, auxiliaryKeys, present);
        if (missing.length > 0) {
            this.logger.debug(
                `[${this.spec.name}] dropping '${matchedKeys.join("', '")}' in group '${lead.group}': nothing matches ${missing.join(', ')}`
            );
            return null;
        }

        return Object.freeze({
            group: lead.group,
            primaryKeys: Object.freeze(primaryKeys),
            auxiliaryKeys: Object.freeze(auxiliaryKeys),
            label: deriveLabel(this.labeler, matchedKeys[0] ?? lead.key),
        });
    }

    private auxiliaryKeys(match: PrimaryMatch): Key[] {
        const values = { ...match.groupValues, [GROUP_PLACEHOLDER]: match.group };
        return this.spec.auxiliary.map((template) => fillTemplate(template, values));
    }

    /** Requirements the combination fails, as printable patterns */
    private unmet(
        companionKeys: readonly Key[][],
        primaryKeys: readonly Key[],
        auxiliaryKeys: readonly Key[],
        present: ReadonlySet<Key>
    ): string[] {
        if (this.completeness === COMPLETENESS_ALL) {
            return this.companions
                .filter((_, i) => (companionKeys[i]?.length ?? 0) === 0)
                .map((companion) => String(companion.pattern));
        }

        const candidates = [...primaryKeys, ...auxiliaryKeys.filter((key) => present.has(key))];
        return this.completeness
            .filter((required) => !candidates.some((key) => required.test(key)))
            .map(String);
    }
}

/**
 * Resolve a spec against a key source in one call.
 *
 * @example
 * const units = resolve(store, definePattern({
 *     patterns: ['^(?<sect>s\\d)/(?<fld>p|a)$', '^(?<sect>s\\d)/(?:x|y)$'],
 * }));
 * // [{ group: 's0', primaryKeys: ['s0/a', 's0/x', 's0/y'], ... }, ...]
 */
export function resolve(source: KeySource, spec: PatternSpec, options: ResolveOptions = {}): WorkUnit[] {
    return new Resolver(spec, options).resolve(source);
}
