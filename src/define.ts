/**
 * Keyfold - Pattern Spec Construction
 *
 * Builds frozen PatternSpec values from loose input and checks specs built
 * by hand before the resolver uses them.
 */

import {
    COMPLETENESS_ALL,
    DEFAULT_LABEL_SEPARATOR,
    DEFAULT_PATTERN_NAME,
    GROUP_PLACEHOLDER,
} from './constants.js';
import { defaultLabelRule } from './label.js';
import { captureNames, compilePattern, placeholders, type RegexSource } from './pattern.js';
import {
    PatternSpecError,
    type Cardinality,
    type Completeness,
    type LabelRule,
    type PatternSpec,
} from './types.js';
import { errorMessage } from './utils.js';
import { validatePatternInput, type LabelRuleInput, type PatternSpecInput } from './validation.js';

// ============================================================================
// Dimensions
// ============================================================================

export function cardinalityOf(patterns: readonly RegExp[]): Cardinality {
    return patterns.length > 1 ? 'multi' : 'single';
}

/**
 * Named captures of the primary pattern that reappear in a companion. Their
 * values identify a group.
 *
 * @example
 * groupingNames([/^(?<sect>his)\/(?<spc>i|e)$/, /^(?<sect>his)\/n$/])   // ["sect"]
 */
export function groupingNames(patterns: readonly RegExp[]): string[] {
    const [primary, ...companions] = patterns;
    if (primary === undefined) return [];

    const shared = new Set(companions.flatMap(captureNames));
    return captureNames(primary).filter((name) => shared.has(name));
}

/** Named captures found only in the primary pattern */
export function variantNames(patterns: readonly RegExp[]): string[] {
    const [primary] = patterns;
    if (primary === undefined) return [];

    const grouping = new Set(groupingNames(patterns));
    return captureNames(primary).filter((name) => !grouping.has(name));
}

// ============================================================================
// Checks
// ============================================================================

/**
 * Collect every problem with a spec. An empty list means the resolver can
 * use it.
 */
export function checkPatternSpec(spec: PatternSpec): string[] {
    const issues: string[] = [];

    if (spec.patterns.length === 0) {
        issues.push('patterns: at least one pattern is required');
        return issues;
    }

    const derived = cardinalityOf(spec.patterns);
    if (spec.cardinality !== derived) {
        issues.push(
            `cardinality: '${spec.cardinality}' does not fit ${spec.patterns.length} pattern(s), expected '${derived}'`
        );
    }

    if (spec.completeness !== COMPLETENESS_ALL && spec.completeness.length === 0) {
        issues.push('completeness: an explicit list needs at least one pattern');
    }

    const allowed = new Set([GROUP_PLACEHOLDER, ...groupingNames(spec.patterns)]);
    spec.auxiliary.forEach((template, index) => {
        for (const name of placeholders(template)) {
            if (!allowed.has(name)) {
                issues.push(`auxiliary.${index}: unknown placeholder {${name}} in '${template}'`);
            }
        }
    });

    if (spec.labeler.template !== undefined) {
        const available = new Set(captureNames(spec.labeler.pattern));
        for (const name of placeholders(spec.labeler.template)) {
            if (!available.has(name)) {
                issues.push(`labeler.template: {${name}} is not a named capture of ${spec.labeler.pattern}`);
            }
        }
    }

    return issues;
}

export function assertPatternSpec(spec: PatternSpec): void {
    const issues = checkPatternSpec(spec);
    if (issues.length > 0) {
        throw new PatternSpecError(`Invalid pattern spec '${spec.name}'`, issues);
    }
}

// ============================================================================
// Construction
// ============================================================================

function compileAll(sources: readonly RegexSource[], path: string, issues: string[]): RegExp[] {
    const compiled: RegExp[] = [];
    sources.forEach((source, index) => {
        try {
            compiled.push(compilePattern(source));
        } catch (error) {
            issues.push(`${path}.${index}: ${errorMessage(error)}`);
        }
    });
    return compiled;
}

function buildLabelRule(
    input: RegexSource | LabelRuleInput | undefined,
    primary: RegExp,
    issues: string[]
): LabelRule {
    if (input === undefined) return defaultLabelRule(primary);

    const rule: LabelRuleInput = typeof input === 'string' || input instanceof RegExp
        ? { pattern: input }
        : input;

    const [pattern] = compileAll([rule.pattern], 'labeler', issues);
    return {
        pattern: pattern ?? primary,
        ...(rule.template !== undefined && { template: rule.template }),
        separator: rule.separator ?? DEFAULT_LABEL_SEPARATOR,
    };
}

/**
 * Build a frozen PatternSpec.
 *
 * @example
 * const historySpec = definePattern({
 *     name: 'history',
 *     patterns: ['^(?<sect>his)/(?<spc>i|e)$', '^(?<sect>his)/n$'],
 *     auxiliary: ['g/c'],
 *     labeler: { pattern: 'his/(?<spc>i|e)' },
 * });
 *
 * @throws PatternSpecError when the input is malformed or a regex is invalid
 */
export function definePattern(input: PatternSpecInput): PatternSpec {
    const parsed = validatePatternInput(input);
    const name = parsed.name ?? DEFAULT_PATTERN_NAME;
    const issues: string[] = [];

    const patterns = compileAll(parsed.patterns, 'patterns', issues);
    const completeness: Completeness = parsed.completeness === undefined || parsed.completeness === COMPLETENESS_ALL
        ? COMPLETENESS_ALL
        : Object.freeze(compileAll(parsed.completeness, 'completeness', issues));

    if (issues.length > 0) {
        throw new PatternSpecError(`Invalid pattern spec '${name}'`, issues);
    }

    const [primary] = patterns;
    if (primary === undefined) {
        throw new PatternSpecError(`Invalid pattern spec '${name}'`, ['patterns: at least one pattern is required']);
    }

    const labeler = buildLabelRule(parsed.labeler, primary, issues);
    const spec: PatternSpec = Object.freeze({
        name,
        patterns: Object.freeze(patterns),
        cardinality: parsed.cardinality ?? cardinalityOf(patterns),
        completeness,
        auxiliary: Object.freeze([...(parsed.auxiliary ?? [])]),
        labeler: Object.freeze(labeler),
    });

    issues.push(...checkPatternSpec(spec));
    if (issues.length > 0) {
        throw new PatternSpecError(`Invalid pattern spec '${name}'`, issues);
    }

    return spec;
}
