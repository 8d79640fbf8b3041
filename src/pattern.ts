/**
 * Keyfold - Pattern Helpers
 *
 * Regex compilation, named capture discovery and `{name}` templates.
 */

import { PLACEHOLDER_PATTERN, STATEFUL_REGEX_FLAGS } from './constants.js';
import type { Captures } from './types.js';

export type RegexSource = string | RegExp;

// ============================================================================
// Compilation
// ============================================================================

/**
 * Compile a regex source, dropping `g` and `y` so that `exec` and `test`
 * never depend on `lastIndex`. Throws a SyntaxError for invalid sources.
 */
export function compilePattern(source: RegexSource): RegExp {
    if (typeof source === 'string') {
        return new RegExp(source);
    }
    return new RegExp(source.source, source.flags.replace(STATEFUL_REGEX_FLAGS, ''));
}

/**
 * List the named capture groups of a regex in declaration order.
 *
 * The regex is extended with an empty alternative and run against the empty
 * string, so its `groups` object carries every name without parsing the source.
 *
 * @example
 * captureNames(/^(?<sect>s\d)\/(?<fld>p|a)$/)   // ["sect", "fld"]
 * captureNames(/^g\/c$/)                       // []
 */
export function captureNames(pattern: RegExp): string[] {
    const probe = new RegExp(`(?:${pattern.source})|`, pattern.flags);
    const groups = probe.exec('')?.groups;
    return groups ? Object.keys(groups) : [];
}

/**
 * Named captures of a match. Groups that did not participate are omitted.
 */
export function namedCaptures(match: RegExpExecArray): Captures {
    const captures: Record<string, string> = {};
    for (const [name, value] of Object.entries(match.groups ?? {})) {
        if (value !== undefined) {
            captures[name] = value;
        }
    }
    return captures;
}

/** Positional capture values of a match, skipping unmatched groups */
export function positionalCaptures(match: RegExpExecArray): string[] {
    return match.slice(1).filter((value): value is string => value !== undefined);
}

// ============================================================================
// Templates
// ============================================================================

/**
 * List the `{name}` placeholders of a template
 *
 * @example
 * placeholders("{sect}/mpsi+1")    // ["sect"]
 * placeholders("gtc/tstep")        // []
 */
export function placeholders(template: string): string[] {
    return [...template.matchAll(PLACEHOLDER_PATTERN)].map((match) => match[1] ?? '');
}

/**
 * Fill `{name}` placeholders. Unknown names become empty strings; callers
 * validate placeholder names up front.
 *
 * @example
 * fillTemplate("{spc}_{fld}_f", { spc: "i", fld: "p" })   // "i_p_f"
 */
export function fillTemplate(template: string, values: Captures): string {
    return template.replace(PLACEHOLDER_PATTERN, (_, name: string) => values[name] ?? '');
}
