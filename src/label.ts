/**
 * Keyfold - Labels
 *
 * Turns the primary key of a work unit into a human-readable label.
 */

import { DEFAULT_LABEL_SEPARATOR, NULL_LABEL } from './constants.js';
import { captureNames, fillTemplate, namedCaptures, positionalCaptures } from './pattern.js';
import type { Key, LabelRule } from './types.js';

/**
 * Label rule used when a spec declares none: the primary pattern, labelled by
 * its first named capture. Without named captures, positional captures (or
 * the whole match) are joined instead.
 */
export function defaultLabelRule(primary: RegExp): LabelRule {
    const [first] = captureNames(primary);
    if (first === undefined) {
        return { pattern: primary, separator: DEFAULT_LABEL_SEPARATOR };
    }
    return { pattern: primary, template: `{${first}}`, separator: DEFAULT_LABEL_SEPARATOR };
}

/**
 * Apply a label rule to a key.
 *
 * @example
 * deriveLabel({ pattern: /da\/(?<spc>i|e)-(?<fld>p|m)-f/, template: '{spc}_{fld}_f', separator: '_' }, 'da/i-p-f')
 * // "i_p_f"
 * deriveLabel({ pattern: /his\/(?<spc>i|e)/, separator: '_' }, 'g/c')
 * // "null"
 */
export function deriveLabel(rule: LabelRule, key: Key): string {
    const match = rule.pattern.exec(key);
    if (!match) return NULL_LABEL;

    const captures = namedCaptures(match);
    if (rule.template !== undefined) {
        return fillTemplate(rule.template, captures);
    }

    const named = Object.values(captures);
    if (named.length > 0) return named.join(rule.separator);

    const positional = positionalCaptures(match);
    if (positional.length > 0) return positional.join(rule.separator);

    return match[0];
}
