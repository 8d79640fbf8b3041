/**
 * Keyfold - Type Definitions
 *
 * Keys, pattern specs, work units and the errors raised around them.
 */

// ============================================================================
// Keys
// ============================================================================

/** A unique array name, conventionally `group/name` */
export type Key = string;

/** Prefix of a key up to its last separator */
export type GroupName = string;

/** Named capture values taken from one regex match */
export type Captures = Readonly<Record<string, string>>;

/** Anything that can enumerate keys. A KeyStore is one. */
export interface KeySource {
    keys(): readonly Key[];
}

// ============================================================================
// Pattern Spec
// ============================================================================

export type Cardinality = 'single' | 'multi';

export type Completeness = 'all' | readonly RegExp[];

export interface LabelRule {
    readonly pattern: RegExp;
    /** `{name}` placeholders filled from named captures, e.g. `{spc}_{fld}_f` */
    readonly template?: string;
    /** Joins named captures when there is no template */
    readonly separator: string;
}

export interface PatternSpec {
    readonly name: string;
    /** patterns[0] is primary, the rest are companions */
    readonly patterns: readonly RegExp[];
    readonly cardinality: Cardinality;
    readonly completeness: Completeness;
    /** Literal keys or `{group}` / `{<capture>}` templates */
    readonly auxiliary: readonly string[];
    readonly labeler: LabelRule;
}

// ============================================================================
// Work Units
// ============================================================================

export interface WorkUnit {
    readonly group: GroupName;
    readonly primaryKeys: readonly Key[];
    readonly auxiliaryKeys: readonly Key[];
    readonly label: string;
}

// ============================================================================
// Errors
// ============================================================================

export class KeyNotFoundError extends Error {
    public readonly name = 'KeyNotFoundError' as const;

    constructor(
        public readonly key: Key,
        public readonly path: string
    ) {
        super(`${key} is not in '${path}'`);
    }
}

export class LoaderError extends Error {
    public readonly name = 'LoaderError' as const;

    constructor(
        message: string,
        public readonly path: string,
        public readonly key?: Key,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class PatternSpecError extends Error {
    public readonly name = 'PatternSpecError' as const;

    constructor(
        message: string,
        public readonly issues: string[]
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    }
}
