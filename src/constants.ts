/**
 * Keyfold - Constants
 *
 * Separators, sentinels and defaults shared by the store and the resolver.
 */

// ============================================================================
// Keys
// ============================================================================

/** Separates a key's group from its local name */
export const KEY_SEPARATOR = '/';

/** Group name of bare keys. Never reported by `groups()`. */
export const ROOT_GROUP = '';

/** Key whose value, when present, describes the whole source */
export const DESCRIPTION_KEY = 'description';

// ============================================================================
// Pattern Specs
// ============================================================================

export const DEFAULT_PATTERN_NAME = 'pattern';

export const COMPLETENESS_ALL = 'all';

/** Joins named captures into a label when the labeler has no template */
export const DEFAULT_LABEL_SEPARATOR = '_';

/** Label of a unit whose primary key the labeler does not match */
export const NULL_LABEL = 'null';

/** Placeholder naming the whole group value in auxiliary templates */
export const GROUP_PLACEHOLDER = 'group';

/** `{name}` placeholders in auxiliary and label templates */
export const PLACEHOLDER_PATTERN = /\{([A-Za-z_$][\w$]*)\}/g;

/** Flags dropped when compiling patterns, since matching is stateless */
export const STATEFUL_REGEX_FLAGS = /[gy]/g;

// ============================================================================
// Configuration
// ============================================================================

/** Environment variable turning on debug and info logging */
export const VERBOSE_ENV = 'KEYFOLD_VERBOSE';

export const LOG_PREFIX = 'keyfold';

export const MEMORY_LOADER_PATH = 'memory';
