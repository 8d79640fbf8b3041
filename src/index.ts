/**
 * Keyfold
 *
 * Discover which keys of a flat array namespace belong together, before any
 * numeric work happens. Declare the shape of a work unit as a PatternSpec,
 * open a KeyStore over the data, and resolve.
 *
 * @example
 * ```typescript
 * import { KeyStore, JsonLoader, definePattern, resolve } from 'keyfold';
 *
 * const store = await KeyStore.open(new JsonLoader('run.json'));
 *
 * // One unit per field key, completed by the x and y keys of its group
 * const units = resolve(store, definePattern({
 *     name: 'field',
 *     patterns: ['^(?<sect>s\\d)/(?<fld>p|a)$', '^(?<sect>s\\d)/(?:x|y)$'],
 *     auxiliary: ['g/c'],
 *     labeler: 's\\d/(?<fld>p|a)',
 * }));
 *
 * for (const unit of units) {
 *     const [field, x, y] = await store.getMany(unit.primaryKeys);
 * }
 * ```
 */

// ============================================================================
// Engine
// ============================================================================

export { definePattern, checkPatternSpec, groupingNames, variantNames } from './define.js';
export { Resolver, resolve, type ResolveOptions } from './resolve.js';
export { deriveLabel, defaultLabelRule } from './label.js';
export { defineCatalog, parseCatalog, loadCatalog, resolveAll, type Catalog } from './catalog.js';
export { runWorkUnits, type Payload, type PayloadTable, type UnitResult } from './dispatch.js';

// ============================================================================
// Storage
// ============================================================================

export { KeyStore, type Loader, type LoaderHandle, type KeyStoreOptions } from './store.js';
export {
    MemoryLoader,
    JsonLoader,
    DirectoryLoader,
    type MemoryLoaderOptions,
    type DirectoryLoaderOptions,
} from './loaders.js';

// ============================================================================
// Support
// ============================================================================

export {
    createLogger,
    silentLogger,
    type Logger,
    type LoggerOptions,
    type LoggingOptions,
    type LogContext,
} from './logger.js';
export { groupOf, localName, type KeyFilter } from './utils.js';
export type { PatternSpecInput, LabelRuleInput, CatalogInput } from './validation.js';

// ============================================================================
// Re-exports
// ============================================================================

export type {
    Key,
    GroupName,
    Captures,
    KeySource,
    Cardinality,
    Completeness,
    LabelRule,
    PatternSpec,
    WorkUnit,
} from './types.js';

export { KeyNotFoundError, LoaderError, PatternSpecError } from './types.js';
