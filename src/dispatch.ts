/**
 * Keyfold - Payload Dispatch
 *
 * Hands resolved work units to caller-supplied payloads. The resolver never
 * calls payloads itself; this is one way to compose the two.
 */

import { resolveLogger, type LoggingOptions } from './logger.js';
import type { KeyStore } from './store.js';
import type { WorkUnit } from './types.js';

/** Numeric work for one unit. Reads its keys through the shared store. */
export type Payload<V, R> = (unit: WorkUnit, store: KeyStore<V>) => R | Promise<R>;

/** One payload for every unit, or payloads looked up by unit label */
export type PayloadTable<V, R> = Payload<V, R> | Readonly<Record<string, Payload<V, R>>>;

export interface UnitResult<R> {
    readonly unit: WorkUnit;
    readonly result: R;
}

function selectPayload<V, R>(payloads: PayloadTable<V, R>, unit: WorkUnit): Payload<V, R> | undefined {
    if (typeof payloads === 'function') return payloads;
    return Object.prototype.hasOwnProperty.call(payloads, unit.label) ? payloads[unit.label] : undefined;
}

/**
 * Run payloads for every unit concurrently. Units without a payload are
 * skipped. Results keep unit order; the first payload failure rejects.
 *
 * @example
 * const results = await runWorkUnits(store, units, {
 *     i: async (unit, s) => sum(await s.getMany([...unit.primaryKeys, ...unit.auxiliaryKeys])),
 * });
 */
export async function runWorkUnits<V, R>(
    store: KeyStore<V>,
    units: readonly WorkUnit[],
    payloads: PayloadTable<V, R>,
    options: LoggingOptions = {}
): Promise<UnitResult<R>[]> {
    const logger = resolveLogger(options);
    const selected: [WorkUnit, Payload<V, R>][] = [];

    for (const unit of units) {
        const payload = selectPayload(payloads, unit);
        if (payload) {
            selected.push([unit, payload]);
        } else {
            logger.debug(`No payload for '${unit.label}' in group '${unit.group}', skipping`);
        }
    }

    return Promise.all(
        selected.map(async ([unit, payload]) => ({ unit, result: await payload(unit, store) }))
    );
}
