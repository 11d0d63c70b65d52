import { Queryable } from '../db';
import { ResolutionError } from '../lib/errors';

/**
 * How one table maps natural keys to surrogate ids. `insert` receives each
 * distinct key once and must skip keys that already exist; `lookup` receives
 * the full input and must answer in input order.
 */
export interface ResolvePlan<K, Id> {
    table: string;
    keyOf(key: K): string;
    insert(db: Queryable, keys: K[]): Promise<number>;
    lookup(db: Queryable, keys: K[]): Promise<Id[]>;
}

export interface Resolution<Id> {
    ids: Id[];
    inserted: number;
}

/**
 * Insert-if-absent followed by an ordered lookup: `ids[i]` belongs to `keys[i]`,
 * whether the row was created here or existed before. A short lookup is fatal,
 * since every later foreign key would be assigned to the wrong row.
 */
export const resolveOrCreate = async <K, Id>(
    db: Queryable,
    plan: ResolvePlan<K, Id>,
    keys: K[],
): Promise<Resolution<Id>> => {
    if (keys.length === 0) return { ids: [], inserted: 0 };

    const distinct = new Map<string, K>();
    for (const key of keys) {
        const k = plan.keyOf(key);
        if (!distinct.has(k)) distinct.set(k, key);
    }

    const inserted = await plan.insert(db, [...distinct.values()]);
    const ids = await plan.lookup(db, keys);

    if (ids.length !== keys.length) {
        throw new ResolutionError(plan.table, keys.length, ids.length);
    }
    return { ids, inserted };
};
