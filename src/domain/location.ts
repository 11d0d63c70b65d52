import { Queryable } from '../db';
import type { LocationKey } from '../etl/types';
import { resolveOrCreate, Resolution, ResolvePlan } from './resolve';

const CANDIDATES = `
    unnest($1::text[], $2::text[], $3::text[], $4::text[], $5::float8[], $6::float8[], $7::text[])`;

// NULL-safe tuple match; the unique constraint alone lets NULL-bearing tuples repeat.
const SAME_TUPLE = `
        l.city IS NOT DISTINCT FROM c.city
        AND l.state IS NOT DISTINCT FROM c.state
        AND l.zip_code IS NOT DISTINCT FROM c.zip_code
        AND l.address IS NOT DISTINCT FROM c.address
        AND l.latitude IS NOT DISTINCT FROM c.latitude
        AND l.longitude IS NOT DISTINCT FROM c.longitude
        AND l.fips_code IS NOT DISTINCT FROM c.fips_code`;

export const INSERT_LOCATIONS_SQL = `
    INSERT INTO location (city, state, zip_code, address, latitude, longitude, fips_code)
    SELECT c.city, c.state, c.zip_code, c.address, c.latitude, c.longitude, c.fips_code
    FROM ${CANDIDATES} AS c(city, state, zip_code, address, latitude, longitude, fips_code)
    WHERE NOT EXISTS (
        SELECT 1 FROM location l WHERE ${SAME_TUPLE}
    )
    ON CONFLICT DO NOTHING
`;

export const LOOKUP_LOCATIONS_SQL = `
    SELECT l.id
    FROM ${CANDIDATES} WITH ORDINALITY AS c(city, state, zip_code, address, latitude, longitude, fips_code, ord)
    JOIN LATERAL (
        SELECT l.id FROM location l WHERE ${SAME_TUPLE}
        ORDER BY l.id
        LIMIT 1
    ) l ON true
    ORDER BY c.ord
`;

export const locationKeyOf = (k: LocationKey): string =>
    JSON.stringify([k.city, k.state, k.zip_code, k.address, k.latitude, k.longitude, k.fips_code]);

export const locationParams = (keys: LocationKey[]): unknown[] => [
    keys.map((k) => k.city),
    keys.map((k) => k.state),
    keys.map((k) => k.zip_code),
    keys.map((k) => k.address),
    keys.map((k) => k.latitude),
    keys.map((k) => k.longitude),
    keys.map((k) => k.fips_code),
];

export const locationPlan: ResolvePlan<LocationKey, number> = {
    table: 'location',
    keyOf: locationKeyOf,
    insert: async (db, keys) => {
        const { rowCount } = await db.query(INSERT_LOCATIONS_SQL, locationParams(keys));
        return rowCount ?? 0;
    },
    lookup: async (db, keys) => {
        const { rows } = await db.query<{ id: number }>(LOOKUP_LOCATIONS_SQL, locationParams(keys));
        return rows.map((r) => r.id);
    },
};

export const resolveLocations = (db: Queryable, keys: LocationKey[]): Promise<Resolution<number>> =>
    resolveOrCreate(db, locationPlan, keys);
