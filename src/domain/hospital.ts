import { Queryable } from '../db';
import type { HospitalKey } from '../etl/types';
import { resolveOrCreate, Resolution, ResolvePlan } from './resolve';

export interface HospitalCandidate extends HospitalKey {
    location_id: number | null;
}

// Existing hospitals are left as they are: no name or location updates.
export const INSERT_HOSPITALS_SQL = `
    INSERT INTO hospital (hospital_pk, hospital_name, location_id)
    SELECT c.hospital_pk, c.hospital_name, c.location_id
    FROM unnest($1::text[], $2::text[], $3::int[]) AS c(hospital_pk, hospital_name, location_id)
    ON CONFLICT (hospital_pk) DO NOTHING
`;

export const LOOKUP_HOSPITALS_SQL = `
    SELECT h.hospital_pk
    FROM unnest($1::text[]) WITH ORDINALITY AS c(hospital_pk, ord)
    JOIN hospital h ON h.hospital_pk = c.hospital_pk
    ORDER BY c.ord
`;

export const hospitalPlan: ResolvePlan<HospitalCandidate, string> = {
    table: 'hospital',
    keyOf: (h) => h.hospital_pk,
    insert: async (db, hospitals) => {
        const { rowCount } = await db.query(INSERT_HOSPITALS_SQL, [
            hospitals.map((h) => h.hospital_pk),
            hospitals.map((h) => h.hospital_name),
            hospitals.map((h) => h.location_id),
        ]);
        return rowCount ?? 0;
    },
    lookup: async (db, hospitals) => {
        const { rows } = await db.query<{ hospital_pk: string }>(LOOKUP_HOSPITALS_SQL, [
            hospitals.map((h) => h.hospital_pk),
        ]);
        return rows.map((r) => r.hospital_pk);
    },
};

export const resolveHospitals = (db: Queryable, hospitals: HospitalCandidate[]): Promise<Resolution<string>> =>
    resolveOrCreate(db, hospitalPlan, hospitals);
