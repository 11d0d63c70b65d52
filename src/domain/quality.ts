import { Queryable } from '../db';
import type { IsoDate } from '../etl/types';

export interface QualityRatingRow {
    facility_id: string;
    quality_rating: number | null;
    rating_date: IsoDate;
    ownership: string | null;
    hospital_type: string | null;
    provides_emergency_services: boolean;
}

export const INSERT_QUALITY_RATINGS_SQL = `
    INSERT INTO hospital_quality (
        facility_id, quality_rating, rating_date, ownership, hospital_type, provides_emergency_services
    )
    SELECT * FROM unnest($1::text[], $2::int[], $3::date[], $4::text[], $5::text[], $6::bool[])
    ON CONFLICT (facility_id, rating_date) DO NOTHING
`;

export const insertQualityRatings = async (db: Queryable, rows: QualityRatingRow[]): Promise<number> => {
    if (rows.length === 0) return 0;
    const { rowCount } = await db.query(INSERT_QUALITY_RATINGS_SQL, [
        rows.map((r) => r.facility_id),
        rows.map((r) => r.quality_rating),
        rows.map((r) => r.rating_date),
        rows.map((r) => r.ownership),
        rows.map((r) => r.hospital_type),
        rows.map((r) => r.provides_emergency_services),
    ]);
    return rowCount ?? 0;
};
