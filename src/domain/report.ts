import { Queryable } from '../db';
import type { IsoDate } from '../etl/types';

// Read-only aggregates behind the weekly report. Every week-scoped query
// resolves "the week" as the latest loaded collection_week on or before $1.

const REPORT_WEEK = `(SELECT MAX(collection_week) FROM weekly_report WHERE collection_week <= $1)`;

const TOTAL_BEDS = `wr.all_adult_hospital_beds_7_day_avg + wr.all_pediatric_inpatient_beds_7_day_avg`;
const OCCUPIED_BEDS = `wr.all_adult_hospital_inpatient_bed_occupied_7_day_avg + wr.all_pediatric_inpatient_bed_occupied_7_day_avg`;

export const RECENT_WEEKS_SQL = `
    SELECT DISTINCT collection_week::text AS collection_week
    FROM weekly_report
    ORDER BY collection_week DESC
    LIMIT $1
`;

export const RECORDS_SUMMARY_SQL = `
    WITH weekly_counts AS (
        SELECT collection_week, COUNT(DISTINCT hospital_weekly_id) AS hospital_count
        FROM weekly_report
        GROUP BY collection_week
    )
    SELECT
        collection_week::text AS collection_week,
        hospital_count,
        COALESCE(LAG(hospital_count) OVER (ORDER BY collection_week), 0) AS previous_week_count
    FROM weekly_counts
    WHERE collection_week IN ($1::date, $2::date)
    ORDER BY collection_week DESC
    LIMIT 1
`;

export const BEDS_SUMMARY_SQL = `
    WITH recent_weeks AS (
        SELECT DISTINCT collection_week
        FROM weekly_report
        WHERE collection_week <= $1
        ORDER BY collection_week DESC
        LIMIT 5
    )
    SELECT
        wr.collection_week::text AS collection_week,
        SUM(wr.all_adult_hospital_beds_7_day_avg) AS adult_beds_available,
        SUM(wr.all_pediatric_inpatient_beds_7_day_avg) AS pediatric_beds_available,
        SUM(wr.all_adult_hospital_inpatient_bed_occupied_7_day_avg) AS adult_beds_occupied,
        SUM(wr.all_pediatric_inpatient_bed_occupied_7_day_avg) AS pediatric_beds_occupied,
        SUM(wr.inpatient_beds_used_covid_7_day_avg) AS covid_beds_used
    FROM weekly_report wr
    JOIN recent_weeks rw ON wr.collection_week = rw.collection_week
    GROUP BY wr.collection_week
    ORDER BY wr.collection_week DESC
`;

export const UTILIZATION_BY_RATING_SQL = `
    SELECT
        hq.quality_rating,
        ROUND(CAST(SUM(${OCCUPIED_BEDS}) * 100.0 / NULLIF(SUM(${TOTAL_BEDS}), 0) AS NUMERIC), 1) AS percent_beds_in_use
    FROM (
        SELECT DISTINCT ON (facility_id) facility_id, quality_rating
        FROM hospital_quality
        ORDER BY facility_id, rating_date DESC
    ) hq
    JOIN weekly_report wr ON hq.facility_id = wr.hospital_weekly_id
    WHERE wr.collection_week = ${REPORT_WEEK}
    GROUP BY hq.quality_rating
    ORDER BY hq.quality_rating
`;

export const WEEKLY_BEDS_USED_SQL = `
    SELECT
        wr.collection_week::text AS collection_week,
        SUM(${OCCUPIED_BEDS}) AS total_beds_used,
        SUM(wr.inpatient_beds_used_covid_7_day_avg) AS covid_beds_used
    FROM weekly_report wr
    WHERE wr.collection_week <= $1
    GROUP BY wr.collection_week
    ORDER BY wr.collection_week
`;

export const COVID_BY_STATE_SQL = `
    SELECT loc.state, SUM(wr.inpatient_beds_used_covid_7_day_avg) AS covid_beds_used
    FROM weekly_report wr
    JOIN hospital h ON wr.hospital_weekly_id = h.hospital_pk
    JOIN location loc ON h.location_id = loc.id
    WHERE wr.collection_week = ${REPORT_WEEK}
    GROUP BY loc.state
    ORDER BY loc.state
`;

export const FEWEST_OPEN_BEDS_SQL = `
    SELECT loc.state, SUM(${TOTAL_BEDS}) - SUM(${OCCUPIED_BEDS}) AS open_beds
    FROM weekly_report wr
    JOIN hospital h ON wr.hospital_weekly_id = h.hospital_pk
    JOIN location loc ON h.location_id = loc.id
    WHERE wr.collection_week = ${REPORT_WEEK}
    GROUP BY loc.state
    ORDER BY open_beds ASC
    LIMIT 10
`;

export const NOT_REPORTING_SQL = `
    SELECT
        h.hospital_pk,
        h.hospital_name,
        loc.city,
        loc.state,
        MAX(wr.collection_week)::text AS last_reported_week
    FROM hospital h
    LEFT JOIN location loc ON h.location_id = loc.id
    LEFT JOIN weekly_report wr ON h.hospital_pk = wr.hospital_weekly_id AND wr.collection_week <= $1
    GROUP BY h.hospital_pk, h.hospital_name, loc.city, loc.state
    HAVING MAX(wr.collection_week) IS NULL OR MAX(wr.collection_week) < ${REPORT_WEEK}
    ORDER BY h.hospital_name ASC
    LIMIT $2
`;

export const UTILIZATION_BY_STATE_SQL = `
    SELECT
        wr.collection_week::text AS collection_week,
        loc.state,
        ROUND(CAST(SUM(${OCCUPIED_BEDS}) * 100.0 / NULLIF(SUM(${TOTAL_BEDS}), 0) AS NUMERIC), 1) AS percent_utilization
    FROM weekly_report wr
    JOIN hospital h ON wr.hospital_weekly_id = h.hospital_pk
    JOIN location loc ON h.location_id = loc.id
    WHERE wr.collection_week <= $1
    GROUP BY wr.collection_week, loc.state
    ORDER BY wr.collection_week, loc.state
`;

/** pg hands back COUNT and NUMERIC as strings. */
export const toNumber = (value: unknown): number | null => {
    if (value === null || value === undefined) return null;
    const n = typeof value === 'number' ? value : Number(value);
    return Number.isFinite(n) ? n : null;
};

export const previousWeek = (week: IsoDate): IsoDate => {
    const [y, m, d] = week.split('-').map(Number);
    return new Date(Date.UTC(y, m - 1, d - 7)).toISOString().slice(0, 10);
};

export interface RecordsSummary {
    collection_week: string;
    hospital_count: number;
    previous_week_count: number;
    week_difference: number;
}

export interface BedsSummary {
    collection_week: string;
    adult_beds_available: number | null;
    pediatric_beds_available: number | null;
    adult_beds_occupied: number | null;
    pediatric_beds_occupied: number | null;
    covid_beds_used: number | null;
}

export interface WeeklyReport {
    week: IsoDate;
    records: RecordsSummary | null;
    beds: BedsSummary[];
    utilizationByRating: { quality_rating: number | null; percent_beds_in_use: number | null }[];
    bedsUsedPerWeek: { collection_week: string; total_beds_used: number | null; covid_beds_used: number | null }[];
    covidByState: { state: string; covid_beds_used: number | null }[];
    fewestOpenBeds: { state: string; open_beds: number | null }[];
    notReporting: {
        hospital_pk: string;
        hospital_name: string;
        city: string | null;
        state: string | null;
        last_reported_week: string | null;
    }[];
    utilizationByState: { collection_week: string; state: string; percent_utilization: number | null }[];
}

type Row = Record<string, unknown>;

const text = (value: unknown): string => (value === null || value === undefined ? '' : String(value));
const nullableText = (value: unknown): string | null => (value === null || value === undefined ? null : String(value));

export const listRecentWeeks = async (db: Queryable, limit = 5): Promise<string[]> => {
    const { rows } = await db.query<{ collection_week: string }>(RECENT_WEEKS_SQL, [limit]);
    return rows.map((r) => r.collection_week);
};

export const getRecordsSummary = async (db: Queryable, week: IsoDate): Promise<RecordsSummary | null> => {
    const { rows } = await db.query<Row>(RECORDS_SUMMARY_SQL, [week, previousWeek(week)]);
    const row = rows[0];
    if (!row) return null;
    const hospitalCount = toNumber(row.hospital_count) ?? 0;
    const previousCount = toNumber(row.previous_week_count) ?? 0;
    return {
        collection_week: text(row.collection_week),
        hospital_count: hospitalCount,
        previous_week_count: previousCount,
        week_difference: hospitalCount - previousCount,
    };
};

export const buildWeeklyReport = async (db: Queryable, week: IsoDate, notReportingLimit = 10): Promise<WeeklyReport> => {
    const records = await getRecordsSummary(db, week);
    const beds = await db.query<Row>(BEDS_SUMMARY_SQL, [week]);
    const byRating = await db.query<Row>(UTILIZATION_BY_RATING_SQL, [week]);
    const bedsUsed = await db.query<Row>(WEEKLY_BEDS_USED_SQL, [week]);
    const covid = await db.query<Row>(COVID_BY_STATE_SQL, [week]);
    const openBeds = await db.query<Row>(FEWEST_OPEN_BEDS_SQL, [week]);
    const notReporting = await db.query<Row>(NOT_REPORTING_SQL, [week, notReportingLimit]);
    const byState = await db.query<Row>(UTILIZATION_BY_STATE_SQL, [week]);

    return {
        week,
        records,
        beds: beds.rows.map((r) => ({
            collection_week: text(r.collection_week),
            adult_beds_available: toNumber(r.adult_beds_available),
            pediatric_beds_available: toNumber(r.pediatric_beds_available),
            adult_beds_occupied: toNumber(r.adult_beds_occupied),
            pediatric_beds_occupied: toNumber(r.pediatric_beds_occupied),
            covid_beds_used: toNumber(r.covid_beds_used),
        })),
        utilizationByRating: byRating.rows.map((r) => ({
            quality_rating: toNumber(r.quality_rating),
            percent_beds_in_use: toNumber(r.percent_beds_in_use),
        })),
        bedsUsedPerWeek: bedsUsed.rows.map((r) => ({
            collection_week: text(r.collection_week),
            total_beds_used: toNumber(r.total_beds_used),
            covid_beds_used: toNumber(r.covid_beds_used),
        })),
        covidByState: covid.rows.map((r) => ({ state: text(r.state), covid_beds_used: toNumber(r.covid_beds_used) })),
        fewestOpenBeds: openBeds.rows.map((r) => ({ state: text(r.state), open_beds: toNumber(r.open_beds) })),
        notReporting: notReporting.rows.map((r) => ({
            hospital_pk: text(r.hospital_pk),
            hospital_name: text(r.hospital_name),
            city: nullableText(r.city),
            state: nullableText(r.state),
            last_reported_week: nullableText(r.last_reported_week),
        })),
        utilizationByState: byState.rows.map((r) => ({
            collection_week: text(r.collection_week),
            state: text(r.state),
            percent_utilization: toNumber(r.percent_utilization),
        })),
    };
};
