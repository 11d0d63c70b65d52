import { Queryable } from '../db';
import { IsoDate, WEEKLY_METRICS, WeeklyMetrics } from '../etl/types';

export interface WeeklyReportRow {
    collection_week: IsoDate;
    metrics: WeeklyMetrics;
    hospital_weekly_id: string;
}

const metricCasts = WEEKLY_METRICS.map((_, i) => `$${i + 2}::float8[]`).join(', ');

// No conflict target: every load appends its rows, even for a week already loaded.
export const INSERT_WEEKLY_REPORTS_SQL = `
    INSERT INTO weekly_report (collection_week, ${WEEKLY_METRICS.join(', ')}, hospital_weekly_id)
    SELECT * FROM unnest($1::date[], ${metricCasts}, $${WEEKLY_METRICS.length + 2}::text[])
`;

export const insertWeeklyReports = async (db: Queryable, rows: WeeklyReportRow[]): Promise<number> => {
    if (rows.length === 0) return 0;
    const { rowCount } = await db.query(INSERT_WEEKLY_REPORTS_SQL, [
        rows.map((r) => r.collection_week),
        ...WEEKLY_METRICS.map((metric) => rows.map((r) => r.metrics[metric])),
        rows.map((r) => r.hospital_weekly_id),
    ]);
    return rowCount ?? 0;
};
