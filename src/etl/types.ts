/** One source row, keyed by the CSV header names. */
export type RawRecord = Record<string, string>;

/** Validated `YYYY-MM-DD`. */
export type IsoDate = string;

export interface LocationKey {
    city: string;
    state: string;
    zip_code: string;
    address: string | null;
    latitude: number | null;
    longitude: number | null;
    fips_code: string | null;
}

export interface HospitalKey {
    hospital_pk: string;
    hospital_name: string;
}

export const WEEKLY_METRICS = [
    'all_adult_hospital_beds_7_day_avg',
    'all_pediatric_inpatient_beds_7_day_avg',
    'all_adult_hospital_inpatient_bed_occupied_7_day_avg',
    'all_pediatric_inpatient_bed_occupied_7_day_avg',
    'total_icu_beds_7_day_avg',
    'icu_beds_used_7_day_avg',
    'inpatient_beds_used_covid_7_day_avg',
    'staffed_icu_adult_patients_confirmed_covid_7_day_avg',
] as const;

export type WeeklyMetric = (typeof WEEKLY_METRICS)[number];

export type WeeklyMetrics = Record<WeeklyMetric, number | null>;

export interface HhsRecord {
    hospital: HospitalKey;
    location: LocationKey;
    collection_week: IsoDate;
    metrics: WeeklyMetrics;
}

export interface QualityRecord {
    hospital: HospitalKey;
    location: LocationKey;
    rating_date: IsoDate;
    quality_rating: number | null;
    ownership: string | null;
    hospital_type: string | null;
    provides_emergency_services: boolean;
}

export interface UpsertCounts {
    locations: number;
    hospitals: number;
    weeklyReports: number;
    qualityRatings: number;
}

export const emptyCounts = (): UpsertCounts => ({
    locations: 0,
    hospitals: 0,
    weeklyReports: 0,
    qualityRatings: 0,
});

export const addCounts = (a: UpsertCounts, b: UpsertCounts): UpsertCounts => ({
    locations: a.locations + b.locations,
    hospitals: a.hospitals + b.hospitals,
    weeklyReports: a.weeklyReports + b.weeklyReports,
    qualityRatings: a.qualityRatings + b.qualityRatings,
});

export type LoadOutcome<T> =
    | ({ status: 'committed'; counts: UpsertCounts } & T)
    | {
        status: 'failed';
        error: unknown;
        /** True when the failure happened inside the transaction and it was rolled back. */
        rolledBack: boolean;
    };
