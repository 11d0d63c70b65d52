import { InvalidDateError, ValidationError } from '../lib/errors';
import {
    HhsRecord,
    IsoDate,
    QualityRecord,
    RawRecord,
    WEEKLY_METRICS,
    WeeklyMetrics,
} from './types';

/** HHS marks "suppressed / not reported" numeric cells with this value. */
export const MISSING_SENTINEL = -999999;

export const HHS_COLUMNS = [
    'hospital_pk',
    'state',
    'hospital_name',
    'address',
    'city',
    'zip',
    'fips_code',
    'geocoded_hospital_address',
    'collection_week',
    ...WEEKLY_METRICS,
] as const;

export const QUALITY_COLUMNS = [
    'Facility ID',
    'Facility Name',
    'City',
    'State',
    'ZIP Code',
    'Hospital Ownership',
    'Emergency Services',
    'Hospital Type',
    'Hospital overall rating',
] as const;

const field = (raw: RawRecord, name: string): string => (raw[name] ?? '').trim();

export const parseOptionalText = (value: string | undefined): string | null => {
    const trimmed = (value ?? '').trim();
    return trimmed === '' ? null : trimmed;
};

export const parseMetric = (value: string | undefined): number | null => {
    const trimmed = (value ?? '').trim();
    if (trimmed === '') return null;
    const n = Number(trimmed);
    if (!Number.isFinite(n) || n === MISSING_SENTINEL) return null;
    return n;
};

export interface Geocode {
    longitude: number | null;
    latitude: number | null;
}

const POINT_PATTERN = /^(?:SRID=\d+;?\s*)?POINT\s*\(\s*([^\s()]+)\s+([^\s()]+)\s*\)$/i;

/**
 * `POINT (lon lat)`, optionally with an `SRID=nnnn;` prefix. Anything that
 * does not parse to two finite numbers yields no coordinates at all.
 */
export const parseGeocode = (value: string | undefined): Geocode => {
    const match = POINT_PATTERN.exec((value ?? '').trim());
    if (!match) return { longitude: null, latitude: null };

    const longitude = Number(match[1]);
    const latitude = Number(match[2]);
    if (!Number.isFinite(longitude) || !Number.isFinite(latitude)) {
        return { longitude: null, latitude: null };
    }
    return { longitude, latitude };
};

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isIsoDate = (value: string): boolean => {
    const match = ISO_DATE_PATTERN.exec(value);
    if (!match) return false;
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(Date.UTC(year, month - 1, day));
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

export const parseIsoDate = (value: string | undefined, fieldName: string): IsoDate => {
    const trimmed = (value ?? '').trim();
    if (!isIsoDate(trimmed)) {
        throw new InvalidDateError(fieldName, trimmed);
    }
    return trimmed;
};

export const parseBoolean = (value: string | undefined): boolean => (value ?? '').trim().toLowerCase() === 'yes';

export const parseQualityRating = (value: string | undefined): number | null => {
    const trimmed = (value ?? '').trim();
    if (!/^\d+$/.test(trimmed)) return null;
    const rating = parseInt(trimmed, 10);
    return rating >= 1 && rating <= 5 ? rating : null;
};

const requireText = (raw: RawRecord, name: string): string => {
    const value = field(raw, name);
    if (value === '') {
        throw new ValidationError(`Missing required value for ${name}`, name);
    }
    return value;
};

const parseWeeklyMetrics = (raw: RawRecord): WeeklyMetrics => ({
    all_adult_hospital_beds_7_day_avg: parseMetric(raw.all_adult_hospital_beds_7_day_avg),
    all_pediatric_inpatient_beds_7_day_avg: parseMetric(raw.all_pediatric_inpatient_beds_7_day_avg),
    all_adult_hospital_inpatient_bed_occupied_7_day_avg: parseMetric(raw.all_adult_hospital_inpatient_bed_occupied_7_day_avg),
    all_pediatric_inpatient_bed_occupied_7_day_avg: parseMetric(raw.all_pediatric_inpatient_bed_occupied_7_day_avg),
    total_icu_beds_7_day_avg: parseMetric(raw.total_icu_beds_7_day_avg),
    icu_beds_used_7_day_avg: parseMetric(raw.icu_beds_used_7_day_avg),
    inpatient_beds_used_covid_7_day_avg: parseMetric(raw.inpatient_beds_used_covid_7_day_avg),
    staffed_icu_adult_patients_confirmed_covid_7_day_avg: parseMetric(raw.staffed_icu_adult_patients_confirmed_covid_7_day_avg),
});

export const normalizeHhsRecord = (raw: RawRecord): HhsRecord => {
    const { longitude, latitude } = parseGeocode(raw.geocoded_hospital_address);

    return {
        hospital: {
            hospital_pk: requireText(raw, 'hospital_pk'),
            hospital_name: field(raw, 'hospital_name'),
        },
        location: {
            city: field(raw, 'city'),
            state: field(raw, 'state'),
            zip_code: field(raw, 'zip'),
            address: parseOptionalText(raw.address),
            latitude,
            longitude,
            fips_code: parseOptionalText(raw.fips_code),
        },
        collection_week: parseIsoDate(raw.collection_week, 'collection_week'),
        metrics: parseWeeklyMetrics(raw),
    };
};

export const normalizeQualityRecord = (raw: RawRecord, ratingDate: IsoDate): QualityRecord => ({
    hospital: {
        hospital_pk: requireText(raw, 'Facility ID'),
        hospital_name: field(raw, 'Facility Name'),
    },
    location: {
        city: field(raw, 'City'),
        state: field(raw, 'State'),
        zip_code: field(raw, 'ZIP Code'),
        address: null,
        latitude: null,
        longitude: null,
        fips_code: null,
    },
    rating_date: ratingDate,
    quality_rating: parseQualityRating(raw['Hospital overall rating']),
    ownership: parseOptionalText(raw['Hospital Ownership']),
    hospital_type: parseOptionalText(raw['Hospital Type']),
    provides_emergency_services: parseBoolean(raw['Emergency Services']),
});

/**
 * Keeps the first record seen for each key. Pass the same `seen` set to carry
 * the dedup across the batches of one load.
 */
export const dedupeFirst = <T>(records: Iterable<T>, keyOf: (record: T) => string, seen: Set<string> = new Set()): T[] => {
    const kept: T[] = [];
    for (const record of records) {
        const key = keyOf(record);
        if (seen.has(key)) continue;
        seen.add(key);
        kept.push(record);
    }
    return kept;
};

export const hospitalKeyOf = (record: { hospital: { hospital_pk: string } }): string => record.hospital.hospital_pk;
