import { INSERT_HOSPITALS_SQL, LOOKUP_HOSPITALS_SQL } from '../src/domain/hospital';
import { INSERT_LOCATIONS_SQL, LOOKUP_LOCATIONS_SQL } from '../src/domain/location';
import { INSERT_QUALITY_RATINGS_SQL } from '../src/domain/quality';
import { INSERT_WEEKLY_REPORTS_SQL } from '../src/domain/weeklyReport';
import { normalizeHhsRecord, normalizeQualityRecord } from '../src/etl/normalize';
import { chunk, UpsertEngine } from '../src/etl/upsert';
import { IntegrityError } from '../src/lib/errors';
import { hhsRow } from './support/csv';
import { captureLogger, silentLogger } from './support/logger';
import { FakePgError, MemoryDatabase } from './support/memoryDatabase';

describe('chunk', () => {
    test('splits into runs of at most the batch size', () => {
        expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    });

    test('no size, zero, or a size past the end keeps one batch', () => {
        expect(chunk([1, 2, 3])).toEqual([[1, 2, 3]]);
        expect(chunk([1, 2, 3], 0)).toEqual([[1, 2, 3]]);
        expect(chunk([1, 2, 3], 10)).toEqual([[1, 2, 3]]);
    });

    test('nothing in, nothing out', () => {
        expect(chunk([], 5)).toEqual([]);
    });
});

const weekly = (pk: string, city: string) =>
    normalizeHhsRecord(hhsRow({ hospital_pk: pk, hospital_name: `Hospital ${pk}`, city }));

describe('UpsertEngine', () => {
    test('writes location, hospital, then fact rows for each batch', async () => {
        const memory = new MemoryDatabase();
        const client = await memory.connect();
        const engine = new UpsertEngine({ batchSize: 2, logger: silentLogger() });

        const counts = await engine.upsertWeekly(client, [weekly('A', 'Akron'), weekly('B', 'Berea'), weekly('C', 'Akron')]);

        const perBatch = [
            INSERT_LOCATIONS_SQL,
            LOOKUP_LOCATIONS_SQL,
            INSERT_HOSPITALS_SQL,
            LOOKUP_HOSPITALS_SQL,
            INSERT_WEEKLY_REPORTS_SQL,
        ];
        expect(memory.statements).toEqual([...perBatch, ...perBatch]);
        expect(counts).toEqual({ locations: 2, hospitals: 3, weeklyReports: 3, qualityRatings: 0 });
    });

    test('fact rows point at the hospital of their own input row', async () => {
        const memory = new MemoryDatabase();
        const client = await memory.connect();
        const engine = new UpsertEngine({ logger: silentLogger() });

        await engine.upsertWeekly(client, [weekly('A', 'Akron'), weekly('B', 'Berea')]);

        expect(memory.tables.weekly_report.map((r) => r.hospital_weekly_id)).toEqual(['A', 'B']);
        const berea = memory.tables.location.find((l) => l.city === 'Berea');
        expect(memory.tables.hospital.find((h) => h.hospital_pk === 'B')?.location_id).toBe(berea?.id);
    });

    test('quality ratings reference the resolved facility', async () => {
        const memory = new MemoryDatabase();
        const client = await memory.connect();
        const engine = new UpsertEngine({ logger: silentLogger() });
        const record = normalizeQualityRecord(
            {
                'Facility ID': '100007',
                'Facility Name': 'Lakeside Medical',
                City: 'Orlando',
                State: 'FL',
                'ZIP Code': '32803',
                'Hospital Ownership': 'Proprietary',
                'Emergency Services': 'No',
                'Hospital Type': 'Acute Care Hospitals',
                'Hospital overall rating': '2',
            },
            '2023-01-15',
        );

        const counts = await engine.upsertQuality(client, [record]);

        expect(counts).toEqual({ locations: 1, hospitals: 1, weeklyReports: 0, qualityRatings: 1 });
        expect(memory.statements[memory.statements.length - 1]).toBe(INSERT_QUALITY_RATINGS_SQL);
        expect(memory.tables.hospital_quality[0]).toMatchObject({
            facility_id: '100007',
            quality_rating: 2,
            rating_date: '2023-01-15',
            provides_emergency_services: false,
        });
    });

    test('a database error is classified, logged with its batch, and re-thrown', async () => {
        const memory = new MemoryDatabase();
        const client = await memory.connect();
        const { logger, lines } = captureLogger();
        const engine = new UpsertEngine({ batchSize: 1, logger });
        memory.failOn(INSERT_WEEKLY_REPORTS_SQL, new FakePgError('violates foreign key constraint', '23503'));

        await expect(engine.upsertWeekly(client, [weekly('A', 'Akron')])).rejects.toBeInstanceOf(IntegrityError);

        const failure = lines.find((l) => l.level === 50);
        expect(failure).toMatchObject({ table: 'weekly_report', batch: 1, rows: 1, msg: 'Failed to write weekly_report batch' });
    });
});
